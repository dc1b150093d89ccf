import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FfmpegTranscoder, buildFfmpegArgs, type CommandRunner } from "../transcode.js";
import { TranscodeError } from "../../errors.js";
import { silentLogger } from "../../logger.js";
import { CommandError } from "../../utils/process.js";

describe("buildFfmpegArgs", () => {
  it("places the sample rate after the input", () => {
    const args = buildFfmpegArgs("in.mp4", "out.wav", 16000);
    expect(args.indexOf("-ar")).toBeGreaterThan(args.indexOf("-i"));
    expect(args.slice(args.indexOf("-i"))).toEqual([
      "-i", "in.mp4",
      "-ar", "16000",
      "-ac", "1",
      "-c:a", "pcm_s16le",
      "out.wav",
    ]);
  });
});

describe("FfmpegTranscoder", () => {
  let root: string;
  let workDir: string;
  let source: string;
  let invocations: Array<{ command: string; args: string[] }>;

  // Stands in for ffmpeg: writes "RIFF" to the last argument
  const fakeFfmpeg: CommandRunner = async (command, args) => {
    invocations.push({ command, args });
    await fs.writeFile(args[args.length - 1], "RIFF");
    return { stdout: "", stderr: "", exitCode: 0 };
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "transcode-"));
    workDir = path.join(root, ".subtitle-cache");
    await fs.mkdir(workDir);
    source = path.join(root, "clip.mp4");
    await fs.writeFile(source, "video");
    invocations = [];
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const transcoder = (keepTempFiles: boolean, run: CommandRunner = fakeFfmpeg) =>
    new FfmpegTranscoder({ ffmpegPath: "/opt/ffmpeg", workDir, keepTempFiles, logger: silentLogger(), run });

  it("decodes into the working cache and removes the source and intermediate file", async () => {
    const audio = await transcoder(false).decode(source, { sampleRate: 16000 });

    expect(audio.toString()).toBe("RIFF");
    expect(invocations).toEqual([
      { command: "/opt/ffmpeg", args: buildFfmpegArgs(source, path.join(workDir, "clip.wav"), 16000) },
    ]);
    await expect(fs.stat(source)).rejects.toMatchObject({ code: "ENOENT" });
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("keeps both files when asked to", async () => {
    await transcoder(true).decode(source, { sampleRate: 16000 });

    expect(await fs.readFile(source, "utf-8")).toBe("video");
    expect(await fs.readdir(workDir)).toEqual(["clip.wav"]);
  });

  it("surfaces engine failures as TranscodeError and keeps the source", async () => {
    const failing: CommandRunner = async (command, args) => {
      throw new CommandError(`${command} ${args.join(" ")}`, 1, "", "Invalid data found when processing input");
    };

    const err = await transcoder(false, failing)
      .decode(source, { sampleRate: 16000 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TranscodeError);
    expect(err).toMatchObject({ message: expect.stringContaining("Invalid data found when processing input") });
    expect(await fs.readFile(source, "utf-8")).toBe("video");
  });
});
