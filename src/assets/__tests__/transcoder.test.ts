import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TranscoderProvisioner, executableName, platformKey, type ArchiveExtractor } from "../transcoder.js";
import { CancelledError, ProvisioningError } from "../../errors.js";
import { silentLogger } from "../../logger.js";
import { FakeFetcher } from "./fakes.js";

const RELEASES = "https://releases.example.test/api/v1/version/latest";
const FFMPEG_ZIP = "https://releases.example.test/ffmpeg-6.1-linux-64.zip";
const FFPROBE_ZIP = "https://releases.example.test/ffprobe-6.1-linux-64.zip";

describe("platformKey", () => {
  it.each([
    ["linux", "x64", "linux-64"],
    ["linux", "arm64", "linux-arm64"],
    ["linux", "arm", "linux-armhf"],
    ["win32", "x64", "windows-64"],
    ["darwin", "arm64", "osx-64"],
  ] as const)("maps %s/%s to %s", (platform, arch, key) => {
    expect(platformKey(platform, arch)).toBe(key);
  });

  it("returns null for unsupported combinations", () => {
    expect(platformKey("freebsd", "x64")).toBeNull();
    expect(platformKey("linux", "s390x")).toBeNull();
  });
});

describe("executableName", () => {
  it("adds .exe on windows only", () => {
    expect(executableName("ffmpeg", "win32")).toBe("ffmpeg.exe");
    expect(executableName("ffprobe", "linux")).toBe("ffprobe");
  });
});

describe("TranscoderProvisioner", () => {
  let workDir: string;
  let fetcher: FakeFetcher;
  let extracted: string[];

  // Writes an executable named after the archive (ffmpeg-6.1-linux-64.zip -> ffmpeg)
  const fakeExtract: ArchiveExtractor = async (archivePath, targetDir) => {
    extracted.push(path.basename(archivePath));
    const name = path.basename(archivePath).split("-")[0];
    await fs.writeFile(path.join(targetDir, name), "#!/bin/sh\n");
  };

  const provisioner = (platform: NodeJS.Platform = "linux", arch = "x64") =>
    new TranscoderProvisioner({
      workDir,
      releasesUrl: RELEASES,
      fetcher,
      logger: silentLogger(),
      extract: fakeExtract,
      platform,
      arch,
    });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "transcoder-"));
    fetcher = new FakeFetcher();
    extracted = [];
    fetcher.json[RELEASES] = {
      version: "6.1",
      bin: {
        "linux-64": { ffmpeg: FFMPEG_ZIP, ffprobe: FFPROBE_ZIP },
        "osx-64": { ffmpeg: "https://releases.example.test/ffmpeg-6.1-osx-64.zip" },
      },
    };
    fetcher.sizes[FFMPEG_ZIP] = 32;
    fetcher.sizes[FFPROBE_ZIP] = 32;
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("downloads, extracts and marks the executables when the directory is empty", async () => {
    const paths = await provisioner().ensureTranscoderAvailable();

    const dir = path.join(workDir, "ffmpeg");
    expect(paths).toEqual({ ffmpeg: path.join(dir, "ffmpeg"), ffprobe: path.join(dir, "ffprobe") });
    expect(fetcher.calls).toEqual([`GET ${RELEASES}`, `DOWNLOAD ${FFMPEG_ZIP}`, `DOWNLOAD ${FFPROBE_ZIP}`]);
    expect(extracted).toEqual(["ffmpeg-6.1-linux-64.zip", "ffprobe-6.1-linux-64.zip"]);
    expect((await fs.stat(paths.ffmpeg)).mode & 0o777).toBe(0o755);
    // archives are removed after extraction
    expect((await fs.readdir(workDir)).sort()).toEqual(["ffmpeg"]);
  });

  it("trusts a non-empty directory without any network access", async () => {
    const dir = path.join(workDir, "ffmpeg");
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, "ffmpeg"), "");

    const paths = await provisioner().ensureTranscoderAvailable();

    expect(fetcher.calls).toEqual([]);
    expect(paths).toEqual({ ffmpeg: path.join(dir, "ffmpeg"), ffprobe: null });
  });

  it("skips executables the release does not ship for the platform", async () => {
    const paths = await provisioner("darwin", "arm64").ensureTranscoderAvailable();

    expect(fetcher.downloads).toEqual(["DOWNLOAD https://releases.example.test/ffmpeg-6.1-osx-64.zip"]);
    expect(paths.ffprobe).toBeNull();
  });

  it("rejects a platform without a build", async () => {
    await expect(provisioner("linux", "s390x").ensureTranscoderAvailable()).rejects.toThrow(
      "No FFmpeg build available for linux-s390x"
    );
    expect(fetcher.calls).toEqual([]);
  });

  it("leaves the directory empty when a download fails", async () => {
    fetcher.failDownload = new Error("ECONNRESET");

    const err = await provisioner()
      .ensureTranscoderAvailable()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisioningError);
    expect(err).toMatchObject({ message: "Failed to provision FFmpeg: ECONNRESET" });
    expect(await fs.readdir(path.join(workDir, "ffmpeg"))).toEqual([]);
  });

  it("rejects a malformed release index", async () => {
    fetcher.json[RELEASES] = { version: "6.1" };

    await expect(provisioner().ensureTranscoderAvailable()).rejects.toBeInstanceOf(ProvisioningError);
  });

  it("stops when cancelled mid-download and leaves no archive behind", async () => {
    const controller = new AbortController();
    fetcher.stallDownload = true;
    fetcher.onDownloadStarted = () => controller.abort();

    const err = await provisioner()
      .ensureTranscoderAvailable(controller.signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancelledError);
    expect(err).toMatchObject({ message: "FFmpeg download cancelled" });
    expect(fetcher.downloads).toEqual([`DOWNLOAD ${FFMPEG_ZIP}`]);
    expect(extracted).toEqual([]);
    expect(await fs.readdir(workDir)).toEqual(["ffmpeg"]);
    expect(await fs.readdir(path.join(workDir, "ffmpeg"))).toEqual([]);
  });
});
