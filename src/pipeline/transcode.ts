import fs from "node:fs/promises";
import path from "node:path";
import { CancelledError, TranscodeError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { DecodeOptions, Transcoder } from "../types.js";
import { removeIfExists } from "../utils/fs.js";
import { runCommand } from "../utils/process.js";

export type CommandRunner = typeof runCommand;

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  workDir: string;
  keepTempFiles: boolean;
  logger: Logger;
  run?: CommandRunner;
}

export function buildFfmpegArgs(sourcePath: string, targetPath: string, sampleRate: number): string[] {
  return [
    "-hide_banner",
    "-loglevel", "error",
    "-y",
    "-i", sourcePath,
    // Output options go after the input
    "-ar", String(sampleRate),
    "-ac", "1",
    "-c:a", "pcm_s16le",
    targetPath,
  ];
}

/**
 * Converts media to 16-bit mono WAV in the working cache and loads it into memory.
 * The source and the intermediate file are deleted afterwards unless keepTempFiles is set.
 */
export class FfmpegTranscoder implements Transcoder {
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly opts: FfmpegTranscoderOptions) {
    this.run = opts.run ?? runCommand;
    this.logger = opts.logger.child({ component: "ffmpeg" });
  }

  async decode(sourcePath: string, { sampleRate, signal }: DecodeOptions): Promise<Buffer> {
    const targetPath = path.join(this.opts.workDir, `${path.parse(sourcePath).name}.wav`);
    this.logger.debug({ sourcePath, targetPath, sampleRate }, "Converting media to wave");

    try {
      await this.run(this.opts.ffmpegPath, buildFfmpegArgs(sourcePath, targetPath, sampleRate), { signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError("Conversion cancelled");
      throw new TranscodeError(errorMessage(err), { cause: err });
    }

    const audio = await fs.readFile(targetPath);

    if (!this.opts.keepTempFiles) {
      await removeIfExists(sourcePath);
      await removeIfExists(targetPath);
      this.logger.debug({ sourcePath, targetPath }, "Removed source and intermediate audio");
    }

    return audio;
  }
}
