import fs from "node:fs/promises";
import path from "node:path";
import extractZip from "extract-zip";
import { z } from "zod";
import { TRANSCODER_DIR_NAME, TRANSCODER_EXECUTABLES, type TranscoderExecutable } from "../constants.js";
import { CancelledError, ProvisioningError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProgressListener, TranscoderPaths } from "../types.js";
import { ensureDir, fileSize, listFiles, removeIfExists } from "../utils/fs.js";
import type { AssetFetcher } from "./fetcher.js";

// ffbinaries release index: { version, bin: { "linux-64": { ffmpeg, ffprobe, ... } } }
const ReleaseIndexSchema = z.object({
  version: z.string(),
  bin: z.record(
    z.string(),
    z.object({
      ffmpeg: z.string().url(),
      ffprobe: z.string().url().optional(),
    })
  ),
});

export type ReleaseIndex = z.infer<typeof ReleaseIndexSchema>;

export type ArchiveExtractor = (archivePath: string, targetDir: string) => Promise<void>;

const extractWithZip: ArchiveExtractor = (archivePath, targetDir) =>
  extractZip(archivePath, { dir: path.resolve(targetDir) });

export function platformKey(platform: NodeJS.Platform, arch: string): string | null {
  switch (platform) {
    case "win32":
      if (arch === "x64") return "windows-64";
      if (arch === "ia32") return "windows-32";
      return null;
    case "darwin":
      // Apple silicon runs the x64 build
      return "osx-64";
    case "linux":
      if (arch === "x64") return "linux-64";
      if (arch === "ia32") return "linux-32";
      if (arch === "arm64") return "linux-arm64";
      if (arch === "arm") return "linux-armhf";
      return null;
    default:
      return null;
  }
}

export function executableName(name: TranscoderExecutable, platform: NodeJS.Platform): string {
  return platform === "win32" ? `${name}.exe` : name;
}

export interface TranscoderProvisionerOptions {
  workDir: string;
  releasesUrl: string;
  fetcher: AssetFetcher;
  logger: Logger;
  extract?: ArchiveExtractor;
  platform?: NodeJS.Platform;
  arch?: string;
  progressIntervalMs?: number;
  onProgress?: ProgressListener;
}

/**
 * Keeps an ffmpeg distribution in `<workDir>/ffmpeg`. Any file in that
 * directory counts as a valid install; nothing is re-verified.
 */
export class TranscoderProvisioner {
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly arch: string;
  private readonly extract: ArchiveExtractor;

  constructor(private readonly opts: TranscoderProvisionerOptions) {
    this.logger = opts.logger.child({ component: "transcoder" });
    this.platform = opts.platform ?? process.platform;
    this.arch = opts.arch ?? process.arch;
    this.extract = opts.extract ?? extractWithZip;
  }

  get directory(): string {
    return path.join(this.opts.workDir, TRANSCODER_DIR_NAME);
  }

  async ensureTranscoderAvailable(signal?: AbortSignal): Promise<TranscoderPaths> {
    const dir = this.directory;
    await ensureDir(dir);

    this.logger.info("Checking FFmpeg...");
    const files = await listFiles(dir);
    if (files.length === 0) {
      this.logger.info("FFmpeg not found - downloading...");
      try {
        await this.install(dir, signal);
      } catch (err) {
        if (signal?.aborted) throw new CancelledError("FFmpeg download cancelled");
        if (err instanceof ProvisioningError) throw err;
        throw new ProvisioningError("ffmpeg", `Failed to provision FFmpeg: ${errorMessage(err)}`, { cause: err });
      }
      this.logger.info({ dir }, "FFmpeg downloaded");
    }

    return this.resolvePaths(dir);
  }

  private async install(dir: string, signal?: AbortSignal): Promise<void> {
    const key = platformKey(this.platform, this.arch);
    if (!key) {
      throw new ProvisioningError("ffmpeg", `No FFmpeg build available for ${this.platform}-${this.arch}`);
    }

    const index = ReleaseIndexSchema.parse(await this.opts.fetcher.getJson(this.opts.releasesUrl, signal));
    const build = index.bin[key];
    if (!build) {
      throw new ProvisioningError("ffmpeg", `FFmpeg ${index.version} has no build for ${key}`);
    }

    for (const name of TRANSCODER_EXECUTABLES) {
      const url = build[name];
      if (!url) continue;

      // Archives stay outside the ffmpeg directory so a failed run leaves it empty
      const archivePath = path.join(this.opts.workDir, `${name}-${index.version}-${key}.zip`);
      try {
        this.logger.info({ url }, `Downloading ${name} ${index.version}`);
        await this.opts.fetcher.download(url, archivePath, {
          asset: name,
          signal,
          onProgress: this.opts.onProgress,
          progressIntervalMs: this.opts.progressIntervalMs,
        });
        await this.extract(archivePath, dir);
      } finally {
        await removeIfExists(archivePath);
      }
    }

    if (this.platform !== "win32") {
      for (const name of TRANSCODER_EXECUTABLES) {
        const executable = path.join(dir, executableName(name, this.platform));
        if ((await fileSize(executable)) !== null) {
          await fs.chmod(executable, 0o755);
        }
      }
    }
  }

  private async resolvePaths(dir: string): Promise<TranscoderPaths> {
    const ffmpeg = path.join(dir, executableName("ffmpeg", this.platform));
    const ffprobe = path.join(dir, executableName("ffprobe", this.platform));
    if ((await fileSize(ffmpeg)) === null) {
      throw new ProvisioningError("ffmpeg", `FFmpeg executable missing from ${dir}`);
    }
    return { ffmpeg, ffprobe: (await fileSize(ffprobe)) !== null ? ffprobe : null };
  }
}
