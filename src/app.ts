import { HttpAssetFetcher } from "./assets/fetcher.js";
import { ModelProvisioner } from "./assets/model.js";
import { TranscoderProvisioner } from "./assets/transcoder.js";
import type { ServiceConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { SubtitleGenerator, type TranscoderAssets } from "./pipeline/generate.js";
import { WhisperCppRecognizer } from "./pipeline/recognize.js";
import { FfmpegTranscoder } from "./pipeline/transcode.js";
import type { ProgressListener } from "./types.js";

export interface AppOptions {
  onProgress?: ProgressListener;
}

/**
 * Wires the ffmpeg and whisper.cpp adapters into a SubtitleGenerator.
 */
export function createSubtitleGenerator(cfg: ServiceConfig, logger: Logger, options: AppOptions = {}): SubtitleGenerator {
  const fetcher = new HttpAssetFetcher({ logger });

  const ffmpegCmd = cfg.ffmpegCmd;
  const transcoderAssets: TranscoderAssets = ffmpegCmd
    ? { ensureTranscoderAvailable: async () => ({ ffmpeg: ffmpegCmd, ffprobe: null }) }
    : new TranscoderProvisioner({
        workDir: cfg.workDir,
        releasesUrl: cfg.ffmpegReleasesUrl,
        fetcher,
        logger,
        progressIntervalMs: cfg.progressIntervalMs,
        onProgress: options.onProgress,
      });

  const modelAssets = new ModelProvisioner({
    workDir: cfg.workDir,
    baseUrl: cfg.modelBaseUrl,
    fetcher,
    logger,
    verifyRemote: cfg.modelVerifyRemote,
    progressIntervalMs: cfg.progressIntervalMs,
    onProgress: options.onProgress,
  });

  return new SubtitleGenerator({
    workDir: cfg.workDir,
    modelVariant: cfg.modelVariant,
    logger,
    transcoderAssets,
    modelAssets,
    createTranscoder: (paths) =>
      new FfmpegTranscoder({
        ffmpegPath: paths.ffmpeg,
        workDir: cfg.workDir,
        keepTempFiles: cfg.keepTempFiles,
        logger,
      }),
    createRecognizer: (model) =>
      new WhisperCppRecognizer({
        whisperCmd: cfg.whisperCmd,
        modelPath: model.path,
        workDir: cfg.workDir,
        threads: cfg.whisperThreads,
        keepTempFiles: cfg.keepTempFiles,
        logger,
      }),
  });
}
