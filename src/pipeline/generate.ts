import fs from "node:fs/promises";
import type { CachedAsset } from "../assets/model.js";
import { RECOGNITION_LANGUAGE, TARGET_SAMPLE_RATE, type ModelVariant } from "../constants.js";
import { CancelledError } from "../errors.js";
import type { Logger } from "../logger.js";
import { formatSrt, subtitlePathFor } from "../subtitles/srt.js";
import type { AudioSegment, Recognizer, SubtitleFile, Transcoder, TranscoderPaths } from "../types.js";
import { ensureDir, hideDirectory } from "../utils/fs.js";
import { collectSegments } from "./recognize.js";

export interface TranscoderAssets {
  ensureTranscoderAvailable(signal?: AbortSignal): Promise<TranscoderPaths>;
}

export interface ModelAssets {
  ensureModelAvailable(variant: ModelVariant, signal?: AbortSignal): Promise<CachedAsset>;
}

export interface SubtitleGeneratorDeps {
  workDir: string;
  modelVariant: ModelVariant;
  logger: Logger;
  transcoderAssets: TranscoderAssets;
  modelAssets: ModelAssets;
  createTranscoder: (paths: TranscoderPaths) => Transcoder;
  createRecognizer: (model: CachedAsset) => Recognizer;
  onSegment?: (segment: AudioSegment, index: number) => void;
}

export class SubtitleGenerator {
  private readonly logger: Logger;

  constructor(private readonly deps: SubtitleGeneratorDeps) {
    this.logger = deps.logger;
  }

  /**
   * Provisions assets, converts, recognizes and writes `<input>.srt` beside
   * the input. A cancelled run never writes the subtitle file.
   */
  async generateSubtitles(inputPath: string, signal?: AbortSignal): Promise<SubtitleFile> {
    await ensureDir(this.deps.workDir);
    await hideDirectory(this.deps.workDir);

    this.logger.info("Checking libraries...");
    const transcoderPaths = await this.deps.transcoderAssets.ensureTranscoderAvailable(signal);
    const model = await this.deps.modelAssets.ensureModelAvailable(this.deps.modelVariant, signal);
    throwIfCancelled(signal);

    this.logger.info("Generating subtitles...");
    this.logger.info({ inputPath }, "Converting media to wave...");
    const transcoder = this.deps.createTranscoder(transcoderPaths);
    const audio = await transcoder.decode(inputPath, { sampleRate: TARGET_SAMPLE_RATE, signal });
    throwIfCancelled(signal);

    this.logger.info("Recognizing speech...");
    const recognizer = this.deps.createRecognizer(model);
    const segments = await collectSegments(recognizer, audio, {
      language: RECOGNITION_LANGUAGE,
      signal,
      onSegment: (segment, index) => {
        this.logger.info({ index, text: segment.text }, "Recognized speech");
        this.deps.onSegment?.(segment, index);
      },
    });

    this.logger.info("Generating subtitle...");
    const subtitles = formatSrt(segments);
    const subtitlePath = subtitlePathFor(inputPath);
    throwIfCancelled(signal, segments);
    await fs.writeFile(subtitlePath, subtitles, "utf-8");
    const stat = await fs.stat(subtitlePath);

    return { path: subtitlePath, size: stat.size, segmentCount: segments.length };
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, segments: readonly AudioSegment[] = []): void {
  if (signal?.aborted) {
    throw new CancelledError("Subtitle generation cancelled", segments);
  }
}
