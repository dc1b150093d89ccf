/**
 * Centralized model and transcoder constants.
 * Model names follow the ggml files published for whisper.cpp.
 */

export const DEFAULT_MODEL_VARIANT = "large-v3";

// Valid ggml model variants
export const MODEL_VARIANTS = [
  // Multilingual models
  "tiny",
  "base",
  "small",
  "medium",
  "large-v1",
  "large-v2",
  "large-v3",
  "large-v3-turbo",

  // English-only models
  "tiny.en",
  "base.en",
  "small.en",
  "medium.en",

  // Quantized models
  "tiny-q5_1",
  "base-q5_1",
  "small-q5_1",
  "small.en-q5_1",
  "medium-q5_0",
  "large-v2-q5_0",
  "large-v3-q5_0",
  "large-v3-turbo-q5_0",
  "large-v3-turbo-q8_0",
] as const;

export type ModelVariant = (typeof MODEL_VARIANTS)[number];

export function modelFileName(variant: ModelVariant): string {
  return `ggml-${variant}.bin`;
}

// Sidecar written after a completed download
export function modelManifestFileName(variant: ModelVariant): string {
  return `${modelFileName(variant)}.json`;
}

// whisper.cpp only accepts 16kHz input
export const TARGET_SAMPLE_RATE = 16000;
export const RECOGNITION_LANGUAGE = "auto";

export const TRANSCODER_DIR_NAME = "ffmpeg";
export const TRANSCODER_EXECUTABLES = ["ffmpeg", "ffprobe"] as const;
export type TranscoderExecutable = (typeof TRANSCODER_EXECUTABLES)[number];

export const SUBTITLE_EXTENSION = ".srt";
