import type { AudioSegment } from "./types.js";

/**
 * Base error for every failure the pipeline reports.
 */
export class SubtitleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubtitleError";
  }
}

export class ConfigError extends SubtitleError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Network or filesystem failure while fetching the transcoder or the model.
 */
export class ProvisioningError extends SubtitleError {
  constructor(
    public readonly asset: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProvisioningError";
  }
}

export class TranscodeError extends SubtitleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranscodeError";
  }
}

export class RecognitionError extends SubtitleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecognitionError";
  }
}

/**
 * Raised when the run is aborted. Carries whatever segments were
 * recognized before the signal fired.
 */
export class CancelledError extends SubtitleError {
  constructor(
    message: string = "Operation cancelled",
    public readonly segments: readonly AudioSegment[] = []
  ) {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
