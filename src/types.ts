export interface AudioSegment {
  startMs: number;
  endMs: number;
  text: string;
}

export interface SubtitleFile {
  path: string;
  size: number;
  segmentCount: number;
}

export interface DownloadProgress {
  asset: string;
  downloadedBytes: number;
  totalBytes: number;
  fraction: number; // 0..1, rounded to 4 decimals
}

export type ProgressListener = (progress: DownloadProgress) => void;

export interface DecodeOptions {
  sampleRate: number;
  signal?: AbortSignal;
}

/**
 * Decodes any media file into single-channel PCM WAV audio.
 */
export interface Transcoder {
  decode(sourcePath: string, opts: DecodeOptions): Promise<Buffer>;
}

export interface TranscribeOptions {
  language: string; // "auto" for detection
  signal?: AbortSignal;
}

/**
 * Turns decoded audio into timestamped segments, produced lazily.
 */
export interface Recognizer {
  transcribe(audio: Buffer, opts: TranscribeOptions): AsyncIterable<AudioSegment>;
}

export interface TranscoderPaths {
  ffmpeg: string;
  ffprobe: string | null;
}
