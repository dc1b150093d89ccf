import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { CancelledError, RecognitionError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AudioSegment, Recognizer, TranscribeOptions } from "../types.js";
import { removeIfExists } from "../utils/fs.js";
import { streamCommandLines, type CommandOptions } from "../utils/process.js";

export type LineStreamer = (command: string, args: string[], options?: CommandOptions) => AsyncIterable<string>;

// whisper.cpp prints "[00:00:00.000 --> 00:00:01.500]  text"
const SEGMENT_LINE = /^\[(\d{2,}):(\d{2}):(\d{2})\.(\d{3}) --> (\d{2,}):(\d{2}):(\d{2})\.(\d{3})\](?: {2}(.*))?$/;

function toMs(h: string, m: string, s: string, ms: string): number {
  return Number(h) * 3600000 + Number(m) * 60000 + Number(s) * 1000 + Number(ms);
}

export function parseSegmentLine(line: string): AudioSegment | null {
  const match = SEGMENT_LINE.exec(line);
  if (!match) return null;
  const [, h1, m1, s1, ms1, h2, m2, s2, ms2, text] = match;
  return {
    startMs: toMs(h1, m1, s1, ms1),
    endMs: toMs(h2, m2, s2, ms2),
    text: text ?? "",
  };
}

export interface WhisperCppRecognizerOptions {
  whisperCmd: string;
  modelPath: string;
  workDir: string;
  threads: number;
  keepTempFiles: boolean;
  logger: Logger;
  stream?: LineStreamer;
}

/**
 * Runs the whisper.cpp CLI against a temporary WAV and yields segments as
 * they are printed.
 */
export class WhisperCppRecognizer implements Recognizer {
  private readonly stream: LineStreamer;
  private readonly logger: Logger;

  constructor(private readonly opts: WhisperCppRecognizerOptions) {
    this.stream = opts.stream ?? streamCommandLines;
    this.logger = opts.logger.child({ component: "whisper" });
  }

  async *transcribe(audio: Buffer, { language, signal }: TranscribeOptions): AsyncGenerator<AudioSegment, void, undefined> {
    const wavPath = path.join(this.opts.workDir, `recognize-${randomUUID()}.wav`);
    await fs.writeFile(wavPath, audio);

    const args = [
      "-m", this.opts.modelPath,
      "-f", wavPath,
      "-l", language,
      "-t", String(this.opts.threads),
    ];
    this.logger.debug({ cmd: this.opts.whisperCmd, args }, "Starting whisper.cpp");

    try {
      for await (const line of this.stream(this.opts.whisperCmd, args, { signal })) {
        const segment = parseSegmentLine(line);
        if (segment) yield segment;
      }
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new RecognitionError(errorMessage(err), { cause: err });
    } finally {
      if (!this.opts.keepTempFiles) {
        await removeIfExists(wavPath);
      }
    }
  }
}

export interface CollectOptions {
  language: string;
  signal?: AbortSignal;
  onSegment?: (segment: AudioSegment, index: number) => void;
}

/**
 * Drains the recognizer into an ordered list. On abort, stops consuming and
 * throws CancelledError carrying the segments gathered so far.
 */
export async function collectSegments(
  recognizer: Recognizer,
  audio: Buffer,
  { language, signal, onSegment }: CollectOptions
): Promise<AudioSegment[]> {
  const segments: AudioSegment[] = [];

  try {
    for await (const segment of recognizer.transcribe(audio, { language, signal })) {
      if (signal?.aborted) break;
      segments.push(segment);
      onSegment?.(segment, segments.length);
    }
  } catch (err) {
    if (signal?.aborted) throw new CancelledError("Recognition cancelled", segments);
    throw err;
  }

  if (signal?.aborted) {
    throw new CancelledError("Recognition cancelled", segments);
  }
  return segments;
}
