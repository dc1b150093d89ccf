import { setTimeout as sleep } from "node:timers/promises";
import type { DownloadProgress, ProgressListener } from "../types.js";
import { fileSize } from "../utils/fs.js";

export interface ProgressSamplerOptions {
  asset: string;
  filePath: string;
  totalBytes: number;
  intervalMs: number;
  signal: AbortSignal;
}

export function roundFraction(downloadedBytes: number, totalBytes: number): number {
  if (totalBytes <= 0) return 0;
  return Math.round((downloadedBytes / totalBytes) * 10000) / 10000;
}

/**
 * Periodically samples the size of a file being written and yields an event
 * whenever the rounded fraction changes. Ends quietly once the signal aborts.
 */
export async function* sampleProgress(opts: ProgressSamplerOptions): AsyncGenerator<DownloadProgress, void, undefined> {
  let previous = 0;

  while (!opts.signal.aborted) {
    const downloadedBytes = (await fileSize(opts.filePath)) ?? 0;
    const fraction = roundFraction(downloadedBytes, opts.totalBytes);
    if (fraction !== previous) {
      previous = fraction;
      yield { asset: opts.asset, downloadedBytes, totalBytes: opts.totalBytes, fraction };
    }

    try {
      await sleep(opts.intervalMs, undefined, { signal: opts.signal });
    } catch (err) {
      if (opts.signal.aborted) return;
      throw err;
    }
  }
}

/**
 * Feeds sampled progress to a listener. A throwing listener never ends the
 * sampling; its error goes to `onListenerError`.
 */
export async function reportProgress(
  opts: ProgressSamplerOptions,
  listener: ProgressListener,
  onListenerError: (err: unknown) => void = () => undefined
): Promise<void> {
  for await (const progress of sampleProgress(opts)) {
    try {
      listener(progress);
    } catch (err) {
      onListenerError(err);
    }
  }
}
