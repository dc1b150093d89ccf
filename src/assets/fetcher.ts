import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { request, type Dispatcher } from "undici";
import { silentLogger, type Logger } from "../logger.js";
import type { ProgressListener } from "../types.js";
import { fileSize } from "../utils/fs.js";
import { reportProgress } from "./progress.js";

export interface DownloadOptions {
  asset: string;
  signal?: AbortSignal;
  // Used for progress when the response carries no content-length
  expectedBytes?: number | null;
  onProgress?: ProgressListener;
  progressIntervalMs?: number;
}

/**
 * Network access needed to provision assets.
 */
export interface AssetFetcher {
  probeSize(url: string, signal?: AbortSignal): Promise<number | null>;
  getJson(url: string, signal?: AbortSignal): Promise<unknown>;
  download(url: string, destination: string, opts: DownloadOptions): Promise<number>;
}

export interface HttpAssetFetcherOptions {
  dispatcher?: Dispatcher;
  maxRedirections?: number;
  userAgent?: string;
  logger?: Logger;
}

function parseContentLength(value: string | string[] | undefined): number | null {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined) return null;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

export class HttpAssetFetcher implements AssetFetcher {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly maxRedirections: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(opts: HttpAssetFetcherOptions = {}) {
    this.dispatcher = opts.dispatcher;
    this.maxRedirections = opts.maxRedirections ?? 5;
    this.userAgent = opts.userAgent ?? "subtitle-forge";
    this.logger = (opts.logger ?? silentLogger()).child({ component: "fetcher" });
  }

  private async send(url: string, method: "GET" | "HEAD", signal?: AbortSignal): Promise<Dispatcher.ResponseData> {
    let current = url;
    for (let hop = 0; ; hop++) {
      const response = await request(current, {
        method,
        signal,
        dispatcher: this.dispatcher,
        headers: { "user-agent": this.userAgent },
      });
      const location = response.headers.location;
      const isRedirect = response.statusCode >= 300 && response.statusCode < 400 && location !== undefined;
      if (!isRedirect) return response;

      await response.body.dump();
      if (hop >= this.maxRedirections) {
        throw new Error(`Too many redirects while fetching ${url}`);
      }
      current = new URL(Array.isArray(location) ? location[0] : location, current).toString();
    }
  }

  async probeSize(url: string, signal?: AbortSignal): Promise<number | null> {
    const { statusCode, headers, body } = await this.send(url, "HEAD", signal);
    await body.dump();
    if (statusCode < 200 || statusCode >= 300) {
      throw new Error(`HEAD ${url} failed: ${statusCode}`);
    }
    return parseContentLength(headers["content-length"]);
  }

  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const { statusCode, body } = await this.send(url, "GET", signal);
    if (statusCode < 200 || statusCode >= 300) {
      const text = await body.text();
      throw new Error(`GET ${url} failed: ${statusCode} ${text.slice(0, 200)}`);
    }
    return body.json();
  }

  async download(url: string, destination: string, opts: DownloadOptions): Promise<number> {
    const { statusCode, headers, body } = await this.send(url, "GET", opts.signal);
    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new Error(`GET ${url} failed: ${statusCode}`);
    }

    const totalBytes = parseContentLength(headers["content-length"]) ?? opts.expectedBytes ?? 0;

    // Sampler lives exactly as long as the transfer
    const sampling = new AbortController();
    const stopSampling = () => sampling.abort();
    opts.signal?.addEventListener("abort", stopSampling, { once: true });

    // Progress is advisory: its failures are logged, never raised
    const reporter = (
      opts.onProgress && totalBytes > 0
        ? reportProgress(
            {
              asset: opts.asset,
              filePath: destination,
              totalBytes,
              intervalMs: opts.progressIntervalMs ?? 1000,
              signal: sampling.signal,
            },
            opts.onProgress,
            (err) => this.logger.debug({ err, asset: opts.asset }, "Progress listener failed")
          )
        : Promise.resolve()
    ).catch((err: unknown) => {
      this.logger.debug({ err, asset: opts.asset }, "Progress sampling stopped");
    });

    try {
      await pipeline(body, createWriteStream(destination), { signal: opts.signal });
    } finally {
      sampling.abort();
      opts.signal?.removeEventListener("abort", stopSampling);
      await reporter;
    }

    return (await fileSize(destination)) ?? 0;
  }
}
