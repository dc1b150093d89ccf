import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { modelFileName, modelManifestFileName, type ModelVariant } from "../constants.js";
import { CancelledError, ProvisioningError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProgressListener } from "../types.js";
import { ensureDir, fileSize, isNotFound, removeIfExists } from "../utils/fs.js";
import type { AssetFetcher } from "./fetcher.js";

export type AssetState = "UNCHECKED" | "DOWNLOADING" | "READY";

export interface CachedAsset {
  id: string;
  path: string;
  expectedSize: number | null;
  exists: boolean;
  state: AssetState;
  downloaded: boolean;
}

const ManifestSchema = z.object({
  variant: z.string(),
  url: z.string(),
  size: z.number().int().nonnegative(),
  verifiedAt: z.string(),
});

export type ModelManifest = z.infer<typeof ManifestSchema>;

export interface ModelProvisionerOptions {
  workDir: string;
  baseUrl: string;
  fetcher: AssetFetcher;
  logger: Logger;
  verifyRemote?: boolean;
  progressIntervalMs?: number;
  onProgress?: ProgressListener;
}

export function modelUrl(baseUrl: string, variant: ModelVariant): string {
  return `${baseUrl.replace(/\/+$/, "")}/${modelFileName(variant)}`;
}

/**
 * Keeps the ggml model in the working cache. A file is trusted without
 * network access only when a manifest from a completed download matches
 * its size; otherwise the remote size is probed and a mismatching file is
 * replaced.
 */
export class ModelProvisioner {
  private readonly logger: Logger;

  constructor(private readonly opts: ModelProvisionerOptions) {
    this.logger = opts.logger.child({ component: "model" });
  }

  async ensureModelAvailable(variant: ModelVariant, signal?: AbortSignal): Promise<CachedAsset> {
    const filePath = path.join(this.opts.workDir, modelFileName(variant));
    const manifestPath = path.join(this.opts.workDir, modelManifestFileName(variant));
    const url = modelUrl(this.opts.baseUrl, variant);
    const asset: CachedAsset = {
      id: variant,
      path: filePath,
      expectedSize: null,
      exists: false,
      state: "UNCHECKED",
      downloaded: false,
    };

    await ensureDir(this.opts.workDir);
    let localSize = await fileSize(filePath);

    if (localSize !== null && !this.opts.verifyRemote) {
      const manifest = await this.readManifest(manifestPath);
      if (manifest && manifest.variant === variant && manifest.size === localSize) {
        this.logger.info({ path: filePath }, "Model already exists");
        return { ...asset, expectedSize: manifest.size, exists: true, state: "READY" };
      }
    }

    const expectedSize = await this.guard(variant, signal, () => this.opts.fetcher.probeSize(url, signal));
    asset.expectedSize = expectedSize;

    if (localSize !== null && expectedSize !== null && localSize !== expectedSize) {
      this.logger.info({ path: filePath, localSize, expectedSize }, "Model size mismatch - deleting model");
      await removeIfExists(filePath);
      await removeIfExists(manifestPath);
      localSize = null;
    }

    if (localSize === null) {
      asset.state = "DOWNLOADING";
      this.logger.info({ variant, url }, "Downloading model");
      const written = await this.guard(variant, signal, () =>
        this.opts.fetcher.download(url, filePath, {
          asset: `model ${variant}`,
          signal,
          expectedBytes: expectedSize,
          onProgress: this.opts.onProgress,
          progressIntervalMs: this.opts.progressIntervalMs,
        })
      );
      if (expectedSize !== null && written !== expectedSize) {
        throw new ProvisioningError(
          variant,
          `Model download incomplete: wrote ${written} of ${expectedSize} bytes to ${filePath}`
        );
      }
      localSize = written;
      asset.downloaded = true;
      this.logger.info({ path: filePath }, "Model downloaded");
    } else {
      this.logger.info({ path: filePath }, "Model already exists");
    }

    await this.writeManifest(manifestPath, {
      variant,
      url,
      size: expectedSize ?? localSize,
      verifiedAt: new Date().toISOString(),
    });

    return { ...asset, exists: true, state: "READY" };
  }

  private async guard<T>(variant: ModelVariant, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError(`Model ${variant} download cancelled`);
      }
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError(variant, `Failed to provision model ${variant}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async readManifest(manifestPath: string): Promise<ModelManifest | null> {
    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    try {
      const parsed = ManifestSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.warn({ path: manifestPath }, "Ignoring malformed model manifest");
    } catch (err) {
      this.logger.warn({ path: manifestPath, err }, "Ignoring unreadable model manifest");
    }
    return null;
  }

  private async writeManifest(manifestPath: string, manifest: ModelManifest): Promise<void> {
    await fs.writeFile(manifestPath, JSON.stringify(manifest, null, 2), "utf-8");
  }
}
