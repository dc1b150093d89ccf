#!/usr/bin/env node
import path from "node:path";
import { createSubtitleGenerator } from "./app.js";
import { loadConfig, type ServiceConfig } from "./config.js";
import { CancelledError, ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { DownloadProgress } from "./types.js";

const USAGE = "Usage: subtitle-forge <media-file>";

function formatProgress(progress: DownloadProgress): string {
  return `Downloading ${progress.asset}: ${(progress.fraction * 100).toFixed(2)}%`;
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const inputPath = argv[0];
  if (!inputPath) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  let cfg: ServiceConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      return 2;
    }
    throw err;
  }

  const logger = createLogger({ level: cfg.logLevel, pretty: cfg.logPretty });
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Cancelling...");
    controller.abort();
  };
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  const generator = createSubtitleGenerator(cfg, logger, {
    onProgress: (progress) => logger.info(formatProgress(progress)),
  });

  try {
    const result = await generator.generateSubtitles(path.resolve(inputPath), controller.signal);
    logger.info({ path: result.path, segments: result.segmentCount, bytes: result.size }, "Subtitle file written");
    return 0;
  } catch (err) {
    if (err instanceof CancelledError) {
      logger.warn({ segments: err.segments.length }, err.message);
      return 130;
    }
    logger.error({ err }, "Subtitle generation failed");
    return 1;
  } finally {
    process.removeListener("SIGINT", cancel);
    process.removeListener("SIGTERM", cancel);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
);
