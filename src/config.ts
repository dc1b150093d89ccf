import "dotenv/config";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_MODEL_VARIANT, MODEL_VARIANTS, type ModelVariant } from "./constants.js";
import { ConfigError } from "./errors.js";

export interface ServiceConfig {
  workDir: string; // hidden cache for assets and transient audio
  modelVariant: ModelVariant;
  modelBaseUrl: string; // e.g., https://huggingface.co/ggerganov/whisper.cpp/resolve/main
  modelVerifyRemote: boolean; // probe remote size even when the manifest matches
  ffmpegReleasesUrl: string;
  ffmpegCmd: string | null; // skips transcoder provisioning when set
  whisperCmd: string;
  whisperThreads: number;
  keepTempFiles: boolean;
  progressIntervalMs: number;
  logLevel: string;
  logPretty: boolean;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  WORK_DIR: z.string().min(1).default(".subtitle-cache"),
  MODEL_VARIANT: z.enum(MODEL_VARIANTS).default(DEFAULT_MODEL_VARIANT),
  MODEL_BASE_URL: z
    .string()
    .url()
    .default("https://huggingface.co/ggerganov/whisper.cpp/resolve/main"),
  MODEL_VERIFY_REMOTE: booleanFlag.default("false"),
  FFMPEG_RELEASES_URL: z
    .string()
    .url()
    .default("https://ffbinaries.com/api/v1/version/latest"),
  FFMPEG_CMD: z.string().min(1).optional(),
  WHISPER_CMD: z.string().min(1).default("whisper-cli"),
  WHISPER_THREADS: z.coerce.number().int().min(1).max(64).default(4),
  KEEP_TEMP_FILES: booleanFlag.default("false"),
  PROGRESS_INTERVAL_MS: z.coerce.number().int().min(50).default(1000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag.default("false"),
});

export const rootDir = path.resolve(process.cwd());

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = rootDir
): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    workDir: path.resolve(cwd, e.WORK_DIR),
    modelVariant: e.MODEL_VARIANT,
    modelBaseUrl: e.MODEL_BASE_URL.replace(/\/+$/, ""),
    modelVerifyRemote: e.MODEL_VERIFY_REMOTE,
    ffmpegReleasesUrl: e.FFMPEG_RELEASES_URL,
    ffmpegCmd: e.FFMPEG_CMD ?? null,
    whisperCmd: e.WHISPER_CMD,
    whisperThreads: e.WHISPER_THREADS,
    keepTempFiles: e.KEEP_TEMP_FILES,
    progressIntervalMs: e.PROGRESS_INTERVAL_MS,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
  };
}
