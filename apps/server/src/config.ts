import os from "node:os";
import path from "node:path";
import {
  DEFAULT_TIER_PROFILES,
  LOAD_BASE_DELAY_MS_DEFAULT,
  LOAD_MAX_ATTEMPTS_DEFAULT,
  MODEL_TIERS,
  modelTierSchema,
} from "@tierscribe/shared";
import type { ModelTier } from "@tierscribe/shared";

type Env = Readonly<Record<string, string | undefined>>;

export interface ServerConfig {
  port: number;
  modelsDir: string;
  modelBaseUrl: string;
  whisperCppBin: string;
  whisperThreads: number;
  whisperLanguage: string;
  ffmpegBin: string;
  modelIds: Record<ModelTier, string>;
  loadMaxAttempts: number;
  loadBaseDelayMs: number;
  loadMaxDelayMs?: number;
  loadAttemptTimeoutMs: number;
  inferenceTimeoutMs: number;
  maxUploadBytes: number;
  preloadTiers: ModelTier[];
}

function expandHome(raw: string): string {
  return raw.startsWith("~") ? raw.replace("~", os.homedir()) : raw;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readPreloadTiers(env: Env): ModelTier[] {
  const raw = env["PRELOAD_TIERS"]?.trim();
  if (!raw) {
    return [];
  }
  return raw.split(",").map((entry) => {
    const parsed = modelTierSchema.safeParse(entry.trim().toLowerCase());
    if (!parsed.success) {
      throw new Error(
        `PRELOAD_TIERS contains unknown tier "${entry.trim()}". Supported tiers: ${MODEL_TIERS.join(", ")}`,
      );
    }
    return parsed.data;
  });
}

/**
 * Reads the server configuration from environment variables. Every variable
 * is optional; invalid values throw so the process fails at startup.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const loadMaxDelayMs = env["LOAD_MAX_DELAY_MS"]
    ? readInt(env, "LOAD_MAX_DELAY_MS", 0, 0)
    : undefined;

  return {
    port: readInt(env, "PORT", 8000, 1),
    modelsDir: path.resolve(expandHome(env["MODELS_DIR"] ?? "~/.cache/tierscribe/models")),
    modelBaseUrl:
      env["MODEL_BASE_URL"] ?? "https://huggingface.co/ggerganov/whisper.cpp/resolve/main",
    whisperCppBin: env["WHISPER_CPP_BIN"] ?? "whisper-cli",
    whisperThreads: readInt(env, "WHISPER_THREADS", 0, 0),
    whisperLanguage: env["WHISPER_LANGUAGE"] ?? "auto",
    ffmpegBin: env["FFMPEG_BIN"] ?? "ffmpeg",
    modelIds: {
      fast: env["FAST_MODEL"] ?? DEFAULT_TIER_PROFILES.fast.modelId,
      accurate: env["ACCURATE_MODEL"] ?? DEFAULT_TIER_PROFILES.accurate.modelId,
    },
    loadMaxAttempts: readInt(env, "LOAD_MAX_ATTEMPTS", LOAD_MAX_ATTEMPTS_DEFAULT, 1),
    loadBaseDelayMs: readInt(env, "LOAD_BASE_DELAY_MS", LOAD_BASE_DELAY_MS_DEFAULT, 0),
    loadMaxDelayMs,
    loadAttemptTimeoutMs: readInt(env, "LOAD_ATTEMPT_TIMEOUT_MS", 0, 0),
    inferenceTimeoutMs: readInt(env, "INFERENCE_TIMEOUT_MS", 0, 0),
    maxUploadBytes: readInt(env, "MAX_UPLOAD_BYTES", 200 * 1024 * 1024, 1),
    preloadTiers: readPreloadTiers(env),
  };
}
