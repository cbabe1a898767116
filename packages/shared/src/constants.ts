import type { ModelTier, TierProfile } from "./types.js";

/** Model tiers exposed by the API, in the order they are listed. */
export const MODEL_TIERS = ["fast", "accurate"] as const;

/** Upload extensions accepted by POST /transcribe/:tier (lowercase, with dot). */
export const SUPPORTED_AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a"] as const;

/**
 * Default resource profile per tier. The model id can be overridden through
 * configuration; size and latency are indicative only.
 */
export const DEFAULT_TIER_PROFILES: Readonly<Record<ModelTier, TierProfile>> = {
  fast: {
    tier: "fast",
    modelId: "base",
    approxSizeMb: 142,
    expectedLoadSeconds: 2,
    description: "Quick transcription using the base model (~142MB)",
  },
  accurate: {
    tier: "accurate",
    modelId: "large-v3",
    approxSizeMb: 2900,
    expectedLoadSeconds: 30,
    description: "High-accuracy transcription using the large model (~2.9GB)",
  },
};

/** Retry defaults for model acquisition: waits of 1s then 2s before giving up. */
export const LOAD_MAX_ATTEMPTS_DEFAULT = 3;
export const LOAD_BASE_DELAY_MS_DEFAULT = 1000;

/** Sample rate whisper models expect for decoded input. */
export const MODEL_SAMPLE_RATE = 16_000;
