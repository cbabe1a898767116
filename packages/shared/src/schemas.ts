import { z } from "zod";
import { MODEL_TIERS } from "./constants.js";

// ─── Model lifecycle schemas ──────────────────────────────────────────────────

export const modelTierSchema = z.enum(MODEL_TIERS);

export type ModelTierFromSchema = z.infer<typeof modelTierSchema>;

export const modelLoadStateSchema = z.enum(["UNLOADED", "LOADING", "LOADED", "FAILED"]);

export type ModelLoadStateFromSchema = z.infer<typeof modelLoadStateSchema>;

const isoDatetimeSchema = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
    "Must be ISO 8601 datetime",
  );

export const modelStatusDetailSchema = z.object({
  tier: modelTierSchema,
  state: modelLoadStateSchema,
  modelId: z.string().min(1),
  loadAttempts: z.number().int().nonnegative(),
  loadedAt: isoDatetimeSchema.nullish(),
  lastLoadDurationMs: z.number().nonnegative().nullish(),
  lastError: z.string().nullish(),
});

export type ModelStatusDetailFromSchema = z.infer<typeof modelStatusDetailSchema>;

// ─── Transcription schemas ────────────────────────────────────────────────────

export const segmentSchema = z
  .object({
    text: z.string(),
    start: z.number().nonnegative(),
    end: z.number().nonnegative(),
  })
  .refine((value) => value.end >= value.start, {
    message: "end must be greater than or equal to start",
    path: ["end"],
  });

export type SegmentFromSchema = z.infer<typeof segmentSchema>;

export const transcriptionResultSchema = z
  .object({
    text: z.string(),
    segments: z.array(segmentSchema),
  })
  .refine((value) => value.segments.length > 0 || value.text.trim() === "", {
    message: "segments may only be empty when text is empty",
    path: ["segments"],
  });

export type TranscriptionResultFromSchema = z.infer<typeof transcriptionResultSchema>;

/**
 * Loose shape accepted from a transcription model before normalization.
 * Extra fields (token ids, log-probs, ...) are tolerated and dropped later.
 */
export const rawSegmentSchema = z
  .object({
    text: z.string(),
    start: z.number().finite(),
    end: z.number().finite(),
  })
  .passthrough();

export const rawTranscriptionSchema = z
  .object({
    text: z.string().optional(),
    language: z.string().optional(),
    segments: z.array(rawSegmentSchema),
  })
  .passthrough();

export type RawTranscriptionFromSchema = z.infer<typeof rawTranscriptionSchema>;

// ─── HTTP response schemas ────────────────────────────────────────────────────

export const healthResponseSchema = z.object({
  status: z.literal("ok"),
});

export type HealthResponseFromSchema = z.infer<typeof healthResponseSchema>;

export const endpointDescriptionSchema = z.object({
  method: z.enum(["GET", "POST"]),
  path: z.string().startsWith("/"),
  description: z.string(),
});

export const serviceStatusResponseSchema = z.object({
  status: z.literal("ok"),
  message: z.string(),
  endpoints: z.array(endpointDescriptionSchema),
  modelStatus: z.record(modelTierSchema, modelLoadStateSchema),
});

export type ServiceStatusResponseFromSchema = z.infer<typeof serviceStatusResponseSchema>;

export const modelsResponseSchema = z.object({
  models: z.array(modelStatusDetailSchema),
});

export type ModelsResponseFromSchema = z.infer<typeof modelsResponseSchema>;

export const errorResponseSchema = z.object({
  error: z.string().min(1),
  code: z.enum([
    "invalid_tier",
    "missing_file",
    "malformed_upload",
    "unsupported_format",
    "empty_audio",
    "payload_too_large",
    "model_load_failed",
    "transcription_failed",
    "internal_error",
  ]),
});

export type ErrorResponseFromSchema = z.infer<typeof errorResponseSchema>;
