// ─── Model lifecycle types ────────────────────────────────────────────────────
export type {
  ModelTier,
  ModelLoadState,
  TierProfile,
  ModelStatusDetail,
} from "./types.js";

export {
  modelTierSchema,
  modelLoadStateSchema,
  modelStatusDetailSchema,
} from "./schemas.js";
export type {
  ModelTierFromSchema,
  ModelLoadStateFromSchema,
  ModelStatusDetailFromSchema,
} from "./schemas.js";

// ─── Transcription types ──────────────────────────────────────────────────────
export type { Segment, TranscriptionResult } from "./types.js";

export {
  segmentSchema,
  transcriptionResultSchema,
  rawSegmentSchema,
  rawTranscriptionSchema,
} from "./schemas.js";
export type {
  SegmentFromSchema,
  TranscriptionResultFromSchema,
  RawTranscriptionFromSchema,
} from "./schemas.js";

// ─── HTTP response types ──────────────────────────────────────────────────────
export type {
  HealthResponse,
  EndpointDescription,
  ServiceStatusResponse,
  ModelsResponse,
  ErrorCode,
  ErrorResponse,
} from "./types.js";

export {
  healthResponseSchema,
  endpointDescriptionSchema,
  serviceStatusResponseSchema,
  modelsResponseSchema,
  errorResponseSchema,
} from "./schemas.js";
export type {
  HealthResponseFromSchema,
  ServiceStatusResponseFromSchema,
  ModelsResponseFromSchema,
  ErrorResponseFromSchema,
} from "./schemas.js";

// ─── State machine ────────────────────────────────────────────────────────────
export { canTransition, needsLoad, VALID_TRANSITIONS } from "./stateMachine.js";

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  MODEL_TIERS,
  SUPPORTED_AUDIO_EXTENSIONS,
  DEFAULT_TIER_PROFILES,
  LOAD_MAX_ATTEMPTS_DEFAULT,
  LOAD_BASE_DELAY_MS_DEFAULT,
  MODEL_SAMPLE_RATE,
} from "./constants.js";
