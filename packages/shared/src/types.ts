// ─── Model lifecycle types ────────────────────────────────────────────────────

export type ModelTier = "fast" | "accurate";

export type ModelLoadState = "UNLOADED" | "LOADING" | "LOADED" | "FAILED";

/** Static resource profile of a tier. */
export interface TierProfile {
  tier: ModelTier;
  /** Whisper model identifier, e.g. "base" or "large-v3". */
  modelId: string;
  approxSizeMb: number;
  /** Rough cold-load latency once weights are on disk. */
  expectedLoadSeconds: number;
  description: string;
}

export interface ModelStatusDetail {
  tier: ModelTier;
  state: ModelLoadState;
  modelId: string;
  loadAttempts: number;
  loadedAt?: string | null; // ISO 8601
  lastLoadDurationMs?: number | null;
  lastError?: string | null;
}

// ─── Transcription types ──────────────────────────────────────────────────────

export interface Segment {
  text: string;
  start: number; // seconds
  end: number;
}

export interface TranscriptionResult {
  text: string;
  segments: Segment[];
}

// ─── HTTP response types ──────────────────────────────────────────────────────

export interface HealthResponse {
  status: "ok";
}

export interface EndpointDescription {
  method: "GET" | "POST";
  path: string;
  description: string;
}

export interface ServiceStatusResponse {
  status: "ok";
  message: string;
  endpoints: EndpointDescription[];
  modelStatus: Record<ModelTier, ModelLoadState>;
}

export interface ModelsResponse {
  models: ModelStatusDetail[];
}

export type ErrorCode =
  | "invalid_tier"
  | "missing_file"
  | "malformed_upload"
  | "unsupported_format"
  | "empty_audio"
  | "payload_too_large"
  | "model_load_failed"
  | "transcription_failed"
  | "internal_error";

export interface ErrorResponse {
  error: string;
  code: ErrorCode;
}
