import type { ErrorCode, ModelTier } from "@tierscribe/shared";

/**
 * Base class for errors the HTTP layer knows how to map. `status` is the HTTP
 * status the error is reported with.
 */
export abstract class ServiceError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: 400 | 413 | 500;
}

export class InvalidTierError extends ServiceError {
  readonly code = "invalid_tier";
  readonly status = 400;

  constructor(
    readonly tier: string,
    supported: ReadonlyArray<string>,
  ) {
    super(`Invalid model tier "${tier}". Supported tiers: ${supported.join(", ")}`);
    this.name = "InvalidTierError";
  }
}

export class MissingFileError extends ServiceError {
  readonly code = "missing_file";
  readonly status = 400;

  constructor() {
    super("No file provided");
    this.name = "MissingFileError";
  }
}

export class UnsupportedFormatError extends ServiceError {
  readonly code = "unsupported_format";
  readonly status = 400;

  constructor(
    readonly filename: string,
    supported: ReadonlyArray<string>,
  ) {
    super(`File type not supported. Allowed types: ${supported.join(", ")}`);
    this.name = "UnsupportedFormatError";
  }
}

export class EmptyAudioError extends ServiceError {
  readonly code = "empty_audio";
  readonly status = 400;

  constructor() {
    super("Uploaded audio file is empty");
    this.name = "EmptyAudioError";
  }
}

export class PayloadTooLargeError extends ServiceError {
  readonly code = "payload_too_large";
  readonly status = 413;

  constructor(readonly limitBytes: number) {
    super(`Request body exceeds the limit of ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/** The request body could not be parsed as multipart/form-data. */
export class MalformedUploadError extends ServiceError {
  readonly code = "malformed_upload";
  readonly status = 400;

  constructor(cause: unknown) {
    super(`Malformed multipart upload: ${describeCause(cause)}`, { cause });
    this.name = "MalformedUploadError";
  }
}

/** Acquiring or instantiating a tier's model failed after every retry. */
export class ModelLoadError extends ServiceError {
  readonly code = "model_load_failed";
  readonly status = 500;

  constructor(
    readonly tier: ModelTier,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Failed to load ${tier} model after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = "ModelLoadError";
  }
}

/** Inference failed on an already loaded model (bad audio, decoder crash, OOM...). */
export class TranscriptionError extends ServiceError {
  readonly code = "transcription_failed";
  readonly status = 500;

  constructor(cause: unknown) {
    super(`Transcription failed: ${describeCause(cause)}`, { cause });
    this.name = "TranscriptionError";
  }
}

export class AttemptTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/** Thrown by loadWithRetry once every attempt has failed. */
export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastCause: unknown,
  ) {
    super(`Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeCause(lastCause)}`, {
      cause: lastCause,
    });
    this.name = "RetryExhaustedError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
