import type { ModelTier, RawTranscriptionFromSchema } from "@tierscribe/shared";
import type { DecodedAudio } from "../audio/types.js";

/** Raw model output, before normalization. Shape is checked with rawTranscriptionSchema. */
export type RawTranscription = RawTranscriptionFromSchema;

/** A loaded inference model. Shared by concurrent requests once loaded. */
export interface TranscriptionModel {
  readonly tier: ModelTier;
  readonly modelId: string;
  transcribe(audio: DecodedAudio, signal: AbortSignal): Promise<unknown>;
}

/**
 * Acquires (downloads if needed) and instantiates the model for a tier.
 * One call is one load attempt; retries are the registry's concern.
 */
export interface ModelLoader {
  load(tier: ModelTier, signal: AbortSignal): Promise<TranscriptionModel>;
}
