import { MODEL_TIERS, modelTierSchema, rawTranscriptionSchema } from "@tierscribe/shared";
import type { ModelTier, TranscriptionResult } from "@tierscribe/shared";
import type { AudioDecoder } from "../audio/types.js";
import type { SupportedAudioExtension } from "../lib/audio-format.js";
import {
  describeCause,
  EmptyAudioError,
  InvalidTierError,
  TranscriptionError,
} from "../lib/errors.js";
import { normalizeTranscription } from "../lib/normalize-transcription.js";
import { withTimeout } from "../lib/timeout.js";
import type { ModelRegistry } from "../models/model-registry.js";

export interface TranscriptionServiceOptions {
  registry: ModelRegistry;
  decoder: AudioDecoder;
  /** Deadline for decode + inference of one request; 0 disables it. */
  inferenceTimeoutMs?: number;
}

/**
 * Runs one transcription end to end: tier check, get-or-load, decode,
 * inference, normalization. A first request for a tier pays the load cost as
 * extra latency only.
 */
export class TranscriptionService {
  constructor(private readonly options: TranscriptionServiceOptions) {}

  /** Throws InvalidTierError unless `tier` names a known tier. */
  resolveTier(tier: string): ModelTier {
    const parsed = modelTierSchema.safeParse(tier);
    if (!parsed.success) {
      throw new InvalidTierError(tier, MODEL_TIERS);
    }
    return parsed.data;
  }

  async transcribe(
    tier: string,
    audio: Uint8Array,
    extension: SupportedAudioExtension,
  ): Promise<TranscriptionResult> {
    const modelTier = this.resolveTier(tier);
    if (audio.byteLength === 0) {
      throw new EmptyAudioError();
    }

    // ModelLoadError propagates as is; it is not a transcription failure.
    const model = await this.options.registry.getOrLoad(modelTier);

    const startedAt = Date.now();
    try {
      const result = await withTimeout(
        `${modelTier} transcription`,
        this.options.inferenceTimeoutMs ?? 0,
        async (signal) => {
          const decoded = await this.options.decoder.decode(audio, extension, signal);
          const output = await model.transcribe(decoded, signal);

          const parsed = rawTranscriptionSchema.safeParse(output);
          if (!parsed.success) {
            throw new Error(`model returned malformed output: ${parsed.error.message}`);
          }
          return normalizeTranscription(parsed.data, decoded.durationSeconds);
        },
      );

      console.log(
        `[transcribe] ${modelTier}: ${audio.byteLength} bytes → ${result.segments.length} segments in ${Date.now() - startedAt}ms`,
      );
      return result;
    } catch (err) {
      console.error(`[transcribe] ${modelTier} inference failed:`, describeCause(err));
      throw new TranscriptionError(err);
    }
  }
}
