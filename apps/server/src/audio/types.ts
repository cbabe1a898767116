import type { SupportedAudioExtension } from "../lib/audio-format.js";

/** 16-bit little-endian PCM, mono, at the model sample rate. */
export interface DecodedAudio {
  pcm: Buffer;
  sampleRate: number;
  durationSeconds: number;
}

export interface AudioDecoder {
  decode(
    audio: Uint8Array,
    extension: SupportedAudioExtension,
    signal: AbortSignal,
  ): Promise<DecodedAudio>;
}
