import { extname } from "node:path";
import { SUPPORTED_AUDIO_EXTENSIONS } from "@tierscribe/shared";

export type SupportedAudioExtension = (typeof SUPPORTED_AUDIO_EXTENSIONS)[number];

const SUPPORTED: ReadonlySet<string> = new Set(SUPPORTED_AUDIO_EXTENSIONS);

function isSupportedAudioExtension(ext: string): ext is SupportedAudioExtension {
  return SUPPORTED.has(ext);
}

/**
 * Returns the lowercase extension of `filename` (".wav", ".mp3", ".m4a") when
 * it is one the service accepts, or null otherwise. Only the filename is
 * inspected; content sniffing is left to the decoder.
 */
export function resolveAudioExtension(filename: string): SupportedAudioExtension | null {
  const ext = extname(filename).toLowerCase();
  return isSupportedAudioExtension(ext) ? ext : null;
}
