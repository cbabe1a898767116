import { z } from "zod";
import type { RawTranscription } from "./types.js";

// ─── whisper-cli `-oj` output schema ──────────────────────────────────────────

const whisperCppSegmentSchema = z.object({
  offsets: z.object({
    from: z.number().nonnegative(), // milliseconds
    to: z.number().nonnegative(),
  }),
  text: z.string(),
});

const whisperCppOutputSchema = z.object({
  result: z.object({ language: z.string() }).partial().optional(),
  transcription: z.array(whisperCppSegmentSchema),
});

/**
 * Parses the JSON file written by `whisper-cli -oj` into the raw transcription
 * shape (seconds instead of milliseconds, full text joined from segments).
 */
export function parseWhisperCppOutput(json: string): RawTranscription {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new Error("whisper.cpp returned non-JSON output");
  }

  const parsed = whisperCppOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`whisper.cpp output has unexpected shape: ${parsed.error.message}`);
  }

  const segments = parsed.data.transcription.map((segment) => ({
    text: segment.text,
    start: segment.offsets.from / 1000,
    end: segment.offsets.to / 1000,
  }));

  return {
    text: segments.map((segment) => segment.text).join(""),
    language: parsed.data.result?.language,
    segments,
  };
}
