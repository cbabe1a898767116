import type { Segment, TranscriptionResult } from "@tierscribe/shared";
import type { RawTranscription } from "../models/types.js";

function roundMs(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Maps raw model output onto the public `{ text, segments }` shape.
 *
 * - texts are trimmed; segments whose text is blank are dropped
 * - start is clamped to >= 0 and end to >= start, both rounded to ms
 * - segments are ordered by start time
 * - when the model gives text but no segments, one segment spans the audio
 * - when the model gives no text, the segment texts are joined with spaces
 */
export function normalizeTranscription(
  raw: RawTranscription,
  audioDurationSeconds: number,
): TranscriptionResult {
  const segments: Segment[] = raw.segments
    .map((segment) => {
      const start = roundMs(Math.max(0, segment.start));
      const end = roundMs(Math.max(start, segment.end));
      return { text: segment.text.trim(), start, end };
    })
    .filter((segment) => segment.text.length > 0)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const text = raw.text?.trim() || segments.map((segment) => segment.text).join(" ");

  if (segments.length === 0 && text.length > 0) {
    segments.push({ text, start: 0, end: roundMs(Math.max(0, audioDurationSeconds)) });
  }

  return { text, segments };
}
