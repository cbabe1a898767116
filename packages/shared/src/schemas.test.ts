import { describe, expect, it } from "vitest";
import {
  errorResponseSchema,
  healthResponseSchema,
  modelStatusDetailSchema,
  modelTierSchema,
  modelLoadStateSchema,
  rawTranscriptionSchema,
  segmentSchema,
  serviceStatusResponseSchema,
  transcriptionResultSchema,
  DEFAULT_TIER_PROFILES,
  MODEL_TIERS,
  type HealthResponseFromSchema,
  type SegmentFromSchema,
  type TranscriptionResultFromSchema,
} from "./index.js";

describe("healthResponseSchema", () => {
  it("accepts a valid health payload", () => {
    const parsed: HealthResponseFromSchema = healthResponseSchema.parse({ status: "ok" });
    expect(parsed.status).toBe("ok");
  });

  it("rejects an invalid health payload", () => {
    expect(healthResponseSchema.safeParse({ status: "down" }).success).toBe(false);
  });
});

describe("modelTierSchema", () => {
  it("accepts every known tier", () => {
    for (const tier of MODEL_TIERS) {
      expect(modelTierSchema.parse(tier)).toBe(tier);
    }
  });

  it("rejects unknown tiers and different casing", () => {
    expect(modelTierSchema.safeParse("medium").success).toBe(false);
    expect(modelTierSchema.safeParse("FAST").success).toBe(false);
  });

  it("has a profile for every tier", () => {
    for (const tier of MODEL_TIERS) {
      expect(DEFAULT_TIER_PROFILES[tier].tier).toBe(tier);
    }
  });
});

describe("modelLoadStateSchema", () => {
  it("accepts the four handle states", () => {
    for (const state of ["UNLOADED", "LOADING", "LOADED", "FAILED"]) {
      expect(modelLoadStateSchema.safeParse(state).success).toBe(true);
    }
  });

  it("rejects legacy labels", () => {
    expect(modelLoadStateSchema.safeParse("not loaded").success).toBe(false);
  });
});

describe("segmentSchema", () => {
  it("accepts a valid segment", () => {
    const parsed: SegmentFromSchema = segmentSchema.parse({ text: "hello", start: 0, end: 1.5 });
    expect(parsed).toEqual({ text: "hello", start: 0, end: 1.5 });
  });

  it("accepts a zero-length segment", () => {
    expect(segmentSchema.safeParse({ text: "", start: 2, end: 2 }).success).toBe(true);
  });

  it("rejects end before start", () => {
    const parsed = segmentSchema.safeParse({ text: "x", start: 3, end: 2 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]?.path).toEqual(["end"]);
    }
  });

  it("rejects negative start", () => {
    expect(segmentSchema.safeParse({ text: "x", start: -0.1, end: 2 }).success).toBe(false);
  });
});

describe("transcriptionResultSchema", () => {
  it("accepts text with segments", () => {
    const payload: TranscriptionResultFromSchema = {
      text: "hello world",
      segments: [
        { text: "hello", start: 0, end: 0.5 },
        { text: "world", start: 0.5, end: 1 },
      ],
    };
    expect(transcriptionResultSchema.parse(payload)).toEqual(payload);
  });

  it("accepts empty text with no segments", () => {
    expect(transcriptionResultSchema.safeParse({ text: "", segments: [] }).success).toBe(true);
  });

  it("rejects non-empty text with no segments", () => {
    const parsed = transcriptionResultSchema.safeParse({ text: "hello", segments: [] });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]?.message).toBe(
        "segments may only be empty when text is empty",
      );
    }
  });
});

describe("rawTranscriptionSchema", () => {
  it("keeps unknown fields for later normalization", () => {
    const parsed = rawTranscriptionSchema.parse({
      text: " hi",
      segments: [{ id: 0, text: " hi", start: 0, end: 1, avg_logprob: -0.2 }],
    });
    expect(parsed.segments[0]).toMatchObject({ id: 0, avg_logprob: -0.2 });
  });

  it("allows text to be absent", () => {
    expect(rawTranscriptionSchema.safeParse({ segments: [] }).success).toBe(true);
  });

  it("rejects non-finite timestamps", () => {
    const parsed = rawTranscriptionSchema.safeParse({
      segments: [{ text: "a", start: 0, end: Number.POSITIVE_INFINITY }],
    });
    expect(parsed.success).toBe(false);
  });
});

describe("modelStatusDetailSchema", () => {
  it("accepts an unloaded tier without timestamps", () => {
    const parsed = modelStatusDetailSchema.safeParse({
      tier: "fast",
      state: "UNLOADED",
      modelId: "base",
      loadAttempts: 0,
      loadedAt: null,
      lastLoadDurationMs: null,
      lastError: null,
    });
    expect(parsed.success).toBe(true);
  });

  it("rejects a malformed loadedAt", () => {
    const parsed = modelStatusDetailSchema.safeParse({
      tier: "fast",
      state: "LOADED",
      modelId: "base",
      loadAttempts: 1,
      loadedAt: "yesterday",
    });
    expect(parsed.success).toBe(false);
  });
});

describe("serviceStatusResponseSchema", () => {
  it("accepts a status payload", () => {
    const parsed = serviceStatusResponseSchema.safeParse({
      status: "ok",
      message: "running",
      endpoints: [{ method: "GET", path: "/", description: "status" }],
      modelStatus: { fast: "LOADED", accurate: "UNLOADED" },
    });
    expect(parsed.success).toBe(true);
  });

  it("rejects an unknown tier key in modelStatus", () => {
    const parsed = serviceStatusResponseSchema.safeParse({
      status: "ok",
      message: "running",
      endpoints: [],
      modelStatus: { medium: "LOADED" },
    });
    expect(parsed.success).toBe(false);
  });
});

describe("errorResponseSchema", () => {
  it("accepts a known error code", () => {
    expect(
      errorResponseSchema.safeParse({ error: "boom", code: "model_load_failed" }).success,
    ).toBe(true);
  });

  it("rejects an empty message", () => {
    expect(errorResponseSchema.safeParse({ error: "", code: "internal_error" }).success).toBe(
      false,
    );
  });
});
