import { describe, expect, it } from "vitest";
import type { TranscriptionModel } from "./types.js";
import { ModelHandle } from "./model-handle.js";

const model: TranscriptionModel = {
  tier: "fast",
  modelId: "base",
  transcribe: async () => ({ text: "", segments: [] }),
};

function clock(start: number) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("ModelHandle", () => {
  it("starts UNLOADED with no model and no error", () => {
    const handle = new ModelHandle("fast", "base");
    expect(handle.state).toBe("UNLOADED");
    expect(handle.model).toBeNull();
    expect(handle.lastError).toBeNull();
  });

  it("exposes the model only once LOADED", () => {
    const time = clock(10_000);
    const handle = new ModelHandle("fast", "base", time.now);

    handle.markLoading();
    expect(handle.model).toBeNull();
    time.advance(1_500);
    handle.markLoaded(model);

    expect(handle.state).toBe("LOADED");
    expect(handle.model).toBe(model);
    expect(handle.snapshot()).toEqual({
      tier: "fast",
      state: "LOADED",
      modelId: "base",
      loadAttempts: 0,
      loadedAt: new Date(11_500).toISOString(),
      lastLoadDurationMs: 1_500,
      lastError: null,
    });
  });

  it("keeps the last error only while FAILED", () => {
    const handle = new ModelHandle("accurate", "large-v3");
    const cause = new Error("connection reset");

    handle.markLoading();
    handle.recordAttempt();
    handle.markFailed(cause);
    expect(handle.lastError).toBe(cause);
    expect(handle.snapshot().lastError).toBe("connection reset");

    handle.markLoading();
    expect(handle.lastError).toBeNull();
    expect(handle.loadAttempts).toBe(1);
  });

  it("refuses transitions the state machine does not allow", () => {
    const handle = new ModelHandle("fast", "base");

    expect(() => handle.markLoaded(model)).toThrow(
      "Invalid model state transition for fast: UNLOADED → LOADED",
    );

    handle.markLoading();
    expect(() => handle.markLoading()).toThrow(
      "Invalid model state transition for fast: LOADING → LOADING",
    );

    handle.markLoaded(model);
    expect(() => handle.markFailed(new Error("late"))).toThrow(
      "Invalid model state transition for fast: LOADED → FAILED",
    );
    expect(handle.model).toBe(model);
  });
});
