import { describe, expect, it } from "vitest";
import { canTransition, needsLoad, VALID_TRANSITIONS } from "./index.js";
import type { ModelLoadState } from "./index.js";

const ALL_STATES: ModelLoadState[] = ["UNLOADED", "LOADING", "LOADED", "FAILED"];

describe("canTransition", () => {
  describe("valid transitions", () => {
    it("UNLOADED → LOADING", () => {
      expect(canTransition("UNLOADED", "LOADING")).toBe(true);
    });

    it("LOADING → LOADED", () => {
      expect(canTransition("LOADING", "LOADED")).toBe(true);
    });

    it("LOADING → FAILED", () => {
      expect(canTransition("LOADING", "FAILED")).toBe(true);
    });

    it("FAILED → LOADING (retry on next request)", () => {
      expect(canTransition("FAILED", "LOADING")).toBe(true);
    });
  });

  describe("invalid transitions", () => {
    it("UNLOADED → LOADED (must pass through LOADING)", () => {
      expect(canTransition("UNLOADED", "LOADED")).toBe(false);
    });

    it("LOADING → LOADING (no nested load)", () => {
      expect(canTransition("LOADING", "LOADING")).toBe(false);
    });

    it("LOADING → UNLOADED", () => {
      expect(canTransition("LOADING", "UNLOADED")).toBe(false);
    });

    it("FAILED → LOADED", () => {
      expect(canTransition("FAILED", "LOADED")).toBe(false);
    });

    it("LOADED is terminal", () => {
      for (const to of ALL_STATES) {
        expect(canTransition("LOADED", to)).toBe(false);
      }
    });
  });

  it("nothing ever transitions back to UNLOADED", () => {
    for (const from of ALL_STATES) {
      expect(canTransition(from, "UNLOADED")).toBe(false);
    }
  });

  it("covers every state in the transition table", () => {
    expect(Object.keys(VALID_TRANSITIONS).sort()).toEqual([...ALL_STATES].sort());
  });
});

describe("needsLoad", () => {
  it("is true for UNLOADED and FAILED", () => {
    expect(needsLoad("UNLOADED")).toBe(true);
    expect(needsLoad("FAILED")).toBe(true);
  });

  it("is false for LOADING and LOADED", () => {
    expect(needsLoad("LOADING")).toBe(false);
    expect(needsLoad("LOADED")).toBe(false);
  });
});
