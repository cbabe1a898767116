import { canTransition } from "@tierscribe/shared";
import type { ModelLoadState, ModelStatusDetail, ModelTier } from "@tierscribe/shared";
import { describeCause } from "../lib/errors.js";
import type { TranscriptionModel } from "./types.js";

type HandleSlot =
  | { state: "UNLOADED" }
  | { state: "LOADING"; startedAt: number }
  | { state: "LOADED"; model: TranscriptionModel; loadedAt: Date }
  | { state: "FAILED"; error: unknown };

/**
 * Load state of one tier's model. The instance is present iff LOADED and the
 * last error iff FAILED. Only ModelRegistry calls the transition methods.
 */
export class ModelHandle {
  private slot: HandleSlot = { state: "UNLOADED" };
  private attempts = 0;
  private lastLoadDurationMs: number | null = null;

  constructor(
    readonly tier: ModelTier,
    readonly modelId: string,
    private readonly now: () => number = Date.now,
  ) {}

  get state(): ModelLoadState {
    return this.slot.state;
  }

  /** The loaded model, or null unless LOADED. */
  get model(): TranscriptionModel | null {
    return this.slot.state === "LOADED" ? this.slot.model : null;
  }

  /** The cause of the last failed load, or null unless FAILED. */
  get lastError(): unknown {
    return this.slot.state === "FAILED" ? this.slot.error : null;
  }

  /** Load attempts made so far, across every load cycle. */
  get loadAttempts(): number {
    return this.attempts;
  }

  markLoading(): void {
    this.assertTransition("LOADING");
    this.slot = { state: "LOADING", startedAt: this.now() };
  }

  recordAttempt(): void {
    this.attempts++;
  }

  markLoaded(model: TranscriptionModel): void {
    const startedAt = this.loadingStartedAt();
    this.assertTransition("LOADED");
    const loadedAt = this.now();
    this.lastLoadDurationMs = loadedAt - startedAt;
    this.slot = { state: "LOADED", model, loadedAt: new Date(loadedAt) };
  }

  markFailed(error: unknown): void {
    const startedAt = this.loadingStartedAt();
    this.assertTransition("FAILED");
    this.lastLoadDurationMs = this.now() - startedAt;
    this.slot = { state: "FAILED", error };
  }

  snapshot(): ModelStatusDetail {
    return {
      tier: this.tier,
      state: this.slot.state,
      modelId: this.modelId,
      loadAttempts: this.attempts,
      loadedAt: this.slot.state === "LOADED" ? this.slot.loadedAt.toISOString() : null,
      lastLoadDurationMs: this.lastLoadDurationMs,
      lastError: this.slot.state === "FAILED" ? describeCause(this.slot.error) : null,
    };
  }

  private loadingStartedAt(): number {
    return this.slot.state === "LOADING" ? this.slot.startedAt : this.now();
  }

  private assertTransition(to: ModelLoadState): void {
    if (!canTransition(this.slot.state, to)) {
      throw new Error(
        `Invalid model state transition for ${this.tier}: ${this.slot.state} → ${to}`,
      );
    }
  }
}
