import { MODEL_TIERS, needsLoad } from "@tierscribe/shared";
import type { ModelLoadState, ModelStatusDetail, ModelTier } from "@tierscribe/shared";
import { describeCause, ModelLoadError, RetryExhaustedError } from "../lib/errors.js";
import { assertValidRetryPolicy, loadWithRetry, type RetryPolicy } from "../lib/retry.js";
import { ModelHandle } from "./model-handle.js";
import type { ModelLoader, TranscriptionModel } from "./types.js";

export interface ModelStateTransition {
  tier: ModelTier;
  from: ModelLoadState;
  to: ModelLoadState;
}

export interface ModelRegistryOptions {
  loader: ModelLoader;
  /** Model identifier per tier, used for reporting. */
  modelIds: Readonly<Record<ModelTier, string>>;
  retryPolicy: RetryPolicy;
  /** Deadline for a single load attempt; 0 disables it. */
  attemptTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onTransition?: (transition: ModelStateTransition) => void;
  now?: () => number;
}

/**
 * Owns one ModelHandle per tier and is the only place their state changes.
 *
 * At most one load runs per tier: the first caller to find a tier UNLOADED
 * or FAILED starts a load and stores its promise; everyone else arriving
 * while it runs awaits that same promise and sees the same outcome.
 */
export class ModelRegistry {
  private readonly handles: ReadonlyMap<ModelTier, ModelHandle>;
  private readonly inFlight = new Map<ModelTier, Promise<TranscriptionModel>>();

  constructor(private readonly options: ModelRegistryOptions) {
    assertValidRetryPolicy(options.retryPolicy);
    this.handles = new Map(
      MODEL_TIERS.map((tier) => [tier, new ModelHandle(tier, options.modelIds[tier], options.now)]),
    );
  }

  /** Returns the tier's model, loading it first when it is not loaded yet. */
  getOrLoad(tier: ModelTier): Promise<TranscriptionModel> {
    const handle = this.handle(tier);

    const loaded = handle.model;
    if (loaded) {
      return Promise.resolve(loaded);
    }

    const pending = this.inFlight.get(tier);
    if (pending) {
      return pending;
    }

    if (!needsLoad(handle.state)) {
      // LOADING without an in-flight promise would mean the bookkeeping is broken.
      return Promise.reject(new Error(`Model ${tier} is ${handle.state} with no load in flight`));
    }

    const load = this.load(handle).finally(() => {
      this.inFlight.delete(tier);
    });
    this.inFlight.set(tier, load);
    return load;
  }

  /** Non-blocking snapshot of every tier's load state. */
  status(): Record<ModelTier, ModelLoadState> {
    return {
      fast: this.handle("fast").state,
      accurate: this.handle("accurate").state,
    };
  }

  describe(): ModelStatusDetail[] {
    return MODEL_TIERS.map((tier) => this.handle(tier).snapshot());
  }

  /**
   * Loads the given tiers in the background of startup. Failures are logged
   * and leave the tier FAILED; the next request retries it.
   */
  async preload(tiers: ReadonlyArray<ModelTier>): Promise<void> {
    const results = await Promise.allSettled(tiers.map((tier) => this.getOrLoad(tier)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        console.error(`[model-registry] preload of ${tiers[index]} failed:`, describeCause(result.reason));
      }
    });
  }

  private async load(handle: ModelHandle): Promise<TranscriptionModel> {
    const { tier } = handle;
    this.transition(handle, "LOADING", () => handle.markLoading());
    console.log(`[model-registry] loading ${tier} model "${handle.modelId}"...`);

    try {
      const model = await loadWithRetry(
        (attempt, signal) => {
          handle.recordAttempt();
          console.log(
            `[model-registry] ${tier}: load attempt ${attempt}/${this.options.retryPolicy.maxAttempts}`,
          );
          return this.options.loader.load(tier, signal);
        },
        this.options.retryPolicy,
        {
          operation: `${tier} model load`,
          attemptTimeoutMs: this.options.attemptTimeoutMs,
          sleep: this.options.sleep,
          onAttemptFailed: ({ attempt, maxAttempts, error, nextDelayMs }) => {
            if (nextDelayMs !== null) {
              console.warn(
                `[model-registry] ${tier}: attempt ${attempt}/${maxAttempts} failed (${describeCause(error)}), retrying in ${nextDelayMs}ms`,
              );
            }
          },
        },
      );

      this.transition(handle, "LOADED", () => handle.markLoaded(model));
      console.log(`[model-registry] ${tier} model loaded`);
      return model;
    } catch (err) {
      // Anything other than exhaustion was raised before an attempt ran.
      const attempts = err instanceof RetryExhaustedError ? err.attempts : 0;
      const cause = err instanceof RetryExhaustedError ? err.lastCause : err;
      this.transition(handle, "FAILED", () => handle.markFailed(cause));
      console.error(
        `[model-registry] failed to load ${tier} model after ${attempts} attempts:`,
        describeCause(cause),
      );
      throw new ModelLoadError(tier, attempts, cause);
    }
  }

  private transition(handle: ModelHandle, to: ModelLoadState, apply: () => void): void {
    const from = handle.state;
    apply();
    this.options.onTransition?.({ tier: handle.tier, from, to });
  }

  private handle(tier: ModelTier): ModelHandle {
    const handle = this.handles.get(tier);
    if (!handle) {
      throw new Error(`Unknown model tier "${tier}"`);
    }
    return handle;
  }
}
