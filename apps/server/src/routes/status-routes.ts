import { Hono } from "hono";
import {
  DEFAULT_TIER_PROFILES,
  healthResponseSchema,
  modelsResponseSchema,
  serviceStatusResponseSchema,
  type EndpointDescription,
  type HealthResponse,
  type ServiceStatusResponse,
} from "@tierscribe/shared";
import type { ModelRegistry } from "../models/model-registry.js";

const ENDPOINTS: ReadonlyArray<EndpointDescription> = [
  { method: "GET", path: "/", description: "Service status and model load states" },
  { method: "GET", path: "/health", description: "Liveness probe" },
  { method: "GET", path: "/models", description: "Per-tier model load details" },
  {
    method: "POST",
    path: "/transcribe/fast",
    description: DEFAULT_TIER_PROFILES.fast.description,
  },
  {
    method: "POST",
    path: "/transcribe/accurate",
    description: DEFAULT_TIER_PROFILES.accurate.description,
  },
];

export function createStatusRoutes(registry: ModelRegistry) {
  const app = new Hono();

  /** GET /: status, endpoint list and a snapshot of each tier's load state */
  app.get("/", (c) => {
    const payload: ServiceStatusResponse = {
      status: "ok",
      message: "Audio transcription API is running",
      endpoints: [...ENDPOINTS],
      modelStatus: registry.status(),
    };

    const validated = serviceStatusResponseSchema.safeParse(payload);
    if (!validated.success) {
      console.error("[status] Invalid status payload:", validated.error.message);
      return c.json({ error: "Internal error: invalid status data", code: "internal_error" }, 500);
    }
    return c.json(validated.data);
  });

  app.get("/health", (c) => {
    const payload: HealthResponse = { status: "ok" };

    const parsedPayload = healthResponseSchema.safeParse(payload);
    if (!parsedPayload.success) {
      throw new Error("Invalid /health payload");
    }
    return c.json(parsedPayload.data);
  });

  /** GET /models: attempts, load timing and last error per tier */
  app.get("/models", (c) => {
    const validated = modelsResponseSchema.safeParse({ models: registry.describe() });
    if (!validated.success) {
      console.error("[status] Invalid models payload:", validated.error.message);
      return c.json({ error: "Internal error: invalid model data", code: "internal_error" }, 500);
    }
    return c.json(validated.data);
  });

  return app;
}
