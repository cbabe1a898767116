import { Hono } from "hono";
import { toErrorResponse } from "./lib/error-response.js";
import type { ModelRegistry } from "./models/model-registry.js";
import { createStatusRoutes } from "./routes/status-routes.js";
import { createTranscribeRoutes } from "./routes/transcribe-routes.js";
import type { TranscriptionService } from "./services/transcription.js";

export interface AppDependencies {
  registry: ModelRegistry;
  service: TranscriptionService;
  maxUploadBytes: number;
}

/**
 * Builds the HTTP app around an explicitly constructed registry and service,
 * so tests can run it with their own instances.
 */
export function createApp({ registry, service, maxUploadBytes }: AppDependencies) {
  const app = new Hono();

  app.route("/", createStatusRoutes(registry));
  app.route("/", createTranscribeRoutes({ service, maxUploadBytes }));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    const { status, body } = toErrorResponse(err);
    console.error(`[server] ${c.req.method} ${c.req.path} failed:`, body.error);
    return c.json(body, status);
  });

  return app;
}
