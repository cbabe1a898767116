import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { FfmpegAudioDecoder } from "./audio/ffmpeg-decoder.js";
import { loadConfig } from "./config.js";
import { ModelRegistry } from "./models/model-registry.js";
import { WhisperCppLoader } from "./models/whisper-cpp.js";
import { TranscriptionService } from "./services/transcription.js";

const config = loadConfig();

const registry = new ModelRegistry({
  loader: new WhisperCppLoader({
    modelsDir: config.modelsDir,
    baseUrl: config.modelBaseUrl,
    modelIds: config.modelIds,
    binPath: config.whisperCppBin,
    threads: config.whisperThreads,
    language: config.whisperLanguage,
  }),
  modelIds: config.modelIds,
  retryPolicy: {
    maxAttempts: config.loadMaxAttempts,
    baseDelayMs: config.loadBaseDelayMs,
    maxDelayMs: config.loadMaxDelayMs,
  },
  attemptTimeoutMs: config.loadAttemptTimeoutMs,
  onTransition: ({ tier, from, to }) => {
    console.log(`[model-registry] ${tier}: ${from} → ${to}`);
  },
});

const service = new TranscriptionService({
  registry,
  decoder: new FfmpegAudioDecoder({ ffmpegPath: config.ffmpegBin }),
  inferenceTimeoutMs: config.inferenceTimeoutMs,
});

const app = createApp({ registry, service, maxUploadBytes: config.maxUploadBytes });

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    console.log(`[server] Tierscribe listening on http://localhost:${info.port}`);
  },
);

if (config.preloadTiers.length > 0) {
  console.log(`[server] preloading tiers: ${config.preloadTiers.join(", ")}`);
  // preload() logs and absorbs its own failures.
  void registry.preload(config.preloadTiers);
}

function shutdown(signal: NodeJS.Signals): void {
  console.log(`[server] ${signal} received, closing`);
  server.close((err) => {
    if (err) {
      console.error("[server] error while closing:", err.message);
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
