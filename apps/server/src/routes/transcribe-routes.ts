import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { SUPPORTED_AUDIO_EXTENSIONS, transcriptionResultSchema } from "@tierscribe/shared";
import { resolveAudioExtension } from "../lib/audio-format.js";
import { toErrorResponse } from "../lib/error-response.js";
import {
  MalformedUploadError,
  MissingFileError,
  PayloadTooLargeError,
  UnsupportedFormatError,
} from "../lib/errors.js";
import type { TranscriptionService } from "../services/transcription.js";

export interface TranscribeRoutesOptions {
  service: TranscriptionService;
  /** Limit on the whole request body, multipart envelope included. */
  maxUploadBytes: number;
}

export function createTranscribeRoutes({ service, maxUploadBytes }: TranscribeRoutesOptions) {
  const app = new Hono();

  /**
   * POST /transcribe/:tier: multipart upload with a `file` field.
   *
   * The tier is checked before any of the body is read. The body is then
   * counted as it streams in and the request stops with 413 as soon as it
   * passes `maxUploadBytes`. File presence and extension are checked before
   * the audio reaches the model.
   */
  app.post(
    "/transcribe/:tier",
    async (c, next) => {
      try {
        service.resolveTier(c.req.param("tier"));
      } catch (err) {
        const { status, body } = toErrorResponse(err);
        console.warn(`[transcribe] ${c.req.param("tier")} request rejected (${body.code}):`, body.error);
        return c.json(body, status);
      }
      await next();
    },
    bodyLimit({
      maxSize: maxUploadBytes,
      onError: (c) => {
        const { status, body } = toErrorResponse(new PayloadTooLargeError(maxUploadBytes));
        console.warn(`[transcribe] ${c.req.param("tier")} request rejected (${body.code}):`, body.error);
        return c.json(body, status);
      },
    }),
    async (c) => {
      const tierParam = c.req.param("tier");

      // Only a TypeError means the body is not valid multipart. Anything else,
      // such as the body limit tripping mid-stream, propagates to the
      // body-limit middleware.
      const form = await c.req.parseBody().catch((err: unknown) => {
        if (err instanceof TypeError) {
          return new MalformedUploadError(err);
        }
        throw err;
      });
      if (form instanceof MalformedUploadError) {
        const { status, body } = toErrorResponse(form);
        console.warn(`[transcribe] ${tierParam} request rejected (${body.code}):`, body.error);
        return c.json(body, status);
      }

      try {
        const tier = service.resolveTier(tierParam);

        const file = form["file"];
        if (file === undefined || typeof file === "string" || Array.isArray(file)) {
          throw new MissingFileError();
        }

        const extension = resolveAudioExtension(file.name);
        if (!extension) {
          throw new UnsupportedFormatError(file.name, SUPPORTED_AUDIO_EXTENSIONS);
        }

        const audio = new Uint8Array(await file.arrayBuffer());
        const result = await service.transcribe(tier, audio, extension);

        const validated = transcriptionResultSchema.safeParse(result);
        if (!validated.success) {
          console.error(`[transcribe] Invalid result payload for ${tier}:`, validated.error.message);
          return c.json(
            { error: "Internal error: invalid transcription result", code: "internal_error" },
            500,
          );
        }
        return c.json(validated.data);
      } catch (err) {
        const { status, body } = toErrorResponse(err);
        if (status === 500) {
          console.error(`[transcribe] ${tierParam} request failed (${body.code}):`, body.error);
        } else {
          console.warn(`[transcribe] ${tierParam} request rejected (${body.code}):`, body.error);
        }
        return c.json(body, status);
      }
    },
  );

  return app;
}
