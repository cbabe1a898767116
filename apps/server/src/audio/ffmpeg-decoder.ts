import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MODEL_SAMPLE_RATE } from "@tierscribe/shared";
import type { SupportedAudioExtension } from "../lib/audio-format.js";
import { runCommand, type CommandRunner } from "../lib/exec.js";
import type { AudioDecoder, DecodedAudio } from "./types.js";
import { pcm16DurationSeconds } from "./wav.js";

export interface FfmpegAudioDecoderOptions {
  ffmpegPath: string;
  run?: CommandRunner;
}

/**
 * Decodes any container ffmpeg understands into 16 kHz mono s16le PCM.
 * Input and output go through a per-call temp directory, removed afterwards.
 */
export class FfmpegAudioDecoder implements AudioDecoder {
  private readonly run: CommandRunner;

  constructor(private readonly options: FfmpegAudioDecoderOptions) {
    this.run = options.run ?? runCommand;
  }

  async decode(
    audio: Uint8Array,
    extension: SupportedAudioExtension,
    signal: AbortSignal,
  ): Promise<DecodedAudio> {
    const workDir = await mkdtemp(join(tmpdir(), "tierscribe-decode-"));
    try {
      const inputPath = join(workDir, `input${extension}`);
      const outputPath = join(workDir, "output.pcm");
      await writeFile(inputPath, audio);

      await this.run(
        this.options.ffmpegPath,
        [
          "-nostdin",
          "-hide_banner",
          "-loglevel",
          "error",
          "-i",
          inputPath,
          "-ac",
          "1",
          "-ar",
          String(MODEL_SAMPLE_RATE),
          "-f",
          "s16le",
          "-acodec",
          "pcm_s16le",
          outputPath,
        ],
        { signal },
      );

      const pcm = await readFile(outputPath);
      if (pcm.length === 0) {
        throw new Error("Decoded audio contains no samples");
      }

      return {
        pcm,
        sampleRate: MODEL_SAMPLE_RATE,
        durationSeconds: pcm16DurationSeconds(pcm, MODEL_SAMPLE_RATE),
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
