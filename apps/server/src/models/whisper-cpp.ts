import { access, mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ModelTier } from "@tierscribe/shared";
import type { DecodedAudio } from "../audio/types.js";
import { pcm16ToWav } from "../audio/wav.js";
import { runCommand, type CommandRunner } from "../lib/exec.js";
import { downloadFile, type FileDownloader } from "../lib/download.js";
import { parseWhisperCppOutput } from "./whisper-cpp-output.js";
import type { ModelLoader, RawTranscription, TranscriptionModel } from "./types.js";

export interface WhisperCppSettings {
  binPath: string;
  /** Thread count passed to whisper-cli; 0 keeps its default. */
  threads: number;
  /** Spoken language code, or "auto" to let the model detect it. */
  language: string;
  run?: CommandRunner;
}

/** ggml weight file name for a whisper model id, e.g. "base" → "ggml-base.bin". */
export function weightsFileName(modelId: string): string {
  return `ggml-${modelId}.bin`;
}

/**
 * A whisper.cpp model bound to a weights file. Each call runs `whisper-cli`
 * once on a temp WAV and reads back its JSON output.
 */
export class WhisperCppModel implements TranscriptionModel {
  private readonly run: CommandRunner;

  constructor(
    readonly tier: ModelTier,
    readonly modelId: string,
    readonly weightsPath: string,
    private readonly settings: WhisperCppSettings,
  ) {
    this.run = settings.run ?? runCommand;
  }

  async transcribe(audio: DecodedAudio, signal: AbortSignal): Promise<RawTranscription> {
    const workDir = await mkdtemp(join(tmpdir(), "tierscribe-whisper-"));
    try {
      const wavPath = join(workDir, "input.wav");
      const outputBase = join(workDir, "output");
      await writeFile(wavPath, pcm16ToWav(audio.pcm, audio.sampleRate, 1));

      const args = [
        "-m",
        this.weightsPath,
        "-f",
        wavPath,
        "-l",
        this.settings.language,
        "-oj",
        "-of",
        outputBase,
        "-np",
      ];
      if (this.settings.threads > 0) {
        args.push("-t", String(this.settings.threads));
      }

      await this.run(this.settings.binPath, args, { signal });
      return parseWhisperCppOutput(await readFile(`${outputBase}.json`, "utf8"));
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

export interface WhisperCppLoaderOptions extends WhisperCppSettings {
  modelsDir: string;
  /** Base URL the ggml weight files are fetched from. */
  baseUrl: string;
  modelIds: Readonly<Record<ModelTier, string>>;
  download?: FileDownloader;
}

/**
 * Makes sure the tier's ggml weights are on disk (downloading them when
 * missing) and checks that the whisper-cli binary is reachable.
 */
export class WhisperCppLoader implements ModelLoader {
  private readonly download: FileDownloader;

  constructor(private readonly options: WhisperCppLoaderOptions) {
    this.download = options.download ?? downloadFile;
  }

  async load(tier: ModelTier, signal: AbortSignal): Promise<TranscriptionModel> {
    const modelId = this.options.modelIds[tier];
    const fileName = weightsFileName(modelId);
    const weightsPath = join(this.options.modelsDir, fileName);

    if (!(await isNonEmptyFile(weightsPath))) {
      await mkdir(this.options.modelsDir, { recursive: true });
      const url = `${this.options.baseUrl.replace(/\/+$/, "")}/${fileName}`;
      console.log(`[whisper-cpp] downloading ${fileName} from ${url}`);
      const bytes = await this.download(url, weightsPath, signal);
      console.log(`[whisper-cpp] saved ${fileName} (${bytes} bytes)`);
    }

    await this.assertBinaryAvailable();
    return new WhisperCppModel(tier, modelId, weightsPath, this.options);
  }

  private async assertBinaryAvailable(): Promise<void> {
    const { binPath } = this.options;
    // Bare command names are resolved through PATH when spawned.
    if (!binPath.includes("/")) return;
    try {
      await access(binPath);
    } catch {
      throw new Error(`whisper.cpp binary not found at ${binPath}`);
    }
  }
}

async function isNonEmptyFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}
