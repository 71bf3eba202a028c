import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import {
  adaptBaseOutput,
  joinBaseChunks,
  type BaseAdapterResult,
  type BaseChunk,
  type OptionalLogger,
  type Transcript,
} from "@caption-sync/core";
import { splitWav } from "../lib/ffmpeg";
import { runBaseEngine, type BaseEngineOptions } from "../lib/whisper-cpp";
import { fileSignature, readJSON, writeJSON, type FileSignature } from "../utils/file";

const intervalSchema = z.object({ start: z.number(), end: z.number() });

const transcriptSchema = z.object({
  language: z.string(),
  sourceEngine: z.enum(["base", "aligned"]),
  diarized: z.boolean(),
  segments: z.array(
    z.object({
      id: z.string(),
      interval: intervalSchema,
      text: z.string(),
      speaker: z.string().optional(),
      words: z.array(
        z.object({
          id: z.string(),
          interval: intervalSchema,
          text: z.string(),
          confidence: z.number().optional(),
          speaker: z.string().optional(),
        })
      ),
    })
  ),
});

const cachedTranscriptionSchema = z.object({
  input: z.string(),
  signature: z.object({ size: z.number(), mtimeMs: z.number() }),
  model: z.string(),
  language: z.string(),
  prompt: z.string().nullable(),
  chunkSeconds: z.number().default(0),
  transcript: transcriptSchema,
  warnings: z.array(z.string()),
});

export type CachedTranscription = z.infer<typeof cachedTranscriptionSchema>;

/** Produces the WAV the engine reads; only called on a cache miss. */
export type AudioSource = () => Promise<string>;

export interface TranscribeOptions extends BaseEngineOptions {
  /** Ignore the cached transcription */
  force?: boolean;
  /** Directory whisper.cpp writes into */
  workdir: string;
  /** Transcribe pieces of this many seconds one after another, 0 for one run */
  chunkSeconds?: number;
  /** Cuts the audio when chunking */
  ffmpegBin?: string;
  logger?: OptionalLogger;
}

export interface TranscribeResult {
  transcript: Transcript;
  warnings: string[];
  cached: boolean;
}

const readCache = async (
  cacheFile: string,
  logger: OptionalLogger | undefined
): Promise<CachedTranscription | null> => {
  try {
    return await readJSON(cacheFile, cachedTranscriptionSchema);
  } catch (error) {
    logger?.warn?.(
      `[Transcribe] Ignoring unreadable cache ${cacheFile}: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
};

const sameSignature = (a: FileSignature, b: FileSignature) =>
  a.size === b.size && a.mtimeMs === b.mtimeMs;

async function transcribeChunks(
  wav: string,
  chunkSeconds: number,
  ffmpegBin: string,
  workdir: string,
  engineOptions: BaseEngineOptions,
  language: string
): Promise<BaseAdapterResult> {
  const { timeoutMs, signal, logger } = engineOptions;
  const files = await splitWav(ffmpegBin, wav, chunkSeconds, path.join(workdir, "chunks"), {
    timeoutMs,
    signal,
    logger,
  });

  const chunks: BaseChunk[] = [];
  for (const [index, file] of files.entries()) {
    const chunkDir = path.join(workdir, `chunk-${index + 1}`);
    await fs.mkdir(chunkDir, { recursive: true });
    logger?.info?.(`[Transcribe] Chunk ${index + 1}/${files.length}`);
    const raw = await runBaseEngine(file, chunkDir, engineOptions);
    chunks.push({ result: adaptBaseOutput(raw, { language }), offset: index * chunkSeconds });
  }
  return joinBaseChunks(chunks, logger);
}

/**
 * Base transcription of one input, reused from `cacheFile` when it was made
 * from the same file (path, size and mtime) with the same model, language,
 * prompt and chunk length.
 */
export const transcribe = async (
  input: string,
  audio: AudioSource,
  cacheFile: string,
  options: TranscribeOptions
): Promise<TranscribeResult> => {
  const {
    force = false,
    workdir,
    chunkSeconds = 0,
    ffmpegBin = "ffmpeg",
    logger,
    ...engineOptions
  } = options;
  const language = engineOptions.language ?? "auto";
  const prompt = engineOptions.prompt ?? null;
  const signature = await fileSignature(input);

  if (!force) {
    const existing = await readCache(cacheFile, logger);
    if (
      existing &&
      existing.input === input &&
      sameSignature(existing.signature, signature) &&
      existing.model === engineOptions.model &&
      existing.language === language &&
      existing.prompt === prompt &&
      existing.chunkSeconds === chunkSeconds
    ) {
      logger?.info?.(`[Transcribe] Using existing transcription from ${cacheFile}`);
      return { transcript: existing.transcript, warnings: existing.warnings, cached: true };
    }
    if (existing) {
      logger?.info?.(`[Transcribe] ${cacheFile} is stale, transcribing ${input} again`);
    }
  }

  const wav = await audio();
  const adapterLanguage = language === "auto" ? "unknown" : language;
  const { transcript, warnings } =
    chunkSeconds > 0
      ? await transcribeChunks(
          wav,
          chunkSeconds,
          ffmpegBin,
          workdir,
          { ...engineOptions, logger },
          adapterLanguage
        )
      : adaptBaseOutput(await runBaseEngine(wav, workdir, { ...engineOptions, logger }), {
          language: adapterLanguage,
          logger,
        });

  const cached: CachedTranscription = {
    input,
    signature,
    model: engineOptions.model,
    language,
    prompt,
    chunkSeconds,
    transcript,
    warnings,
  };
  await writeJSON(cacheFile, cached);

  return { transcript, warnings, cached: false };
};
