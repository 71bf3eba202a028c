import fs from "fs/promises";
import os from "os";
import path from "path";
import {
  CaptionSyncError,
  ErrorCode,
  OUTPUT_EXTENSIONS,
  adaptAlignedOutput,
  annotateReveals,
  applyGlossary,
  isCaptionSyncError,
  parseAlignedJson,
  polishTranscript,
  redactTranscript,
  renderTranscript,
  selectEngines,
  synchronize,
  validateTranscript,
  withFile,
  type AlignedTranscript,
  type ClipStats,
  type EngineSelection,
  type Glossary,
  type OptionalLogger,
  type OutputFormat,
  type PolishStats,
  type RepairAction,
  type RepairKind,
  type Transcript,
} from "@caption-sync/core";
import type { CliConfig } from "../config";
import { extractWav, probeLongestAudioStream } from "../lib/ffmpeg";
import { probeAlignedRuntime, runAlignedEngine } from "../lib/whisperx";
import { writeJSON, writeText } from "../utils/file";
import { loadGlossaryFile } from "../utils/glossary";
import { transcribe } from "./transcribe";

/** A recoverable problem and what was done instead. */
export interface Degradation {
  stage: "aligned-engine" | "diarization" | "sync";
  reason: string;
  fallback: string;
}

/** What the caption edits after synchronization changed. */
export interface CaptionEdits {
  /** Segments touched by the glossary */
  glossary?: number;
  /** Segments with redacted personal data */
  redacted?: number;
  /** Segments left without text by an edit */
  dropped: number;
  polish?: PolishStats;
}

export interface FileResult {
  input: string;
  outputs: string[];
  transcript: Transcript;
  selection: EngineSelection;
  degradations: Degradation[];
  edits: CaptionEdits;
  repairs: Partial<Record<RepairKind, number>>;
  clipStats: ClipStats;
}

export interface ProcessFileOptions {
  signal?: AbortSignal;
  logger?: OptionalLogger;
  /** Output path relative to the output directory, without extension */
  outputName?: string;
  /** Already loaded glossary; otherwise `config.glossaryFile` is read */
  glossary?: Glossary;
}

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const getFilePaths = (
  input: string,
  outputDir: string,
  outputName = path.basename(input, path.extname(input))
) => {
  const outputBase = path.join(outputDir, outputName);
  return {
    stem: path.basename(outputName),
    outputBase,
    cacheFile: `${outputBase}.base.json`,
    metaFile: `${outputBase}.meta.json`,
  };
};

export function countRepairs(repairs: RepairAction[]): Partial<Record<RepairKind, number>> {
  const counts: Partial<Record<RepairKind, number>> = {};
  for (const repair of repairs) {
    counts[repair.kind] = (counts[repair.kind] ?? 0) + 1;
  }
  return counts;
}

/** Degradations the synchronizer recovered from on its own. */
export function syncDegradations(
  repairs: Partial<Record<RepairKind, number>>,
  alignedUsed: boolean
): Degradation[] {
  const degradations: Degradation[] = [];
  if (repairs["interpolated-word"]) {
    degradations.push({
      stage: "sync",
      reason: `${repairs["interpolated-word"]} aligned word(s) had no timestamps`,
      fallback: "interpolated between neighbouring words",
    });
  }
  if (repairs["orphan-segment"]) {
    degradations.push({
      stage: "sync",
      reason: `${repairs["orphan-segment"]} segment(s) were heard only by the aligned engine`,
      fallback: "inserted as synthetic segments",
    });
  }
  if (alignedUsed && repairs["approximated-segment"]) {
    degradations.push({
      stage: "sync",
      reason: `${repairs["approximated-segment"]} segment(s) got no aligned words`,
      fallback: "approximated word timing",
    });
  }
  return degradations;
}

export const outputFormats = (config: CliConfig): OutputFormat[] =>
  config.karaoke && !config.formats.includes("ass")
    ? [...config.formats, "ass"]
    : config.formats;

/**
 * Applies the glossary, then redaction, then polish to the synchronized
 * transcript, each only when configured.
 */
export function editCaptions(
  transcript: Transcript,
  config: CliConfig,
  glossary: Glossary | undefined,
  logger?: OptionalLogger
): { transcript: Transcript; edits: CaptionEdits } {
  const edits: CaptionEdits = { dropped: 0 };
  let current = transcript;

  if (glossary?.size) {
    const result = applyGlossary(current, glossary);
    current = result.transcript;
    edits.glossary = result.changedSegments;
    edits.dropped += result.droppedSegments;
  }

  if (config.redactPii) {
    const result = redactTranscript(current);
    current = result.transcript;
    edits.redacted = result.changedSegments;
    edits.dropped += result.droppedSegments;
  }

  if (config.polish.enabled) {
    const { maxCps, minDuration, maxDuration, mergeGap } = config.polish;
    const result = polishTranscript(current, { maxCps, minDuration, maxDuration, mergeGap, logger });
    current = result.transcript;
    edits.polish = result.stats;
  }

  if (edits.dropped) {
    logger?.info?.(`[Pipeline] ${edits.dropped} segment(s) left empty by caption edits were dropped`);
  }
  return { transcript: current, edits };
}

async function alignedTranscription(
  wav: string,
  workdir: string,
  config: CliConfig,
  selection: EngineSelection,
  options: ProcessFileOptions
): Promise<AlignedTranscript> {
  const outputDir = path.join(workdir, "aligned");
  await fs.mkdir(outputDir, { recursive: true });
  const raw = await runAlignedEngine(wav, outputDir, {
    command: config.whisperx.bin,
    model: config.whisperx.model,
    language: config.language,
    diarize: selection.useDiarization,
    hfToken: config.hfToken,
    computeType: config.whisperx.computeType,
    timeoutMs: config.timeoutMs,
    signal: options.signal,
    logger: options.logger,
  });
  return adaptAlignedOutput(parseAlignedJson(raw), {
    language: config.language === "auto" ? undefined : config.language,
    logger: options.logger,
  }).transcript;
}

/**
 * Runs every stage for one media file: track selection, base engine,
 * optional aligned engine, synchronization, caption edits, karaoke and
 * rendering.
 *
 * Recoverable problems become degradations in the result; fatal ones are
 * thrown as CaptionSyncError carrying the input file.
 */
export async function processFile(
  input: string,
  config: CliConfig,
  options: ProcessFileOptions = {}
): Promise<FileResult> {
  const { signal, logger } = options;
  const workdir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-sync-"));

  try {
    const tool = { timeoutMs: config.timeoutMs, signal, logger };
    const { stem, outputBase, cacheFile, metaFile } = getFilePaths(
      input,
      config.outputDir,
      options.outputName
    );
    const degradations: Degradation[] = [];

    // Extracted on first use: a cached base transcription run without the
    // aligned engine never needs the audio
    let extraction: Promise<string> | null = null;
    const audio = () =>
      (extraction ??= (async () => {
        const audioStream =
          config.audioStream ?? (await probeLongestAudioStream(config.ffprobeBin, input, tool));
        const wav = path.join(workdir, `${stem}.wav`);
        logger?.info?.(`[Pipeline] Extracting audio from ${input}`);
        await extractWav(config.ffmpegBin, input, wav, audioStream, tool);
        return wav;
      })());

    const base = await transcribe(input, audio, cacheFile, {
      ...tool,
      bin: config.whisper.bin,
      model: config.whisper.model,
      language: config.language,
      threads: config.whisper.threads,
      prompt: config.whisper.prompt,
      force: config.force,
      chunkSeconds: config.chunkSeconds,
      ffmpegBin: config.ffmpegBin,
      workdir,
    });
    if (!base.transcript.segments.length) {
      throw new CaptionSyncError(
        ErrorCode.BASE_OUTPUT_EMPTY,
        "The base engine recognized no speech"
      );
    }

    const selection = selectEngines({
      requestedEngine: config.engine,
      alignedRuntime:
        config.engine === "base_only" ? "unknown" : await probeAlignedRuntime(config.whisperx.bin),
      diarizeRequested: config.diarize,
      hfTokenPresent: Boolean(config.hfToken),
    });
    for (const reason of selection.reasons) {
      logger?.info?.(`[Pipeline] ${reason}`);
    }
    if (!selection.useAligned && config.engine === "auto") {
      degradations.push({
        stage: "aligned-engine",
        reason: "aligned runtime unavailable",
        fallback: "approximated word timing",
      });
    }
    if (config.diarize === "on" && !selection.useDiarization) {
      degradations.push({
        stage: "diarization",
        reason: "diarization requires the aligned engine",
        fallback: "no speaker labels",
      });
    }

    let aligned: AlignedTranscript | null = null;
    if (selection.useAligned) {
      const wav = await audio();
      try {
        aligned = await alignedTranscription(wav, workdir, config, selection, options);
      } catch (error) {
        if (isCaptionSyncError(error) && error.code === ErrorCode.ABORTED) throw error;
        if (!selection.fallbackOnFailure) {
          throw new CaptionSyncError(
            ErrorCode.ALIGNED_REQUIRED,
            `The aligned engine was required but failed: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        logger?.warn?.(`[Pipeline] Aligned engine failed, approximating: ${errorMessage(error)}`);
        degradations.push({
          stage: "aligned-engine",
          reason: errorMessage(error),
          fallback: "approximated word timing",
        });
      }
    }

    if (selection.useDiarization && aligned && !aligned.diarized) {
      degradations.push({
        stage: "diarization",
        reason: "the aligned engine returned no speaker turns",
        fallback: "no speaker labels",
      });
    }

    const synced = synchronize(base.transcript, aligned, {
      slack: config.alignSlack,
      approximate: config.approximate,
      clipWarnRatio: config.clipWarnRatio,
      clipFatalRatio: config.clipFatalRatio,
      logger,
    });
    const repairs = countRepairs(synced.repairs);
    degradations.push(...syncDegradations(repairs, aligned !== null));

    const glossary =
      options.glossary ??
      (config.glossaryFile ? await loadGlossaryFile(config.glossaryFile, logger) : undefined);
    const edited = editCaptions(synced.transcript, config, glossary, logger);

    const transcript = config.karaoke ? annotateReveals(edited.transcript) : edited.transcript;
    for (const issue of validateTranscript(transcript)) {
      logger?.debug?.(`[Pipeline] ${issue.kind} at ${issue.id}: ${issue.message}`);
    }

    const outputs: string[] = [];
    for (const format of outputFormats(config)) {
      const file = `${outputBase}${OUTPUT_EXTENSIONS[format]}`;
      await writeText(
        file,
        renderTranscript(format, transcript, {
          speakerPrefix: config.speakerPrefix,
          maxCharsPerLine: config.maxCharsPerLine,
          maxLines: config.maxLines,
        })
      );
      outputs.push(file);
    }

    await writeJSON(metaFile, {
      input,
      createdAt: new Date().toISOString(),
      language: transcript.language,
      sourceEngine: transcript.sourceEngine,
      diarized: transcript.diarized,
      metadata: transcript.metadata,
      selection,
      degradations,
      repairs,
      clipStats: synced.clipStats,
      edits: edited.edits,
      baseWarnings: base.warnings,
      outputs,
    });

    for (const degradation of degradations) {
      logger?.warn?.(
        `[Pipeline] ${path.basename(input)}: ${degradation.reason} (${degradation.fallback})`
      );
    }

    return {
      input,
      outputs,
      transcript,
      selection,
      degradations,
      edits: edited.edits,
      repairs,
      clipStats: synced.clipStats,
    };
  } catch (error) {
    throw withFile(error, input);
  } finally {
    await fs.rm(workdir, { recursive: true, force: true });
  }
}
