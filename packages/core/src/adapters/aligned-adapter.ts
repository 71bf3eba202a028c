import { z } from "zod";
import { AlignedOutputError } from "../errors";
import type { OptionalLogger } from "../logger";
import type { TimeInterval } from "../types/timing";
import type {
  AlignedSegment,
  AlignedTranscript,
  DiarizationTurn,
  RawWord,
} from "../types/transcript";
import { maxOverlapTurn, sortTurns } from "../utils/diarization";
import { segmentId, wordId } from "../utils/ids";
import { joinWordsText, normalizeText, wordSeparatorFor } from "../utils/words";

// Engines occasionally emit timestamps as strings or leave them out for
// tokens they could not align; anything non-finite becomes null.
const timestamp = z.unknown().transform((value): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
});

const speakerLabel = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const alignedWordSchema = z.object({
  word: z.string().nullish(),
  text: z.string().nullish(),
  start: timestamp,
  end: timestamp,
  score: timestamp,
  speaker: speakerLabel,
});

const alignedSegmentSchema = z.object({
  start: timestamp,
  end: timestamp,
  text: z.string().nullish(),
  speaker: speakerLabel,
  words: z.array(alignedWordSchema).nullish(),
});

const diarizationTurnSchema = z.object({
  start: z.number(),
  end: z.number(),
  speaker: z.string().min(1),
});

export const alignedOutputSchema = z
  .object({
    language: z.string().nullish(),
    segments: z.array(alignedSegmentSchema).optional(),
    result: z.object({ segments: z.array(alignedSegmentSchema) }).optional(),
    diarization: z.array(diarizationTurnSchema).nullish(),
  })
  .refine((value) => value.segments !== undefined || value.result !== undefined, {
    message: "expected a segments array",
  });

export type AlignedEngineOutput = z.input<typeof alignedOutputSchema>;

type ParsedSegment = z.output<typeof alignedSegmentSchema>;

export interface AlignedAdapterOptions {
  /** Used when the engine output carries no language */
  language?: string;
  logger?: OptionalLogger;
}

export interface AlignedAdapterResult {
  transcript: AlignedTranscript;
  warnings: string[];
}

const toInterval = (start: number | null, end: number | null): TimeInterval | null =>
  start === null || end === null ? null : { start, end };

const clampConfidence = (score: number | null): number | undefined =>
  score === null ? undefined : Math.min(1, Math.max(0, score));

function segmentBounds(
  segment: ParsedSegment,
  words: RawWord[]
): TimeInterval | null {
  const timed = words.flatMap((word) => (word.interval ? [word.interval] : []));
  const start =
    segment.start ?? (timed.length ? Math.min(...timed.map((i) => i.start)) : null);
  const end =
    segment.end ?? (timed.length ? Math.max(...timed.map((i) => i.end)) : null);
  if (start === null || end === null) return null;
  return { start, end: Math.max(start, end) };
}

/**
 * Turns from explicit diarization output, else from the speaker labels the
 * engine put on segments (or, failing that, on words).
 */
function collectTurns(
  explicit: ReadonlyArray<z.output<typeof diarizationTurnSchema>> | null | undefined,
  segments: AlignedSegment[]
): DiarizationTurn[] {
  if (explicit?.length) {
    return sortTurns(
      explicit.map((turn) => ({
        interval: { start: turn.start, end: Math.max(turn.start, turn.end) },
        speaker: turn.speaker,
      }))
    );
  }

  const fromSegments = segments.flatMap((segment) =>
    segment.speaker ? [{ interval: segment.interval, speaker: segment.speaker }] : []
  );
  if (fromSegments.length) return sortTurns(fromSegments);

  return sortTurns(
    segments.flatMap((segment) =>
      segment.words.flatMap((word) =>
        word.speaker && word.interval
          ? [{ interval: { ...word.interval }, speaker: word.speaker }]
          : []
      )
    )
  );
}

/**
 * Parses the aligned engine's JSON text. Syntax errors surface as
 * AlignedOutputError so callers treat them like any other unusable output.
 */
export function parseAlignedJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new AlignedOutputError("Aligned engine output is not valid JSON", {
      cause: error,
    });
  }
}

/**
 * Normalizes the word-aligned engine's structured output.
 *
 * Words that failed to align keep `interval: null`; the synchronizer
 * interpolates them. When diarization turns are available every timed word
 * and every segment is labelled with the turn it overlaps most.
 */
export function adaptAlignedOutput(
  output: unknown,
  options: AlignedAdapterOptions = {}
): AlignedAdapterResult {
  const parsed = alignedOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new AlignedOutputError(
      `Aligned engine output failed validation: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
      { cause: parsed.error }
    );
  }

  const data = parsed.data;
  const language = data.language?.trim() || options.language || "unknown";
  const separator = wordSeparatorFor(language);
  const rawSegments = data.segments ?? data.result?.segments ?? [];
  const warnings: string[] = [];
  const segments: AlignedSegment[] = [];

  rawSegments.forEach((rawSegment, segmentIndex) => {
    const id = segmentId(segments.length);
    const words: RawWord[] = [];

    (rawSegment.words ?? []).forEach((rawWord, wordIndex) => {
      const text = (rawWord.word ?? rawWord.text ?? "").trim();
      if (!text) {
        warnings.push(`segment ${segmentIndex}, word ${wordIndex}: empty text, dropped`);
        return;
      }
      words.push({
        id: wordId(id, words.length),
        interval: toInterval(rawWord.start, rawWord.end),
        text,
        confidence: clampConfidence(rawWord.score),
        speaker: rawWord.speaker,
      });
    });

    const interval = segmentBounds(rawSegment, words);
    if (!interval) {
      warnings.push(`segment ${segmentIndex}: no usable timestamps, dropped`);
      return;
    }

    const text = words.length
      ? joinWordsText(words, separator)
      : normalizeText(rawSegment.text ?? "");
    if (!text) {
      warnings.push(`segment ${segmentIndex}: no words, dropped`);
      return;
    }

    segments.push({
      id,
      interval,
      text,
      words,
      speaker: rawSegment.speaker,
    });
  });

  const turns = collectTurns(data.diarization, segments);
  const diarized = turns.length > 0;

  const labelled = diarized
    ? segments.map((segment) => ({
        ...segment,
        speaker: maxOverlapTurn(segment.interval, turns)?.speaker ?? segment.speaker,
        words: segment.words.map((word) => ({
          ...word,
          speaker:
            (word.interval && maxOverlapTurn(word.interval, turns)?.speaker) ||
            word.speaker,
        })),
      }))
    : segments;

  for (const warning of warnings) {
    options.logger?.warn?.(`[AlignedAdapter] ${warning}`);
  }

  return {
    transcript: {
      language,
      segments: labelled,
      sourceEngine: "aligned",
      diarized,
      turns,
    },
    warnings,
  };
}
