import type { OptionalLogger } from "../logger";
import type { Segment, Transcript } from "../types/transcript";
import { renumberSegments } from "../utils/ids";
import { describeWordTiming } from "../utils/metadata";
import { TIME_EPSILON, duration } from "../utils/timing";
import {
  distributeByCharacters,
  joinWordsText,
  splitWords,
  wordSeparatorFor,
} from "../utils/words";

export interface PolishOptions {
  /** Reading speed ceiling in characters per second */
  maxCps?: number;
  /** Seconds */
  minDuration?: number;
  /** Seconds; longer segments of four or more words are split */
  maxDuration?: number;
  /** Neighbours closer than this many seconds are merged */
  mergeGap?: number;
  logger?: OptionalLogger;
}

export const DEFAULT_POLISH_OPTIONS = {
  maxCps: 17,
  minDuration: 0.7,
  maxDuration: 7,
  mergeGap: 0.2,
} as const;

export interface PolishStats {
  merged: number;
  split: number;
  extended: number;
}

export interface PolishResult {
  transcript: Transcript;
  stats: PolishStats;
}

const MIN_SPLIT_WORDS = 4;

function mergeClose(
  segments: Segment[],
  separator: string,
  mergeGap: number,
  maxDuration: number
): { segments: Segment[]; merged: number } {
  const result: Segment[] = [];
  let merged = 0;

  for (const segment of segments) {
    const previous = result[result.length - 1];
    const gap = previous ? segment.interval.start - previous.interval.end : Infinity;
    if (
      previous &&
      gap >= -TIME_EPSILON &&
      gap <= mergeGap + TIME_EPSILON &&
      previous.speaker === segment.speaker &&
      previous.wordTiming === segment.wordTiming &&
      segment.interval.end - previous.interval.start <= maxDuration + TIME_EPSILON
    ) {
      result[result.length - 1] = {
        ...previous,
        interval: { start: previous.interval.start, end: segment.interval.end },
        text: [previous.text, segment.text].join(separator),
        words: [...previous.words, ...segment.words],
      };
      merged++;
    } else {
      result.push(segment);
    }
  }

  return { segments: result, merged };
}

/** Index ranges of `count` items cut into `parts` groups, larger groups first. */
function partition(count: number, parts: number): Array<[number, number]> {
  const size = Math.floor(count / parts);
  const extra = count % parts;
  const ranges: Array<[number, number]> = [];
  let from = 0;
  for (let part = 0; part < parts; part++) {
    const to = from + size + (part < extra ? 1 : 0);
    ranges.push([from, to]);
    from = to;
  }
  return ranges;
}

/**
 * Cuts a long segment on word boundaries. With timed words each piece runs
 * from its first word to the next piece's first word and takes its text from
 * its words; without them the text is cut and timed by character count.
 */
function splitLong(segment: Segment, maxDuration: number, language: string): Segment[] {
  const separator = wordSeparatorFor(language);
  const span = duration(segment.interval);
  const tokens = segment.words.length
    ? segment.words.map((word) => word.text)
    : splitWords(segment.text, language);
  if (span <= maxDuration + TIME_EPSILON || tokens.length < MIN_SPLIT_WORDS) {
    return [segment];
  }

  const parts = Math.min(tokens.length, Math.max(2, Math.ceil(span / maxDuration)));
  const ranges = partition(tokens.length, parts);

  if (!segment.words.length) {
    const texts = ranges.map(([from, to]) => tokens.slice(from, to).join(separator));
    const intervals = distributeByCharacters(texts, segment.interval);
    return texts.map((text, index) => ({ ...segment, interval: intervals[index], text, words: [] }));
  }

  const { words } = segment;
  return ranges.map(([from, to], index) => {
    const piece = words.slice(from, to);
    return {
      ...segment,
      interval: {
        start: index === 0 ? segment.interval.start : piece[0].interval.start,
        end: index === ranges.length - 1 ? segment.interval.end : words[to].interval.start,
      },
      text: joinWordsText(piece, separator),
      words: piece,
    };
  });
}

/**
 * Lengthens segments that are too short to read, either below the minimum
 * duration or above the reading speed, without reaching into the next one.
 * Segments are never shortened.
 */
function extendForReading(
  segments: Segment[],
  options: { maxCps: number; minDuration: number; maxDuration: number }
): { segments: Segment[]; extended: number } {
  let extended = 0;
  const result = segments.map((segment, index) => {
    const { start, end } = segment.interval;
    const characters = Array.from(segment.text).length;

    let wanted = Math.max(end - start, options.minDuration);
    if (characters / wanted > options.maxCps) {
      wanted = Math.max(wanted, Math.min(characters / options.maxCps, options.maxDuration));
    }

    const next = segments[index + 1];
    const limit = next ? next.interval.start : Infinity;
    const newEnd = Math.max(end, Math.min(start + wanted, limit));
    if (newEnd <= end + TIME_EPSILON) return segment;

    extended++;
    return { ...segment, interval: { start, end: newEnd } };
  });
  return { segments: result, extended };
}

/**
 * Reshapes the cues for reading: merges neighbours separated by a short gap,
 * splits segments longer than `maxDuration`, then extends segments that are
 * too short or too dense. Timing stays monotonic and every word stays inside
 * its segment.
 */
export function polishTranscript(
  transcript: Transcript,
  options: PolishOptions = {}
): PolishResult {
  const {
    maxCps = DEFAULT_POLISH_OPTIONS.maxCps,
    minDuration = DEFAULT_POLISH_OPTIONS.minDuration,
    maxDuration = DEFAULT_POLISH_OPTIONS.maxDuration,
    mergeGap = DEFAULT_POLISH_OPTIONS.mergeGap,
    logger,
  } = options;
  const { language } = transcript;

  const merging = mergeClose(
    transcript.segments,
    wordSeparatorFor(language),
    mergeGap,
    maxDuration
  );

  let split = 0;
  const pieces = merging.segments.flatMap((segment) => {
    const parts = splitLong(segment, maxDuration, language);
    if (parts.length > 1) split++;
    return parts;
  });

  const extension = extendForReading(pieces, { maxCps, minDuration, maxDuration });
  const segments = renumberSegments(extension.segments);
  const stats = { merged: merging.merged, split, extended: extension.extended };

  logger?.debug?.(
    `[Polish] ${stats.merged} merged, ${stats.split} split, ${stats.extended} extended`
  );

  return {
    transcript: {
      ...transcript,
      segments,
      ...(transcript.metadata
        ? { metadata: describeWordTiming(segments, transcript.metadata.syntheticSegments) }
        : {}),
    },
    stats,
  };
}
