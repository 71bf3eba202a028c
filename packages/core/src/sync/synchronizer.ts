import { DesyncError } from "../errors";
import type { TimeInterval } from "../types/timing";
import type {
  AlignedTranscript,
  RawWord,
  Segment,
  SpeakerId,
  Transcript,
} from "../types/transcript";
import { majoritySpeaker, maxOverlapTurn } from "../utils/diarization";
import { segmentId, wordId } from "../utils/ids";
import { describeWordTiming } from "../utils/metadata";
import { TIME_EPSILON, midpoint } from "../utils/timing";
import { joinWordsText, wordSeparatorFor } from "../utils/words";
import { approximateWords } from "./approximate";
import { assignWords, flattenAligned, type AlignedEntry } from "./assign";
import {
  attachSpeakers,
  clampWords,
  enforceMonotonic,
  interpolateMissing,
  repairInverted,
} from "./repair";
import {
  DEFAULT_SYNC_OPTIONS,
  type ClipStats,
  type RepairAction,
  type SyncOptions,
  type SyncResult,
} from "./types";

interface DraftSegment {
  interval: TimeInterval;
  text: string;
  speaker?: SpeakerId;
  /** Measured words; `null` when the segment needs approximation */
  words: RawWord[] | null;
  synthetic: boolean;
}

const byTime = (a: DraftSegment, b: DraftSegment) =>
  a.interval.start - b.interval.start || a.interval.end - b.interval.end;

/**
 * Narrows `interval` to the gap between the base segments around its
 * midpoint, so a synthetic segment never covers base speech.
 */
function fitIntoGap(interval: TimeInterval, baseSegments: Segment[]): TimeInterval {
  const point = midpoint(interval);
  let { start, end } = interval;
  for (const segment of baseSegments) {
    const bounds = segment.interval;
    if (bounds.start < point - TIME_EPSILON && bounds.end > point + TIME_EPSILON) {
      return interval;
    }
    if (bounds.end <= point + TIME_EPSILON) start = Math.max(start, bounds.end);
    else end = Math.min(end, bounds.start);
  }
  return { start, end: Math.max(start, end) };
}

/** Bounds of the timed words, else the aligned segment they came from. */
function orphanBounds(run: AlignedEntry[], baseSegments: Segment[]): TimeInterval {
  const timed = run.flatMap((entry) => (entry.word.interval ? [entry.word.interval] : []));
  if (!timed.length) return fitIntoGap({ ...run[0].sourceInterval }, baseSegments);
  const start = Math.min(...timed.map((interval) => interval.start));
  const end = Math.max(...timed.map((interval) => interval.end));
  return fitIntoGap({ start, end: Math.max(start, end) }, baseSegments);
}

const baseSegmentBetween = (from: number, to: number, baseSegments: Segment[]) =>
  baseSegments.some(
    (segment) =>
      segment.interval.start < to - TIME_EPSILON && segment.interval.end > from + TIME_EPSILON
  );

/**
 * Groups consecutive orphans that share an aligned segment. A run is split
 * wherever base speech lies between two of its timed words.
 */
function collectOrphanRuns(
  entries: AlignedEntry[],
  targets: Array<number | null>,
  baseSegments: Segment[]
): AlignedEntry[][] {
  const runs: AlignedEntry[][] = [];
  let current: AlignedEntry[] = [];
  let lastEnd: number | null = null;

  entries.forEach((entry, index) => {
    const isOrphan = targets[index] === null;
    const interval = entry.word.interval;
    const continues =
      isOrphan &&
      current.length > 0 &&
      current[0].source === entry.source &&
      !(interval && lastEnd !== null && baseSegmentBetween(lastEnd, interval.start, baseSegments));

    if (continues) {
      current.push(entry);
    } else {
      if (current.length) runs.push(current);
      current = isOrphan ? [entry] : [];
      lastEnd = null;
    }
    if (isOrphan && interval) lastEnd = Math.max(lastEnd ?? interval.end, interval.end);
  });
  if (current.length) runs.push(current);

  return runs;
}

function alignedDrafts(
  base: Transcript,
  aligned: AlignedTranscript,
  slack: number,
  language: string,
  repairs: RepairAction[]
): DraftSegment[] {
  const separator = wordSeparatorFor(language);
  const entries = flattenAligned(aligned).map((entry) => ({
    ...entry,
    word: repairInverted(entry.word, repairs),
  }));
  const { targets } = assignWords(entries, base.segments, slack);

  const matched: RawWord[][] = base.segments.map(() => []);
  entries.forEach((entry, index) => {
    const target = targets[index];
    if (target !== null) matched[target].push(entry.word);
  });

  const speakerFor = (interval: TimeInterval, words: RawWord[]) =>
    maxOverlapTurn(interval, aligned.turns)?.speaker ?? majoritySpeaker(words);

  const drafts: DraftSegment[] = base.segments.map((segment, index) => {
    const words = matched[index];
    if (!words.length) {
      return {
        interval: { ...segment.interval },
        text: segment.text,
        speaker: aligned.turns.length
          ? maxOverlapTurn(segment.interval, aligned.turns)?.speaker
          : segment.speaker,
        words: null,
        synthetic: false,
      };
    }
    // Base owns the boundaries, the aligned engine owns the wording
    return {
      interval: { ...segment.interval },
      text: joinWordsText(words, separator),
      speaker: speakerFor(segment.interval, words),
      words,
      synthetic: false,
    };
  });

  for (const run of collectOrphanRuns(entries, targets, base.segments)) {
    const words = run.map((entry) => entry.word);
    const interval = orphanBounds(run, base.segments);
    drafts.push({
      interval,
      text: joinWordsText(words, separator),
      speaker: speakerFor(interval, words),
      words,
      synthetic: true,
    });
  }

  return drafts;
}

function buildSegment(
  draft: DraftSegment,
  index: number,
  language: string,
  approximate: boolean,
  repairs: RepairAction[]
): Segment {
  const id = segmentId(index);
  const shell = {
    id,
    interval: draft.interval,
    text: draft.text,
    ...(draft.speaker ? { speaker: draft.speaker } : {}),
  };

  if (draft.words === null) {
    if (!approximate) return { ...shell, words: [] };
    const words = approximateWords({ ...shell, words: [] }, language);
    repairs.push({ kind: "approximated-segment", segmentId: id, words: words.length });
    return { ...shell, words, wordTiming: "approximated" };
  }

  if (draft.synthetic) {
    repairs.push({
      kind: "orphan-segment",
      segmentId: id,
      words: draft.words.length,
      interval: { ...draft.interval },
    });
  }

  const clamped = clampWords(shell, draft.words, repairs);
  const words = interpolateMissing(shell, clamped, repairs).map((word, wordIndex) => ({
    ...word,
    id: wordId(id, wordIndex),
  }));
  return { ...shell, words, wordTiming: "aligned" };
}

/**
 * Merges the base transcript with the optional word-aligned transcript into
 * one transcript whose segments and words never overlap.
 *
 * Without aligned data every segment gets proportionally approximated
 * words. With it, aligned words are matched to base segments by midpoint
 * inside the slack window; unmatched words become synthetic segments and
 * unmatched base segments fall back to approximation. Inverted and missing
 * word intervals are repaired, then a final pass clips every backwards start.
 *
 * @throws DesyncError when the clipped fraction exceeds `clipFatalRatio`
 */
export function synchronize(
  base: Transcript,
  aligned?: AlignedTranscript | null,
  options: SyncOptions = {}
): SyncResult {
  const {
    slack = DEFAULT_SYNC_OPTIONS.slack,
    approximate = DEFAULT_SYNC_OPTIONS.approximate,
    clipWarnRatio = DEFAULT_SYNC_OPTIONS.clipWarnRatio,
    clipFatalRatio = DEFAULT_SYNC_OPTIONS.clipFatalRatio,
    logger,
  } = options;

  const language =
    base.language && base.language !== "unknown"
      ? base.language
      : aligned?.language ?? base.language;
  const repairs: RepairAction[] = [];

  const drafts: DraftSegment[] = aligned
    ? alignedDrafts(base, aligned, slack, language, repairs)
    : base.segments.map((segment) => ({
        interval: { ...segment.interval },
        text: segment.text,
        speaker: segment.speaker,
        words: null,
        synthetic: false,
      }));

  const segments = [...drafts]
    .sort(byTime)
    .map((draft, index) => buildSegment(draft, index, language, approximate, repairs));

  const monotonicClips = enforceMonotonic(segments, repairs);

  const diarized = Boolean(aligned?.diarized && aligned.turns.length);
  if (diarized && aligned) {
    attachSpeakers(segments, aligned.turns, repairs);
  }

  const inverted = repairs.filter((repair) => repair.kind === "inverted-interval").length;
  const total = segments.reduce((sum, segment) => sum + 1 + segment.words.length, 0);
  const clipped = monotonicClips + inverted;
  const clipStats: ClipStats = {
    clipped,
    total,
    ratio: total ? clipped / total : 0,
  };

  const metadata = describeWordTiming(
    segments,
    repairs.filter((repair) => repair.kind === "orphan-segment").length
  );

  logger?.debug?.(
    `[Sync] ${segments.length} segments, word timing ${metadata.wordTiming}, ${clipped} clipped of ${total}`
  );
  if (metadata.syntheticSegments) {
    logger?.info?.(
      `[Sync] ${metadata.syntheticSegments} segment(s) synthesized from aligned words the base engine missed`
    );
  }

  if (clipStats.ratio > clipFatalRatio) {
    throw new DesyncError({ ...clipStats, threshold: clipFatalRatio });
  }
  if (clipStats.ratio > clipWarnRatio) {
    logger?.warn?.(
      `[Sync] ${clipped}/${total} elements clipped to keep timing monotonic (warning threshold ${clipWarnRatio})`
    );
  }

  return {
    transcript: {
      language,
      segments,
      sourceEngine: aligned ? "aligned" : "base",
      diarized,
      metadata,
    },
    repairs,
    clipStats,
  };
}
