import { parseSync } from "subtitle";
import type { OptionalLogger } from "../logger";
import type { Segment, Transcript } from "../types/transcript";
import { segmentId } from "../utils/ids";
import { TIME_EPSILON, formatClock, parseTimestamp } from "../utils/timing";
import { normalizeText, wordSeparatorFor } from "../utils/words";

export interface BaseAdapterOptions {
  language?: string;
  logger?: OptionalLogger;
}

export interface BaseAdapterResult {
  transcript: Transcript;
  warnings: string[];
}

interface RawCue {
  start: number;
  end: number;
  lines: string[];
  /** Where the cue came from (`line 12`, `cue 3`), for warnings */
  label: string;
}

interface DraftCue {
  interval: { start: number; end: number };
  text: string;
  label: string;
}

const TS = "(?:\\d+:)?\\d{1,2}:\\d{1,2}(?:[,.]\\d{1,3})?|\\d+(?:\\.\\d+)?";

// "[00:00:01.000 --> 00:00:02.500]  text", "00:00:01,000 --> 00:00:02,500" or "1.0 --> 2.5 text"
const TIMING_LINE = new RegExp(
  `^\\s*\\[?\\s*(${TS})\\s*-->\\s*(${TS})\\s*\\]?\\s*(.*)$`
);
const INDEX_LINE = /^\s*\d+\s*$/;
// An index row followed by an SRT timing row
const SRT_CUE = /^\s*\d+\s*\n\s*\d{1,2}:\d{2}:\d{2}[,.]\d{1,3}\s*-->/m;

function readSrtCues(content: string): RawCue[] {
  return parseSync(content)
    .flatMap((node) => (node.type === "cue" ? [node.data] : []))
    .map((cue, index) => ({
      start: cue.start / 1000,
      end: cue.end / 1000,
      lines: cue.text.split("\n"),
      label: `cue ${index + 1}`,
    }));
}

function readTimedLines(content: string, warnings: string[]): RawCue[] {
  const lines = content.split("\n");
  const cues: RawCue[] = [];
  let current: RawCue | null = null;

  for (const [index, line] of lines.entries()) {
    const timing = TIMING_LINE.exec(line);
    if (timing) {
      const start = parseTimestamp(timing[1]);
      const end = parseTimestamp(timing[2]);
      if (start === null || end === null) {
        warnings.push(`line ${index + 1}: unreadable timestamps, skipped`);
        current = null;
        continue;
      }
      const inlineText = (timing[3] ?? "").trim();
      current = {
        start,
        end,
        lines: inlineText ? [inlineText] : [],
        label: `line ${index + 1}`,
      };
      cues.push(current);
      continue;
    }

    if (!line.trim()) {
      current = null;
      continue;
    }

    // SRT index rows sit right before a timing row
    const next = lines[index + 1];
    if (INDEX_LINE.test(line) && next !== undefined && TIMING_LINE.test(next)) {
      continue;
    }

    current?.lines.push(line.trim());
  }

  return cues;
}

/**
 * SRT goes through the `subtitle` parser; whisper.cpp console lines and
 * fractional-seconds lines are read line by line.
 */
function readCues(raw: string, warnings: string[], logger?: OptionalLogger): RawCue[] {
  const content = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  if (!SRT_CUE.test(content)) {
    return readTimedLines(content, warnings);
  }

  try {
    return readSrtCues(content);
  } catch (error) {
    logger?.warn?.(
      `[BaseAdapter] SRT parser failed, reading line by line: ${error instanceof Error ? error.message : String(error)}`
    );
    return readTimedLines(content, warnings);
  }
}

const byStart = (a: RawCue, b: RawCue) => a.start - b.start || a.end - b.end;

const cueKey = (cue: DraftCue) =>
  `${Math.round(cue.interval.start * 1000)}|${Math.round(cue.interval.end * 1000)}|${cue.text}`;

function mergeText(outer: string, inner: string, separator: string): string {
  if (outer.includes(inner)) return outer;
  if (inner.includes(outer)) return inner;
  return `${outer}${separator}${inner}`;
}

/**
 * Resolves overlaps between sorted cues. A cue lying inside another (or
 * sharing its start) is merged into it; a partial overlap is clipped at the
 * midpoint of the overlapping region.
 */
function resolveOverlaps(
  cues: DraftCue[],
  separator: string,
  warnings: string[]
): DraftCue[] {
  const resolved: DraftCue[] = [];

  for (const current of cues) {
    const prev = resolved[resolved.length - 1];
    if (!prev || current.interval.start >= prev.interval.end - TIME_EPSILON) {
      resolved.push(current);
      continue;
    }

    const contained =
      current.interval.end <= prev.interval.end + TIME_EPSILON ||
      Math.abs(current.interval.start - prev.interval.start) <= TIME_EPSILON;
    if (contained) {
      warnings.push(
        `${current.label}: inside the cue at ${formatClock(prev.interval.start)}, merged`
      );
      prev.interval = {
        start: prev.interval.start,
        end: Math.max(prev.interval.end, current.interval.end),
      };
      prev.text = mergeText(prev.text, current.text, separator);
      continue;
    }

    const cut = (current.interval.start + prev.interval.end) / 2;
    warnings.push(
      `overlap between ${formatClock(prev.interval.start)} and ${formatClock(current.interval.start)} clipped at ${formatClock(cut)}`
    );
    prev.interval = { start: prev.interval.start, end: cut };
    current.interval = { start: cut, end: Math.max(cut, current.interval.end) };
    resolved.push(current);
  }

  return resolved;
}

/**
 * Converts the fast engine's textual output (SRT, whisper.cpp console lines
 * or fractional-seconds lines) into a segment-only transcript.
 *
 * Malformed, empty, zero-duration and duplicate cues are dropped with a
 * warning; nothing here is fatal.
 */
export function adaptBaseOutput(
  raw: string,
  options: BaseAdapterOptions = {}
): BaseAdapterResult {
  const { language = "unknown", logger } = options;
  const warnings: string[] = [];
  const drafts: DraftCue[] = [];
  const seen = new Set<string>();

  for (const cue of [...readCues(raw, warnings, logger)].sort(byStart)) {
    const text = normalizeText(cue.lines.join(" "));
    if (!text) {
      warnings.push(`${cue.label}: empty text, dropped`);
      continue;
    }
    if (cue.end - cue.start <= TIME_EPSILON) {
      warnings.push(`${cue.label}: zero or negative duration, dropped`);
      continue;
    }
    const draft = { interval: { start: cue.start, end: cue.end }, text, label: cue.label };
    const key = cueKey(draft);
    if (seen.has(key)) {
      warnings.push(`${cue.label}: duplicate segment, dropped`);
      continue;
    }
    seen.add(key);
    drafts.push(draft);
  }

  const segments: Segment[] = resolveOverlaps(drafts, wordSeparatorFor(language), warnings).map(
    (draft, index) => ({
      id: segmentId(index),
      interval: draft.interval,
      text: draft.text,
      words: [],
    })
  );

  for (const warning of warnings) {
    logger?.warn?.(`[BaseAdapter] ${warning}`);
  }

  return {
    transcript: {
      language,
      segments,
      sourceEngine: "base",
      diarized: false,
    },
    warnings,
  };
}
