import type { TimeInterval } from "../types/timing";
import type { DiarizationTurn, RawWord, Segment, Word } from "../types/transcript";
import { majoritySpeaker, maxOverlapTurn, nearestTurn } from "../utils/diarization";
import { TIME_EPSILON, clampInterval, sameInterval } from "../utils/timing";
import type { RepairAction } from "./types";

/**
 * Inverted intervals (end before start) collapse to a zero-length marker at
 * their start.
 */
export function repairInverted(
  word: RawWord,
  repairs: RepairAction[]
): RawWord {
  const interval = word.interval;
  if (!interval || interval.end >= interval.start) return word;

  const repaired = { start: interval.start, end: interval.start };
  repairs.push({
    kind: "inverted-interval",
    word: word.text,
    original: { ...interval },
    repaired,
  });
  return { ...word, interval: repaired };
}

/** Pulls timed words into their segment's interval. */
export function clampWords(
  segment: { id: string; interval: TimeInterval },
  words: RawWord[],
  repairs: RepairAction[]
): RawWord[] {
  return words.map((word) => {
    if (!word.interval) return word;
    const clamped = clampInterval(word.interval, segment.interval);
    if (sameInterval(clamped, word.interval)) return word;

    repairs.push({
      kind: "clamped-word",
      segmentId: segment.id,
      word: word.text,
      original: { ...word.interval },
      repaired: clamped,
    });
    return { ...word, interval: clamped };
  });
}

/**
 * Gives every untimed word an interval by splitting the gap between its
 * timed neighbours evenly across the run of untimed words. Runs at either
 * edge of the segment use the segment boundary as the missing neighbour.
 */
export function interpolateMissing(
  segment: { id: string; interval: TimeInterval },
  words: RawWord[],
  repairs: RepairAction[]
): Word[] {
  const result: Word[] = [];
  let i = 0;

  while (i < words.length) {
    const word = words[i];
    if (word.interval) {
      result.push({ ...word, interval: word.interval });
      i++;
      continue;
    }

    let runEnd = i;
    while (runEnd < words.length && !words[runEnd].interval) runEnd++;

    const left = result.length
      ? result[result.length - 1].interval.end
      : segment.interval.start;
    const nextInterval = runEnd < words.length ? words[runEnd].interval : null;
    const right = Math.max(left, nextInterval ? nextInterval.start : segment.interval.end);
    const step = (right - left) / (runEnd - i);

    for (let k = i; k < runEnd; k++) {
      const offset = k - i;
      const interval = {
        start: left + step * offset,
        end: k === runEnd - 1 ? right : left + step * (offset + 1),
      };
      repairs.push({
        kind: "interpolated-word",
        segmentId: segment.id,
        word: words[k].text,
        interval,
      });
      result.push({ ...words[k], interval });
    }
    i = runEnd;
  }

  return result;
}

/**
 * Walks segments and their words in order and moves every start that
 * precedes the previous element's end forward to that end. Nothing ever
 * moves backward. Returns the number of clips.
 */
export function enforceMonotonic(
  segments: Segment[],
  repairs: RepairAction[]
): number {
  let clipped = 0;
  let cursor = Number.NEGATIVE_INFINITY;

  for (const segment of segments) {
    if (segment.interval.start < cursor - TIME_EPSILON) {
      repairs.push({
        kind: "monotonic-clip",
        target: "segment",
        id: segment.id,
        from: segment.interval.start,
        to: cursor,
      });
      segment.interval = {
        start: cursor,
        end: Math.max(cursor, segment.interval.end),
      };
      clipped++;
    }

    let floor = segment.interval.start;
    for (const word of segment.words) {
      if (word.interval.start < floor - TIME_EPSILON) {
        repairs.push({
          kind: "monotonic-clip",
          target: "word",
          id: word.id,
          from: word.interval.start,
          to: floor,
        });
        word.interval = {
          start: floor,
          end: Math.min(Math.max(floor, word.interval.end), segment.interval.end),
        };
        clipped++;
      }
      floor = Math.max(floor, word.interval.end);
    }

    cursor = Math.max(cursor, segment.interval.end);
  }

  return clipped;
}

/**
 * Makes a diarized transcript complete: words the adapter could not label
 * inherit the overlapping or, failing that, the nearest turn; segments
 * without a speaker take their words' majority speaker.
 */
export function attachSpeakers(
  segments: Segment[],
  turns: DiarizationTurn[],
  repairs: RepairAction[]
): void {
  if (!turns.length) return;

  for (const segment of segments) {
    for (const word of segment.words) {
      if (word.speaker) continue;
      const turn =
        maxOverlapTurn(word.interval, turns) ?? nearestTurn(word.interval, turns);
      if (!turn) continue;
      word.speaker = turn.speaker;
      repairs.push({
        kind: "speaker-inherited",
        target: "word",
        id: word.id,
        speaker: turn.speaker,
      });
    }

    if (!segment.speaker) {
      const speaker =
        majoritySpeaker(segment.words) ??
        (maxOverlapTurn(segment.interval, turns) ?? nearestTurn(segment.interval, turns))
          ?.speaker;
      if (speaker) {
        segment.speaker = speaker;
        repairs.push({
          kind: "speaker-inherited",
          target: "segment",
          id: segment.id,
          speaker,
        });
      }
    }
  }
}
