import type { TimeInterval } from "../types/timing";
import type { AlignedTranscript, RawWord, Segment } from "../types/transcript";
import { TIME_EPSILON, midpoint, pointDistance } from "../utils/timing";

/** One aligned word, flattened out of its aligned segment. */
export interface AlignedEntry {
  word: RawWord;
  /** Index of the aligned segment the word came from */
  source: number;
  /** Interval of that aligned segment */
  sourceInterval: TimeInterval;
}

export interface Assignment {
  entries: AlignedEntry[];
  /** Base segment index per entry, `null` for orphans */
  targets: Array<number | null>;
}

export function flattenAligned(aligned: AlignedTranscript): AlignedEntry[] {
  return aligned.segments.flatMap((segment, source) =>
    segment.words.map((word) => ({
      word: { ...word, interval: word.interval ? { ...word.interval } : null },
      source,
      sourceInterval: segment.interval,
    }))
  );
}

/**
 * Finds the base segment whose slack window `[start - ε, end + ε]` contains
 * `point`. With several candidates the one nearest to the point wins, the
 * earlier one on ties. `cursor` is advanced past windows that end before
 * `point`, so callers walking points in ascending order scan each segment
 * once.
 */
function matchSegment(
  point: number,
  segments: Segment[],
  slack: number,
  cursor: { index: number }
): number | null {
  while (
    cursor.index < segments.length &&
    segments[cursor.index].interval.end + slack < point - TIME_EPSILON
  ) {
    cursor.index++;
  }

  let best: number | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let k = cursor.index; k < segments.length; k++) {
    const interval = segments[k].interval;
    if (interval.start - slack > point + TIME_EPSILON) break;
    if (interval.end + slack < point - TIME_EPSILON) continue;

    const gap = pointDistance(point, interval);
    if (gap < bestDistance - TIME_EPSILON) {
      best = k;
      bestDistance = gap;
    }
  }
  return best;
}

function nearestTimedTarget(
  entries: AlignedEntry[],
  targets: Array<number | null | undefined>,
  index: number
): number | null | undefined {
  const source = entries[index].source;
  for (let back = index - 1; back >= 0 && entries[back].source === source; back--) {
    if (entries[back].word.interval) return targets[back];
  }
  for (
    let ahead = index + 1;
    ahead < entries.length && entries[ahead].source === source;
    ahead++
  ) {
    if (entries[ahead].word.interval) return targets[ahead];
  }
  return undefined;
}

/**
 * Assigns every aligned word to a base segment by the midpoint of its
 * interval. Words without an interval follow the nearest timed word of the
 * same aligned segment; when the whole aligned segment is untimed, its own
 * midpoint decides.
 */
export function assignWords(
  entries: AlignedEntry[],
  baseSegments: Segment[],
  slack: number
): Assignment {
  const targets: Array<number | null | undefined> = entries.map(() => undefined);

  const timedOrder = entries
    .map((entry, index) => ({ index, interval: entry.word.interval }))
    .flatMap(({ index, interval }) =>
      interval ? [{ index, point: midpoint(interval) }] : []
    )
    .sort((a, b) => a.point - b.point || a.index - b.index);

  const cursor = { index: 0 };
  for (const { index, point } of timedOrder) {
    targets[index] = matchSegment(point, baseSegments, slack, cursor);
  }

  const resolved = entries.map((entry, index) => {
    const target = targets[index];
    if (target !== undefined) return target;

    const inherited = nearestTimedTarget(entries, targets, index);
    if (inherited !== undefined) return inherited;

    return matchSegment(midpoint(entry.sourceInterval), baseSegments, slack, {
      index: 0,
    });
  });

  return { entries, targets: resolved };
}
