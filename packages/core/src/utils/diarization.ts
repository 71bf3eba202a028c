import type { TimeInterval } from "../types/timing";
import type { DiarizationTurn, SpeakerId } from "../types/transcript";
import { TIME_EPSILON, distance, overlap } from "./timing";

/**
 * Turn with the largest overlap with `interval`; ties go to the turn that
 * starts first. `undefined` when nothing overlaps.
 */
export function maxOverlapTurn(
  interval: TimeInterval,
  turns: DiarizationTurn[]
): DiarizationTurn | undefined {
  let best: DiarizationTurn | undefined;
  let bestOverlap = 0;

  for (const turn of turns) {
    const amount = overlap(interval, turn.interval);
    if (amount <= TIME_EPSILON) continue;

    if (
      !best ||
      amount > bestOverlap + TIME_EPSILON ||
      (Math.abs(amount - bestOverlap) <= TIME_EPSILON &&
        turn.interval.start < best.interval.start)
    ) {
      best = turn;
      bestOverlap = amount;
    }
  }

  return best;
}

/**
 * Turn closest to `interval`; on equal distance the preceding (earlier
 * starting) turn wins.
 */
export function nearestTurn(
  interval: TimeInterval,
  turns: DiarizationTurn[]
): DiarizationTurn | undefined {
  let best: DiarizationTurn | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const turn of turns) {
    const gap = distance(interval, turn.interval);
    if (
      !best ||
      gap < bestDistance - TIME_EPSILON ||
      (Math.abs(gap - bestDistance) <= TIME_EPSILON &&
        turn.interval.start < best.interval.start)
    ) {
      best = turn;
      bestDistance = gap;
    }
  }

  return best;
}

export function sortTurns(turns: DiarizationTurn[]): DiarizationTurn[] {
  return [...turns].sort(
    (a, b) => a.interval.start - b.interval.start || a.interval.end - b.interval.end
  );
}

/**
 * Speaker carrying most of the given words' time (word count when every
 * word is zero-length). Ties go to the speaker heard first.
 */
export function majoritySpeaker(
  words: ReadonlyArray<{ speaker?: SpeakerId; interval: TimeInterval | null }>
): SpeakerId | undefined {
  const weights = new Map<SpeakerId, number>();
  const counts = new Map<SpeakerId, number>();

  for (const word of words) {
    if (!word.speaker) continue;
    const span = word.interval ? word.interval.end - word.interval.start : 0;
    weights.set(word.speaker, (weights.get(word.speaker) ?? 0) + Math.max(0, span));
    counts.set(word.speaker, (counts.get(word.speaker) ?? 0) + 1);
  }

  let best: SpeakerId | undefined;
  for (const speaker of counts.keys()) {
    if (!best) {
      best = speaker;
      continue;
    }
    const weight = weights.get(speaker) ?? 0;
    const bestWeight = weights.get(best) ?? 0;
    if (
      weight > bestWeight + TIME_EPSILON ||
      (Math.abs(weight - bestWeight) <= TIME_EPSILON &&
        (counts.get(speaker) ?? 0) > (counts.get(best) ?? 0))
    ) {
      best = speaker;
    }
  }

  return best;
}
