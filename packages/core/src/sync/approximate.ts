import type { Segment, Word } from "../types/transcript";
import { wordId } from "../utils/ids";
import { distributeByCharacters, splitWords } from "../utils/words";

/**
 * Synthesizes words for a segment that has no measured word timing.
 *
 * This is a linear interpolation, not recognition: the segment's duration
 * is shared between its whitespace-separated tokens in proportion to their
 * character counts.
 */
export function approximateWords(segment: Segment, language: string): Word[] {
  const texts = splitWords(segment.text, language);
  const intervals = distributeByCharacters(texts, segment.interval);

  return texts.map((text, index) => ({
    id: wordId(segment.id, index),
    interval: intervals[index],
    text,
    ...(segment.speaker ? { speaker: segment.speaker } : {}),
  }));
}

export function approximateSegment(segment: Segment, language: string): Segment {
  return {
    ...segment,
    words: approximateWords(segment, language),
    wordTiming: "approximated",
  };
}
