import type { Segment } from "../types/transcript";

// Ids are positional so identical input always yields identical output.

export const segmentId = (index: number): string =>
  `seg-${String(index + 1).padStart(4, "0")}`;

export const wordId = (segmentIdValue: string, index: number): string =>
  `${segmentIdValue}-w${index + 1}`;

/** Reassigns positional ids after segments were merged, split or dropped. */
export function renumberSegments(segments: Segment[]): Segment[] {
  return segments.map((segment, index) => {
    const id = segmentId(index);
    return {
      ...segment,
      id,
      words: segment.words.map((word, wordIndex) => ({ ...word, id: wordId(id, wordIndex) })),
    };
  });
}
