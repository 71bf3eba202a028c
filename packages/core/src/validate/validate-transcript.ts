import type { Transcript } from "../types/transcript";
import { diffWords } from "../utils/diff-words";
import { TIME_EPSILON, isZeroLength } from "../utils/timing";
import { splitWords } from "../utils/words";

export type TranscriptIssueKind =
  | "zero-length"
  | "overlap"
  | "word-outside-segment"
  | "missing-speaker"
  | "text-mismatch";

export interface TranscriptIssue {
  kind: TranscriptIssueKind;
  /** Segment or word id */
  id: string;
  message: string;
}

/**
 * Checks a transcript against the renderer contracts and reports every
 * violation. Zero-length elements are legal but reported, since renderers
 * skip them.
 */
export function validateTranscript(transcript: Transcript): TranscriptIssue[] {
  const issues: TranscriptIssue[] = [];
  let previousSegment: Transcript["segments"][number] | undefined;

  for (const segment of transcript.segments) {
    if (isZeroLength(segment.interval)) {
      issues.push({ kind: "zero-length", id: segment.id, message: "segment has zero length" });
    }
    if (previousSegment && segment.interval.start < previousSegment.interval.end - TIME_EPSILON) {
      issues.push({
        kind: "overlap",
        id: segment.id,
        message: `segment starts at ${segment.interval.start} before ${previousSegment.id} ends at ${previousSegment.interval.end}`,
      });
    }
    if (transcript.diarized && !segment.speaker) {
      issues.push({ kind: "missing-speaker", id: segment.id, message: "segment has no speaker" });
    }

    let previousEnd = segment.interval.start;
    for (const word of segment.words) {
      if (
        word.interval.start < segment.interval.start - TIME_EPSILON ||
        word.interval.end > segment.interval.end + TIME_EPSILON
      ) {
        issues.push({
          kind: "word-outside-segment",
          id: word.id,
          message: `word "${word.text}" lies outside ${segment.id}`,
        });
      }
      if (word.interval.start < previousEnd - TIME_EPSILON) {
        issues.push({
          kind: "overlap",
          id: word.id,
          message: `word "${word.text}" starts before the previous word ends`,
        });
      }
      if (transcript.diarized && !word.speaker) {
        issues.push({ kind: "missing-speaker", id: word.id, message: "word has no speaker" });
      }
      previousEnd = Math.max(previousEnd, word.interval.end);
    }

    if (segment.words.length) {
      const changes = diffWords(segment.words, splitWords(segment.text, transcript.language))
        .filter((change) => change.type !== "unchanged");
      if (changes.length) {
        issues.push({
          kind: "text-mismatch",
          id: segment.id,
          message: `${changes.length} word(s) differ from the segment text`,
        });
      }
    }

    previousSegment = segment;
  }

  return issues;
}
