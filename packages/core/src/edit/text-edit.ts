import type { Segment, Transcript } from "../types/transcript";
import { renumberSegments } from "../utils/ids";
import { describeWordTiming } from "../utils/metadata";
import { joinWordsText, normalizeText, splitWords, wordSeparatorFor } from "../utils/words";
import { updateWordsFromTokens } from "./update-words";

/** Rewrites one piece of caption text. */
export type TextEdit = (text: string) => string;

export interface TextEditResult {
  transcript: Transcript;
  /** Segments whose text or words changed, dropped ones included */
  changedSegments: number;
  /** Segments left without text, removed from the transcript */
  droppedSegments: number;
}

/**
 * Applies `edit` to every segment's text and, separately, to the text of its
 * words, which may come from another engine. Words are re-timed against the
 * edited tokens so karaoke shows the edited text too.
 */
export function editTranscriptText(transcript: Transcript, edit: TextEdit): TextEditResult {
  const { language } = transcript;
  const separator = wordSeparatorFor(language);
  const segments: Segment[] = [];
  let changedSegments = 0;
  let droppedSegments = 0;

  for (const segment of transcript.segments) {
    const originalText = normalizeText(segment.text);
    const text = normalizeText(edit(segment.text));
    const wordsText = joinWordsText(segment.words, separator);
    const editedWordsText = segment.words.length ? normalizeText(edit(wordsText)) : wordsText;

    if (text === originalText && editedWordsText === wordsText) {
      segments.push(segment);
      continue;
    }

    changedSegments++;
    if (!text) {
      droppedSegments++;
      continue;
    }

    const words =
      editedWordsText === wordsText
        ? segment.words
        : updateWordsFromTokens(segment.words, splitWords(editedWordsText, language), segment.id);
    segments.push({ ...segment, text, words });
  }

  if (!droppedSegments) {
    return { transcript: { ...transcript, segments }, changedSegments, droppedSegments };
  }

  const renumbered = renumberSegments(segments);
  return {
    transcript: {
      ...transcript,
      segments: renumbered,
      ...(transcript.metadata
        ? {
            metadata: describeWordTiming(renumbered, transcript.metadata.syntheticSegments),
          }
        : {}),
    },
    changedSegments,
    droppedSegments,
  };
}
