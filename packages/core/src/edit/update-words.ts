import type { TimeInterval } from "../types/timing";
import type { SpeakerId, Word } from "../types/transcript";
import { diffWords } from "../utils/diff-words";
import { wordId } from "../utils/ids";
import { distributeByCharacters } from "../utils/words";

interface PendingWord {
  text: string;
  interval: TimeInterval | null;
  confidence?: number;
  speaker?: SpeakerId;
}

/**
 * Gives tokens that were added by an edit a share of the interval of the
 * word before them, or of the word after them when they lead the segment.
 */
function timeAddedWords(pending: PendingWord[], span: TimeInterval): void {
  let index = 0;
  while (index < pending.length) {
    if (pending[index].interval) {
      index++;
      continue;
    }

    let runEnd = index;
    while (runEnd < pending.length && !pending[runEnd].interval) runEnd++;

    const before = index > 0 ? pending[index - 1] : null;
    const after = runEnd < pending.length ? pending[runEnd] : null;
    const anchor = before ?? after;
    const group = before
      ? pending.slice(index - 1, runEnd)
      : pending.slice(index, after ? runEnd + 1 : runEnd);
    const intervals = distributeByCharacters(
      group.map((item) => item.text),
      anchor?.interval ?? span
    );
    group.forEach((item, i) => {
      item.interval = intervals[i];
      item.speaker ??= anchor?.speaker;
    });

    index = runEnd;
  }
}

/**
 * Re-times `words` after their text was rewritten into `tokens`.
 *
 * Unchanged and modified words keep their intervals. Removals right after a
 * modification are absorbed into it (several words became one), so the
 * modified word stretches to the end of the last removed word. Added words
 * share the interval of a neighbouring word in proportion to their length.
 */
export function updateWordsFromTokens(
  words: Word[],
  tokens: string[],
  segmentIdValue: string
): Word[] {
  if (!words.length || !tokens.length) return [];

  const pending: PendingWord[] = [];
  let absorbing = false;

  for (const diff of diffWords(words, tokens)) {
    switch (diff.type) {
      case "unchanged":
        pending.push({
          text: diff.word.text,
          interval: { ...diff.word.interval },
          confidence: diff.word.confidence,
          speaker: diff.word.speaker,
        });
        absorbing = false;
        break;
      case "modified":
        pending.push({
          text: diff.text,
          interval: { ...diff.word.interval },
          speaker: diff.word.speaker,
        });
        absorbing = true;
        break;
      case "added":
        pending.push({ text: diff.text, interval: null });
        absorbing = false;
        break;
      case "removed": {
        const last = pending[pending.length - 1];
        if (absorbing && last?.interval) {
          last.interval = { start: last.interval.start, end: diff.word.interval.end };
        }
        break;
      }
    }
  }

  const span = { start: words[0].interval.start, end: words[words.length - 1].interval.end };
  timeAddedWords(pending, span);

  return pending.map(({ text, interval, confidence, speaker }, index) => ({
    id: wordId(segmentIdValue, index),
    interval: interval ?? span,
    text,
    ...(confidence !== undefined ? { confidence } : {}),
    ...(speaker ? { speaker } : {}),
  }));
}
