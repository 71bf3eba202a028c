import type { TimeInterval } from "../types/timing";

// Languages written without spaces between words: tokens are glued back
// together with an empty separator and split per character.
const UNSPACED_LANGUAGES = new Set(["zh", "ja", "yue"]);

const IDEOGRAPH_OR_RUN = new RegExp(
  "([\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}]\\p{P}*)|([^\\s\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}]+)",
  "gu"
);

const languageBase = (language: string) =>
  language.trim().toLowerCase().split(/[-_]/)[0] ?? "";

export function isUnspacedLanguage(language: string): boolean {
  return UNSPACED_LANGUAGES.has(languageBase(language));
}

/**
 * Whitespace placed between word texts when rebuilding a segment's text.
 */
export function wordSeparatorFor(language: string): string {
  return isUnspacedLanguage(language) ? "" : " ";
}

/**
 * Splits segment text into word tokens.
 *
 * Spaced languages split on whitespace. Unspaced languages yield one token
 * per ideograph (with trailing punctuation attached) and keep runs of other
 * scripts, such as embedded Latin words or digits, together.
 */
export function splitWords(text: string, language = ""): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (!isUnspacedLanguage(language)) {
    return trimmed.split(/\s+/u);
  }
  return trimmed.match(IDEOGRAPH_OR_RUN) ?? [];
}

export function joinWordsText(
  words: ReadonlyArray<{ text: string }>,
  separator = " "
): string {
  return words
    .map((word) => word.text.trim())
    .filter((text) => text.length > 0)
    .join(separator);
}

/** Collapses runs of whitespace so rebuilt and original texts compare equal. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/gu, " ").trim();
}

/**
 * Lays out `texts` back to back over `interval`, giving each token a share
 * of the duration proportional to its character count. The first token
 * starts at `interval.start` and the last ends exactly at `interval.end`.
 */
export function distributeByCharacters(
  texts: string[],
  interval: TimeInterval
): TimeInterval[] {
  if (!texts.length) return [];

  // Code points, so a surrogate pair counts as one character; never zero
  const lengths = texts.map((text) => Math.max(1, Array.from(text).length));
  const totalChars = lengths.reduce((sum, length) => sum + length, 0);
  const span = Math.max(0, interval.end - interval.start);

  const result: TimeInterval[] = [];
  let elapsedChars = 0;
  let currentStart = interval.start;

  for (const [i, length] of lengths.entries()) {
    elapsedChars += length;
    const end =
      i === lengths.length - 1
        ? interval.end
        : interval.start + (span * elapsedChars) / totalChars;
    result.push({ start: currentStart, end });
    currentStart = end;
  }

  return result;
}
