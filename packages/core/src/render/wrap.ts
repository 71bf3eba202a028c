export interface WrapOptions {
  /** 0 or less disables wrapping */
  maxCharsPerLine?: number;
  /** 0 or less means unlimited */
  maxLines?: number;
}

/**
 * Greedy line filling over tokens. When the result needs more than
 * `maxLines` lines, tokens are redistributed evenly over `maxLines` lines and
 * the last line takes the remainder. Tokens are never dropped.
 */
export function wrapTokens<T>(
  tokens: T[],
  measure: (token: T) => number,
  { maxCharsPerLine = 0, maxLines = 0 }: WrapOptions
): T[][] {
  if (!tokens.length) return [];
  if (maxCharsPerLine <= 0) return [tokens];

  const lines: T[][] = [];
  let current: T[] = [];
  let width = 0;
  for (const token of tokens) {
    const size = measure(token);
    if (current.length && width + 1 + size > maxCharsPerLine) {
      lines.push(current);
      current = [];
      width = 0;
    }
    width = current.length ? width + 1 + size : size;
    current.push(token);
  }
  lines.push(current);

  if (maxLines <= 0 || lines.length <= maxLines) return lines;

  const chunk = Math.max(1, Math.floor(tokens.length / maxLines));
  const balanced: T[][] = [];
  for (let line = 0; line < maxLines - 1; line++) {
    balanced.push(tokens.slice(line * chunk, (line + 1) * chunk));
  }
  balanced.push(tokens.slice((maxLines - 1) * chunk));
  return balanced.filter((line) => line.length > 0);
}

export function wrapText(text: string, options: WrapOptions): string {
  const words = text.split(/\s+/u).filter(Boolean);
  return wrapTokens(words, (word) => [...word].length, options)
    .map((line) => line.join(" "))
    .join("\n");
}
