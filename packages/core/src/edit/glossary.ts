import { z } from "zod";
import { ConfigError } from "../errors";
import type { OptionalLogger } from "../logger";
import type { Transcript } from "../types/transcript";
import { isUnspacedLanguage } from "../utils/words";
import { editTranscriptText, type TextEditResult } from "./text-edit";

/** Term replacements, applied in insertion order. */
export type Glossary = ReadonlyMap<string, string>;

export type GlossaryFormat = "json" | "text";

const glossaryJsonSchema = z.record(z.string(), z.string());

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function parseJsonGlossary(content: string): Glossary {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Glossary is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const parsed = glossaryJsonSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `Glossary must map terms to strings: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`,
      { cause: parsed.error }
    );
  }

  return new Map(
    Object.entries(parsed.data).filter(([from]) => from.trim().length > 0)
  );
}

function parseTextGlossary(content: string, logger?: OptionalLogger): Glossary {
  const glossary = new Map<string, string>();
  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) return;

    const separator = line.indexOf("=");
    if (separator < 0) {
      logger?.warn?.(`[Glossary] line ${index + 1}: expected "from=to", ignored`);
      return;
    }
    const from = line.slice(0, separator).trim();
    if (!from) {
      logger?.warn?.(`[Glossary] line ${index + 1}: empty term, ignored`);
      return;
    }
    glossary.set(from, line.slice(separator + 1).trim());
  });
  return glossary;
}

/**
 * Reads a glossary: a JSON object of `"from": "to"` pairs, or text with one
 * `from=to` pair per line where blank lines and `#` comments are skipped.
 *
 * @throws ConfigError when JSON content is malformed
 */
export function parseGlossary(
  content: string,
  format: GlossaryFormat,
  logger?: OptionalLogger
): Glossary {
  const body = content.replace(/^\uFEFF/, "");
  return format === "json" ? parseJsonGlossary(body) : parseTextGlossary(body, logger);
}

/**
 * Replaces every glossary term in `text`. In spaced languages a term only
 * matches as a whole word, so `ai` leaves `said` alone.
 */
export function applyGlossaryToText(text: string, glossary: Glossary, language = ""): string {
  const wholeWords = !isUnspacedLanguage(language);
  let result = text;
  for (const [from, to] of glossary) {
    const term = escapeRegExp(from);
    const pattern = wholeWords
      ? new RegExp(`(?<![\\p{L}\\p{N}])${term}(?![\\p{L}\\p{N}])`, "gu")
      : new RegExp(term, "gu");
    result = result.replace(pattern, () => to);
  }
  return result;
}

export function applyGlossary(transcript: Transcript, glossary: Glossary): TextEditResult {
  return editTranscriptText(transcript, (text) =>
    applyGlossaryToText(text, glossary, transcript.language)
  );
}
