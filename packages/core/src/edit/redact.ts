import type { Transcript } from "../types/transcript";
import { editTranscriptText, type TextEditResult } from "./text-edit";

// Order matters: a formatted CPF never contains a run of four digits, so the
// phone pattern leaves it for the CPF one.
const PII_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi, "[EMAIL]"],
  [/(?:\+?55\s*)?(?:\(?\d{2}\)?\s*)?\d{4,5}[-\s]?\d{4}\b/g, "[PHONE]"],
  [/\b\d{3}\.?\d{3}\.?\d{3}-?\d{2}\b/g, "[CPF]"],
  [/\b\d{2}\.?\d{3}\.?\d{3}\/?\d{4}-?\d{2}\b/g, "[CNPJ]"],
];

/** Masks e-mail addresses, phone numbers and Brazilian CPF and CNPJ numbers. */
export function redactPii(text: string): string {
  return PII_PATTERNS.reduce(
    (result, [pattern, placeholder]) => result.replace(pattern, placeholder),
    text
  );
}

export function redactTranscript(transcript: Transcript): TextEditResult {
  return editTranscriptText(transcript, redactPii);
}
