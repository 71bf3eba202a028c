import { describe, it, expect } from "vitest";
import type { Transcript } from "../types/transcript";
import { redactPii, redactTranscript } from "./redact";

describe("redactPii", () => {
  it("should mask e-mail addresses and phone numbers", () => {
    expect(redactPii("write to ana@example.com or call 11 98765-4321.")).toBe(
      "write to [EMAIL] or call [PHONE]."
    );
  });

  it("should mask CPF and CNPJ numbers", () => {
    expect(redactPii("cpf 123.456.789-09 cnpj 12.345.678/0001-95")).toBe("cpf [CPF] cnpj [CNPJ]");
  });

  it("should leave short numbers alone", () => {
    expect(redactPii("chapter 12 took 300 days")).toBe("chapter 12 took 300 days");
  });
});

describe("redactTranscript", () => {
  it("should mask words and keep their timing", () => {
    const transcript: Transcript = {
      language: "pt",
      sourceEngine: "aligned",
      diarized: false,
      segments: [
        {
          id: "seg-0001",
          interval: { start: 0, end: 2.5 },
          text: "call 11 98765-4321 now",
          wordTiming: "aligned",
          words: [
            { id: "seg-0001-w1", interval: { start: 0, end: 0.5 }, text: "call" },
            { id: "seg-0001-w2", interval: { start: 0.5, end: 1 }, text: "11" },
            { id: "seg-0001-w3", interval: { start: 1, end: 2 }, text: "98765-4321" },
            { id: "seg-0001-w4", interval: { start: 2, end: 2.5 }, text: "now" },
          ],
        },
      ],
    };

    const { transcript: redacted, changedSegments } = redactTranscript(transcript);

    expect(changedSegments).toBe(1);
    expect(redacted.segments[0].text).toBe("call [PHONE] now");
    expect(redacted.segments[0].words).toEqual([
      { id: "seg-0001-w1", interval: { start: 0, end: 0.5 }, text: "call" },
      { id: "seg-0001-w2", interval: { start: 0.5, end: 2 }, text: "[PHONE]" },
      { id: "seg-0001-w3", interval: { start: 2, end: 2.5 }, text: "now" },
    ]);
  });
});
