import { describe, it, expect, vi } from "vitest";
import { ConfigError } from "../errors";
import type { Transcript } from "../types/transcript";
import { applyGlossary, applyGlossaryToText, parseGlossary } from "./glossary";

describe("parseGlossary", () => {
  it("should read from=to lines and skip comments", () => {
    const logger = { warn: vi.fn() };
    const content = [
      "# product names",
      "",
      "open ai = OpenAI",
      "kubernetis=Kubernetes",
      "not a mapping",
      "=empty",
    ].join("\n");

    const glossary = parseGlossary(content, "text", logger);

    expect([...glossary]).toEqual([
      ["open ai", "OpenAI"],
      ["kubernetis", "Kubernetes"],
    ]);
    expect(logger.warn.mock.calls).toEqual([
      ['[Glossary] line 5: expected "from=to", ignored'],
      ["[Glossary] line 6: empty term, ignored"],
    ]);
  });

  it("should read a JSON object", () => {
    expect([...parseGlossary('\uFEFF{"gpt": "GPT", "": "x"}', "json")]).toEqual([["gpt", "GPT"]]);
  });

  it("should reject malformed JSON glossaries", () => {
    expect(() => parseGlossary("{gpt", "json")).toThrow(ConfigError);
    expect(() => parseGlossary('{"gpt": 1}', "json")).toThrow(/Glossary must map terms to strings/);
  });
});

describe("applyGlossaryToText", () => {
  it("should replace whole words only in spaced languages", () => {
    const glossary = new Map([["ai", "AI"]]);

    expect(applyGlossaryToText("the ai said ai is aid", glossary, "en")).toBe(
      "the AI said AI is aid"
    );
  });

  it("should replace inside text written without spaces", () => {
    expect(applyGlossaryToText("我爱北京", new Map([["北京", "Beijing"]]), "zh")).toBe(
      "我爱Beijing"
    );
  });

  it("should apply terms in order and insert replacements literally", () => {
    const glossary = new Map([
      ["dollars", "$&"],
      ["c plus plus", "C++"],
    ]);

    expect(applyGlossaryToText("ten dollars of c plus plus", glossary)).toBe("ten $& of C++");
  });
});

describe("applyGlossary", () => {
  const transcript: Transcript = {
    language: "en",
    sourceEngine: "aligned",
    diarized: false,
    metadata: { wordTiming: "mixed", alignedSegments: 1, approximatedSegments: 1, syntheticSegments: 0 },
    segments: [
      {
        id: "seg-0001",
        interval: { start: 0, end: 1 },
        text: "um",
        words: [{ id: "seg-0001-w1", interval: { start: 0, end: 1 }, text: "um" }],
        wordTiming: "approximated",
      },
      {
        id: "seg-0002",
        interval: { start: 1, end: 4 },
        text: "we use open ai daily",
        wordTiming: "aligned",
        words: [
          { id: "seg-0002-w1", interval: { start: 1, end: 1.5 }, text: "we" },
          { id: "seg-0002-w2", interval: { start: 1.5, end: 2 }, text: "use" },
          { id: "seg-0002-w3", interval: { start: 2, end: 2.5 }, text: "open" },
          { id: "seg-0002-w4", interval: { start: 2.5, end: 3 }, text: "ai" },
          { id: "seg-0002-w5", interval: { start: 3, end: 4 }, text: "daily" },
        ],
      },
      {
        id: "seg-0003",
        interval: { start: 5, end: 6 },
        text: "bye",
        words: [],
      },
    ],
  };

  it("should edit text and words and drop segments left empty", () => {
    const glossary = new Map([
      ["open ai", "OpenAI"],
      ["um", ""],
    ]);

    const { transcript: edited, changedSegments, droppedSegments } = applyGlossary(
      transcript,
      glossary
    );

    expect(changedSegments).toBe(2);
    expect(droppedSegments).toBe(1);
    expect(edited.segments.map(({ id, text }) => [id, text])).toEqual([
      ["seg-0001", "we use OpenAI daily"],
      ["seg-0002", "bye"],
    ]);
    expect(edited.segments[0].words).toEqual([
      { id: "seg-0001-w1", interval: { start: 1, end: 1.5 }, text: "we" },
      { id: "seg-0001-w2", interval: { start: 1.5, end: 2 }, text: "use" },
      { id: "seg-0001-w3", interval: { start: 2, end: 3 }, text: "OpenAI" },
      { id: "seg-0001-w4", interval: { start: 3, end: 4 }, text: "daily" },
    ]);
    expect(edited.metadata).toEqual({
      wordTiming: "aligned",
      alignedSegments: 1,
      approximatedSegments: 0,
      syntheticSegments: 0,
    });
  });

  it("should return the transcript unchanged when no term matches", () => {
    const result = applyGlossary(transcript, new Map([["kubernetis", "Kubernetes"]]));

    expect(result.changedSegments).toBe(0);
    expect(result.transcript.segments).toEqual(transcript.segments);
  });
});
