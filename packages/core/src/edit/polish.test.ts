import { describe, it, expect, vi } from "vitest";
import type { Segment, Transcript } from "../types/transcript";
import { polishTranscript } from "./polish";

const transcript = (segments: Array<Omit<Segment, "id">>): Transcript => ({
  language: "en",
  sourceEngine: "base",
  diarized: false,
  segments: segments.map((segment, index) => ({ ...segment, id: `seg-${index}` })),
});

const cues = (result: Transcript) =>
  result.segments.map(({ id, interval, text }) => [id, interval, text]);

describe("polishTranscript", () => {
  it("should merge neighbours separated by a short gap", () => {
    const logger = { debug: vi.fn() };
    const { transcript: polished, stats } = polishTranscript(
      transcript([
        { interval: { start: 0, end: 1 }, text: "hello there", words: [] },
        { interval: { start: 1.1, end: 2 }, text: "general kenobi", words: [] },
        { interval: { start: 5, end: 6 }, text: "far", words: [] },
      ]),
      { logger }
    );

    expect(cues(polished)).toEqual([
      ["seg-0001", { start: 0, end: 2 }, "hello there general kenobi"],
      ["seg-0002", { start: 5, end: 6 }, "far"],
    ]);
    expect(stats).toEqual({ merged: 1, split: 0, extended: 0 });
    expect(logger.debug).toHaveBeenCalledWith("[Polish] 1 merged, 0 split, 0 extended");
  });

  it("should not merge across speakers", () => {
    const { transcript: polished } = polishTranscript(
      transcript([
        { interval: { start: 0, end: 1 }, text: "a", speaker: "S1", words: [] },
        { interval: { start: 1, end: 2 }, text: "b", speaker: "S2", words: [] },
      ])
    );

    expect(polished.segments.map((segment) => segment.speaker)).toEqual(["S1", "S2"]);
  });

  it("should extend short cues up to the next cue", () => {
    const { transcript: polished, stats } = polishTranscript(
      transcript([
        { interval: { start: 0, end: 0.2 }, text: "ok", words: [] },
        { interval: { start: 0.5, end: 1 }, text: "b x", words: [] },
        { interval: { start: 3, end: 4 }, text: "later words", words: [] },
      ])
    );

    expect(cues(polished)).toEqual([
      ["seg-0001", { start: 0, end: 0.5 }, "ok"],
      ["seg-0002", { start: 0.5, end: 1.2 }, "b x"],
      ["seg-0003", { start: 3, end: 4 }, "later words"],
    ]);
    expect(stats.extended).toBe(2);
  });

  it("should extend dense cues to the reading speed", () => {
    const { transcript: polished } = polishTranscript(
      transcript([
        { interval: { start: 0, end: 1 }, text: "abcdefghij abcdefghij abcdefghij a", words: [] },
      ])
    );

    expect(polished.segments[0].interval).toEqual({ start: 0, end: 2 });
  });

  it("should split long segments between timed words", () => {
    const { transcript: polished, stats } = polishTranscript({
      ...transcript([
        {
          interval: { start: 0, end: 10 },
          text: "one two three four",
          wordTiming: "aligned",
          words: [
            { id: "w1", interval: { start: 0, end: 2 }, text: "one" },
            { id: "w2", interval: { start: 2.5, end: 4 }, text: "two" },
            { id: "w3", interval: { start: 5, end: 7 }, text: "three" },
            { id: "w4", interval: { start: 8, end: 9.5 }, text: "four" },
          ],
        },
      ]),
      metadata: { wordTiming: "aligned", alignedSegments: 1, approximatedSegments: 0, syntheticSegments: 0 },
    });

    expect(stats).toEqual({ merged: 0, split: 1, extended: 0 });
    expect(cues(polished)).toEqual([
      ["seg-0001", { start: 0, end: 5 }, "one two"],
      ["seg-0002", { start: 5, end: 10 }, "three four"],
    ]);
    expect(polished.segments[1].words).toEqual([
      { id: "seg-0002-w1", interval: { start: 5, end: 7 }, text: "three" },
      { id: "seg-0002-w2", interval: { start: 8, end: 9.5 }, text: "four" },
    ]);
    expect(polished.metadata?.alignedSegments).toBe(2);
  });

  it("should split long segments without words by character count", () => {
    const { transcript: polished } = polishTranscript(
      transcript([{ interval: { start: 0, end: 9 }, text: "one two three four five", words: [] }])
    );

    expect(polished.segments.map((segment) => segment.text)).toEqual(["one two three", "four five"]);
    expect(polished.segments[0].interval.start).toBe(0);
    expect(polished.segments[0].interval.end).toBeCloseTo(117 / 22, 9);
    expect(polished.segments[1].interval.end).toBe(9);
  });

  it("should keep short segments with few words whole", () => {
    const { transcript: polished } = polishTranscript(
      transcript([{ interval: { start: 0, end: 9 }, text: "one two three", words: [] }])
    );

    expect(cues(polished)).toEqual([["seg-0001", { start: 0, end: 9 }, "one two three"]]);
  });
});
