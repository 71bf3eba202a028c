import { describe, it, expect } from "vitest";
import type { Transcript } from "../types/transcript";
import { annotateReveals, buildKaraokeSchedule, findRevealTies } from "./karaoke";

const transcript: Transcript = {
  language: "en",
  sourceEngine: "aligned",
  diarized: true,
  segments: [
    {
      id: "seg-0001",
      interval: { start: 1, end: 3 },
      text: "a b c",
      speaker: "A",
      words: [
        { id: "seg-0001-w1", interval: { start: 1, end: 1.5 }, text: "a" },
        { id: "seg-0001-w2", interval: { start: 1.4, end: 2.5 }, text: "b" },
        { id: "seg-0001-w3", interval: { start: 3.5, end: 4 }, text: "c" },
      ],
    },
    {
      id: "seg-0002",
      interval: { start: 4, end: 5 },
      text: "d e",
      words: [
        { id: "seg-0002-w1", interval: { start: 4.5, end: 4.5 }, text: "d" },
        { id: "seg-0002-w2", interval: { start: 4.5, end: 4.5 }, text: "e" },
      ],
    },
  ],
};

describe("buildKaraokeSchedule", () => {
  it("should emit one reveal per word clamped into the segment", () => {
    const schedule = buildKaraokeSchedule(transcript);

    expect(schedule.lines[0]).toEqual({
      segmentIndex: 0,
      segmentId: "seg-0001",
      interval: { start: 1, end: 3 },
      text: "a b c",
      speaker: "A",
      reveals: [
        { wordIndex: 0, text: "a", revealTime: 1, fullRevealTime: 1.5 },
        { wordIndex: 1, text: "b", revealTime: 1.4, fullRevealTime: 2.5 },
        { wordIndex: 2, text: "c", revealTime: 3, fullRevealTime: 3 },
      ],
    });
    expect(schedule.lines[1].speaker).toBeUndefined();
  });

  it("should be idempotent", () => {
    expect(buildKaraokeSchedule(transcript)).toEqual(buildKaraokeSchedule(transcript));
  });

  it("should report reveals that do not increase", () => {
    expect(findRevealTies(buildKaraokeSchedule(transcript))).toEqual([
      { segmentIndex: 1, wordIndex: 1 },
    ]);
  });
});

describe("annotateReveals", () => {
  it("should write reveal timing onto a copy of the words", () => {
    const annotated = annotateReveals(transcript);

    expect(annotated.segments[0].words[2].reveal).toEqual({ revealTime: 3, fullRevealTime: 3 });
    expect(transcript.segments[0].words[2].reveal).toBeUndefined();
  });
});
