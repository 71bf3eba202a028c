import { describe, it, expect, vi } from "vitest";
import { adaptBaseOutput } from "./base-adapter";

describe("adaptBaseOutput", () => {
  it("should read SRT cues with multi-line text", () => {
    const srt = [
      "1",
      "00:00:00,000 --> 00:00:01,500",
      "Hello there",
      "",
      "2",
      "00:00:01,500 --> 00:00:03,000",
      "General",
      "Kenobi",
      "",
    ].join("\r\n");

    const { transcript, warnings } = adaptBaseOutput(srt, { language: "en" });

    expect(warnings).toEqual([]);
    expect(transcript).toEqual({
      language: "en",
      sourceEngine: "base",
      diarized: false,
      segments: [
        { id: "seg-0001", interval: { start: 0, end: 1.5 }, text: "Hello there", words: [] },
        { id: "seg-0002", interval: { start: 1.5, end: 3 }, text: "General Kenobi", words: [] },
      ],
    });
  });

  it("should read console lines, drop zero-length cues and clip overlaps", () => {
    const output = [
      "[00:00:00.000 --> 00:00:02.000]   one two",
      "[00:00:02.000 --> 00:00:02.000]  nothing",
      "[00:00:01.000 --> 00:00:03.000]  three",
    ].join("\n");

    const { transcript, warnings } = adaptBaseOutput(output);

    expect(transcript.language).toBe("unknown");
    expect(
      transcript.segments.map(({ id, interval, text }) => ({ id, interval, text }))
    ).toEqual([
      { id: "seg-0001", interval: { start: 0, end: 1.5 }, text: "one two" },
      { id: "seg-0002", interval: { start: 1.5, end: 3 }, text: "three" },
    ]);
    expect(warnings).toEqual([
      "line 2: zero or negative duration, dropped",
      "overlap between 00:00:00,000 and 00:00:01,000 clipped at 00:00:01,500",
    ]);
  });

  it("should drop duplicates and empty cues and log them", () => {
    const logger = { warn: vi.fn() };
    const output = [
      "0.0 --> 1.0 hi",
      "0.0 --> 1.0 hi",
      "1.0 --> 2.0",
      "",
      "2.0 --> 3.5 bye",
    ].join("\n");

    const { transcript, warnings } = adaptBaseOutput(output, { logger });

    expect(transcript.segments.map((segment) => segment.text)).toEqual(["hi", "bye"]);
    expect(transcript.segments[1].interval).toEqual({ start: 2, end: 3.5 });
    expect(warnings).toEqual([
      "line 2: duplicate segment, dropped",
      "line 3: empty text, dropped",
    ]);
    expect(logger.warn).toHaveBeenCalledWith("[BaseAdapter] line 2: duplicate segment, dropped");
  });

  it("should report SRT problems by cue number", () => {
    const srt = [
      "1",
      "00:00:00,000 --> 00:00:01,000",
      "first",
      "",
      "2",
      "00:00:02,000 --> 00:00:02,000",
      "empty span",
      "",
      "3",
      "00:00:03,000 --> 00:00:04,250",
      "last",
      "",
    ].join("\n");

    const { transcript, warnings } = adaptBaseOutput(srt);

    expect(transcript.segments.map(({ interval, text }) => [interval, text])).toEqual([
      [{ start: 0, end: 1 }, "first"],
      [{ start: 3, end: 4.25 }, "last"],
    ]);
    expect(warnings).toEqual(["cue 2: zero or negative duration, dropped"]);
  });

  it("should drop a duplicate that reappears out of order", () => {
    const output = [
      "[00:00:00.000 --> 00:00:02.000]  hi",
      "[00:00:05.000 --> 00:00:06.000]  x",
      "[00:00:00.000 --> 00:00:02.000]  hi",
    ].join("\n");

    const { transcript, warnings } = adaptBaseOutput(output);

    expect(transcript.segments.map(({ id, interval, text }) => ({ id, interval, text }))).toEqual([
      { id: "seg-0001", interval: { start: 0, end: 2 }, text: "hi" },
      { id: "seg-0002", interval: { start: 5, end: 6 }, text: "x" },
    ]);
    expect(warnings).toEqual(["line 3: duplicate segment, dropped"]);
  });

  it("should merge a cue contained in another instead of cutting the outer one", () => {
    const output = [
      "[00:00:00.000 --> 00:00:10.000]  long story",
      "[00:00:02.000 --> 00:00:04.000]  aside",
      "[00:00:03.000 --> 00:00:05.000]  story",
      "[00:00:12.000 --> 00:00:13.000]  end",
    ].join("\n");

    const { transcript, warnings } = adaptBaseOutput(output, { language: "en" });

    expect(transcript.segments.map(({ interval, text }) => [interval, text])).toEqual([
      [{ start: 0, end: 10 }, "long story aside"],
      [{ start: 12, end: 13 }, "end"],
    ]);
    expect(warnings).toEqual([
      "line 2: inside the cue at 00:00:00,000, merged",
      "line 3: inside the cue at 00:00:00,000, merged",
    ]);
  });

  it("should return an empty transcript for empty output", () => {
    const { transcript, warnings } = adaptBaseOutput("\uFEFF\n\n");

    expect(transcript.segments).toEqual([]);
    expect(warnings).toEqual([]);
  });
});
