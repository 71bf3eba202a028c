import { stringifySync } from "subtitle";
import type { Transcript } from "../types/transcript";
import { toMillis } from "../utils/timing";
import { speakerLabel, type RenderOptions } from "./options";
import { wrapText } from "./wrap";

export interface SubtitleCue {
  /** milliseconds */
  start: number;
  /** milliseconds */
  end: number;
  text: string;
}

/**
 * One cue per segment, in milliseconds. Segments that round to zero length
 * produce no cue.
 */
export function toCues(
  transcript: Transcript,
  options: RenderOptions = {}
): SubtitleCue[] {
  return transcript.segments.flatMap((segment) => {
    const start = toMillis(segment.interval.start);
    const end = toMillis(segment.interval.end);
    const text = wrapText(speakerLabel(segment.speaker, options) + segment.text, options);
    if (end <= start || !text) return [];
    return [{ start, end, text }];
  });
}

export function renderSrt(transcript: Transcript, options: RenderOptions = {}): string {
  const nodes = toCues(transcript, options).map((cue) => ({
    type: "cue" as const,
    data: cue,
  }));
  return stringifySync(nodes, { format: "SRT" });
}

export function renderVtt(transcript: Transcript, options: RenderOptions = {}): string {
  const nodes = toCues(transcript, options).map((cue) => ({
    type: "cue" as const,
    data: cue,
  }));
  return stringifySync(nodes, { format: "WebVTT" });
}
