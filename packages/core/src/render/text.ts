import type { Transcript } from "../types/transcript";
import { formatClock } from "../utils/timing";
import { speakerLabel, type RenderOptions } from "./options";

const singleLine = (text: string) => text.split(/\r?\n/).join(" ").trim();

export function renderPlainText(
  transcript: Transcript,
  options: RenderOptions = {}
): string {
  const lines = transcript.segments
    .map((segment) => speakerLabel(segment.speaker, options) + singleLine(segment.text))
    .filter((line) => line.length > 0);
  return lines.length ? `${lines.join("\n")}\n` : "";
}

/** `HH:MM:SS,mmm --> HH:MM:SS,mmm | text`, one line per segment. */
export function renderTimestampedText(
  transcript: Transcript,
  options: RenderOptions = {}
): string {
  const lines = transcript.segments.map(
    (segment) =>
      `${formatClock(segment.interval.start)} --> ${formatClock(segment.interval.end)} | ${speakerLabel(segment.speaker, options)}${singleLine(segment.text)}`
  );
  return lines.length ? `${lines.join("\n")}\n` : "";
}

export function renderJson(transcript: Transcript): string {
  return `${JSON.stringify(transcript, null, 2)}\n`;
}
