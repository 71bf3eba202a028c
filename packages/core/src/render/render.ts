import type { Transcript } from "../types/transcript";
import { renderAss, type AssRenderOptions } from "./ass";
import { renderSrt, renderVtt } from "./subtitles";
import { renderJson, renderPlainText, renderTimestampedText } from "./text";

export const OUTPUT_FORMATS = ["srt", "vtt", "ass", "txt", "timestamped", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** File extension written for each format. */
export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  srt: ".srt",
  vtt: ".vtt",
  ass: ".ass",
  txt: ".txt",
  timestamped: ".timestamped.txt",
  json: ".json",
};

export function renderTranscript(
  format: OutputFormat,
  transcript: Transcript,
  options: AssRenderOptions = {}
): string {
  switch (format) {
    case "srt":
      return renderSrt(transcript, options);
    case "vtt":
      return renderVtt(transcript, options);
    case "ass":
      return renderAss(transcript, options);
    case "txt":
      return renderPlainText(transcript, options);
    case "timestamped":
      return renderTimestampedText(transcript, options);
    case "json":
      return renderJson(transcript);
  }
}
