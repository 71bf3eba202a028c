import { buildKaraokeSchedule, type KaraokeLine } from "../karaoke/karaoke";
import type { Transcript } from "../types/transcript";
import { formatAssTime } from "../utils/timing";
import { wordSeparatorFor } from "../utils/words";
import { speakerLabel, type RenderOptions } from "./options";
import { wrapTokens } from "./wrap";

export interface AssStyle {
  fontName: string;
  fontSize: number;
  /** `RRGGBB`: highlighted (already revealed) text */
  primaryColor: string;
  /** `RRGGBB`: text not yet revealed */
  secondaryColor: string;
  outlineColor: string;
  backColor: string;
  bold: boolean;
  outline: number;
  shadow: number;
  /** Numpad alignment, 2 is bottom centre */
  alignment: number;
  marginV: number;
  resolution: { width: number; height: number };
}

export const DEFAULT_ASS_STYLE: AssStyle = {
  fontName: "Arial",
  fontSize: 48,
  primaryColor: "FFFF00",
  secondaryColor: "FFFFFF",
  outlineColor: "000000",
  backColor: "000000",
  bold: false,
  outline: 3,
  shadow: 2,
  alignment: 2,
  marginV: 50,
  resolution: { width: 1920, height: 1080 },
};

export interface AssRenderOptions extends RenderOptions {
  style?: Partial<AssStyle>;
}

const HEX_COLOR = /^[0-9A-Fa-f]{6}$/;

/** `RRGGBB` (optionally `#`-prefixed) to ASS `&H00BBGGRR`; invalid input is white. */
export function assColor(rgb: string): string {
  const hex = rgb.trim().replace(/^#/, "");
  const valid = HEX_COLOR.test(hex) ? hex.toUpperCase() : "FFFFFF";
  return `&H00${valid.slice(4, 6)}${valid.slice(2, 4)}${valid.slice(0, 2)}`;
}

const toCentiseconds = (seconds: number) => Math.round(seconds * 100);

/**
 * `\k` durations in centiseconds. The first word waits from the line start,
 * every later word from the previous reveal, at least 1 cs so reveals stay
 * strictly increasing.
 */
export function karaokeTags(line: KaraokeLine): number[] {
  return line.reveals.map((reveal, index) => {
    if (index === 0) {
      return Math.max(0, toCentiseconds(reveal.revealTime - line.interval.start));
    }
    const previous = line.reveals[index - 1].revealTime;
    return Math.max(1, toCentiseconds(reveal.revealTime - previous));
  });
}

// Braces open override blocks in ASS
const escapeAssText = (text: string) => text.replace(/[{}]/g, "").replace(/\r?\n/g, " ");

function dialogueText(
  line: KaraokeLine,
  separator: string,
  options: AssRenderOptions
): string {
  const prefix = speakerLabel(line.speaker, options);
  if (!line.reveals.length) {
    return prefix + escapeAssText(line.text);
  }

  const tags = karaokeTags(line);
  const tokens = line.reveals.map((reveal, index) => {
    const visible = escapeAssText(reveal.text);
    return { visible, rendered: `{\\k${tags[index]}}${visible}` };
  });

  const lines = wrapTokens(tokens, (token) => [...token.visible].length, options);
  return (
    prefix +
    lines.map((tokensOnLine) => tokensOnLine.map((token) => token.rendered).join(separator)).join("\\N")
  );
}

export function renderAssHeader(style: AssStyle): string {
  return [
    "[Script Info]",
    "ScriptType: v4.00+",
    `PlayResX: ${style.resolution.width}`,
    `PlayResY: ${style.resolution.height}`,
    "ScaledBorderAndShadow: yes",
    "WrapStyle: 2",
    "",
    "[V4+ Styles]",
    "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding",
    `Style: Default,${style.fontName},${style.fontSize},${assColor(style.primaryColor)},${assColor(style.secondaryColor)},${assColor(style.outlineColor)},${assColor(style.backColor)},${style.bold ? "-1" : "0"},0,0,0,100,100,0,0,1,${style.outline},${style.shadow},${style.alignment},60,60,${style.marginV},1`,
    "",
    "[Events]",
    "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text",
  ].join("\n");
}

/**
 * ASS subtitles with one karaoke `Dialogue` per segment. Segments shorter
 * than one centisecond are skipped.
 */
export function renderAss(
  transcript: Transcript,
  options: AssRenderOptions = {}
): string {
  const style: AssStyle = { ...DEFAULT_ASS_STYLE, ...options.style };
  const separator = wordSeparatorFor(transcript.language);
  const schedule = buildKaraokeSchedule(transcript);

  const dialogues = schedule.lines.flatMap((line) => {
    const start = formatAssTime(line.interval.start);
    const end = formatAssTime(line.interval.end);
    if (toCentiseconds(line.interval.end) <= toCentiseconds(line.interval.start)) {
      return [];
    }
    return [
      `Dialogue: 0,${start},${end},Default,,0,0,0,,${dialogueText(line, separator, options)}`,
    ];
  });

  return `${[renderAssHeader(style), ...dialogues].join("\n")}\n`;
}
