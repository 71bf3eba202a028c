import type { WrapOptions } from "./wrap";

export interface RenderOptions extends WrapOptions {
  /** Prefix each cue with `[SPEAKER] ` when a speaker is known */
  speakerPrefix?: boolean;
}

export const speakerLabel = (
  speaker: string | undefined,
  options: RenderOptions
): string => (options.speakerPrefix && speaker ? `[${speaker}] ` : "");
