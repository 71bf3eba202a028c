import type { Segment, TranscriptMetadata, WordTiming } from "../types/transcript";

/** Summarizes where the segments' word timing came from. */
export function describeWordTiming(
  segments: Segment[],
  syntheticSegments: number
): TranscriptMetadata {
  const count = (timing: WordTiming) =>
    segments.filter((segment) => segment.wordTiming === timing).length;
  const alignedSegments = count("aligned");
  const approximatedSegments = count("approximated");

  let wordTiming: TranscriptMetadata["wordTiming"] = "none";
  if (alignedSegments && approximatedSegments) wordTiming = "mixed";
  else if (alignedSegments) wordTiming = "aligned";
  else if (approximatedSegments) wordTiming = "approximated";

  return { wordTiming, alignedSegments, approximatedSegments, syntheticSegments };
}
