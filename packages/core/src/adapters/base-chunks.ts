import type { OptionalLogger } from "../logger";
import type { Segment } from "../types/transcript";
import { renumberSegments } from "../utils/ids";
import { TIME_EPSILON, formatClock } from "../utils/timing";
import type { BaseAdapterResult } from "./base-adapter";

export interface BaseChunk {
  /** Adapter output for the chunk, timed from the chunk's own start */
  result: BaseAdapterResult;
  /** Seconds between the media start and the chunk start */
  offset: number;
}

/**
 * Joins the base transcriptions of consecutive audio chunks into one
 * transcript on the media clock. A cue reaching back into the previous
 * chunk's last cue is clipped to its end, or dropped when nothing is left.
 */
export function joinBaseChunks(
  chunks: BaseChunk[],
  logger?: OptionalLogger
): BaseAdapterResult {
  const warnings: string[] = [];
  const segments: Segment[] = [];

  chunks.forEach(({ result, offset }, chunkIndex) => {
    const label = `chunk ${chunkIndex + 1}`;
    warnings.push(...result.warnings.map((warning) => `${label}: ${warning}`));

    for (const segment of result.transcript.segments) {
      const previousEnd = segments.length
        ? segments[segments.length - 1].interval.end
        : -Infinity;
      const end = segment.interval.end + offset;
      let start = segment.interval.start + offset;

      if (start < previousEnd - TIME_EPSILON) {
        if (end - previousEnd <= TIME_EPSILON) {
          warnings.push(`${label}: cue at ${formatClock(start)} lies inside the previous chunk, dropped`);
          continue;
        }
        warnings.push(`${label}: cue at ${formatClock(start)} clipped to ${formatClock(previousEnd)}`);
        start = previousEnd;
      }

      segments.push({ ...segment, interval: { start, end } });
    }
  });

  for (const warning of warnings) {
    logger?.warn?.(`[BaseAdapter] ${warning}`);
  }

  return {
    transcript: {
      language: chunks[0]?.result.transcript.language ?? "unknown",
      segments: renumberSegments(segments),
      sourceEngine: "base",
      diarized: false,
    },
    warnings,
  };
}
