import type { TimeInterval } from "../types/timing";
import type { SpeakerId, Transcript } from "../types/transcript";

export interface KaraokeReveal {
  wordIndex: number;
  text: string;
  /** When the word starts to highlight */
  revealTime: number;
  /** When the word is fully highlighted */
  fullRevealTime: number;
}

export interface KaraokeLine {
  segmentIndex: number;
  segmentId: string;
  interval: TimeInterval;
  text: string;
  speaker?: SpeakerId;
  reveals: KaraokeReveal[];
}

export interface KaraokeSchedule {
  lines: KaraokeLine[];
}

const clampTo = (value: number, interval: TimeInterval) =>
  Math.min(Math.max(value, interval.start), interval.end);

/**
 * Flattens a synchronized transcript into the reveal schedule renderers
 * consume: one line per segment, one reveal per word, in segment order then
 * word order. No timing is invented; reveal times are the word bounds
 * clamped into the parent segment, so the output is deterministic.
 */
export function buildKaraokeSchedule(transcript: Transcript): KaraokeSchedule {
  return {
    lines: transcript.segments.map((segment, segmentIndex) => {
      let floor = segment.interval.start;
      const reveals = segment.words.map((word, wordIndex) => {
        const revealTime = Math.max(floor, clampTo(word.interval.start, segment.interval));
        const fullRevealTime = Math.max(
          revealTime,
          clampTo(word.interval.end, segment.interval)
        );
        floor = revealTime;
        return { wordIndex, text: word.text, revealTime, fullRevealTime };
      });

      return {
        segmentIndex,
        segmentId: segment.id,
        interval: { ...segment.interval },
        text: segment.text,
        ...(segment.speaker ? { speaker: segment.speaker } : {}),
        reveals,
      };
    }),
  };
}

/**
 * Returns a copy of the transcript whose words carry their reveal timing.
 * The annotation is derived; the synchronizer never reads it.
 */
export function annotateReveals(
  transcript: Transcript,
  schedule: KaraokeSchedule = buildKaraokeSchedule(transcript)
): Transcript {
  return {
    ...transcript,
    segments: transcript.segments.map((segment, segmentIndex) => ({
      ...segment,
      words: segment.words.map((word, wordIndex) => {
        const reveal = schedule.lines[segmentIndex]?.reveals[wordIndex];
        return reveal
          ? {
              ...word,
              reveal: {
                revealTime: reveal.revealTime,
                fullRevealTime: reveal.fullRevealTime,
              },
            }
          : { ...word };
      }),
    })),
  };
}

/**
 * Positions where reveal times fail to increase strictly within a line.
 * Zero-length words produced by repairs show up here; the ASS renderer
 * spaces them one centisecond apart.
 */
export function findRevealTies(
  schedule: KaraokeSchedule
): Array<{ segmentIndex: number; wordIndex: number }> {
  return schedule.lines.flatMap((line) =>
    line.reveals.flatMap((reveal, index) =>
      index > 0 && reveal.revealTime <= line.reveals[index - 1].revealTime
        ? [{ segmentIndex: line.segmentIndex, wordIndex: reveal.wordIndex }]
        : []
    )
  );
}
