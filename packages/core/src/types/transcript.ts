import type { Confidence, TimeInterval } from "./timing";

/** Opaque speaker label, e.g. `SPEAKER_00`. */
export type SpeakerId = string;

export type SourceEngine = "base" | "aligned";

/** Where a segment's word timing came from. */
export type WordTiming = "aligned" | "approximated";

/**
 * Derived karaoke timing. Written by the karaoke builder, never read back by
 * the synchronizer.
 */
export interface WordReveal {
  revealTime: number;
  fullRevealTime: number;
}

export interface Word {
  id: string;
  interval: TimeInterval;
  text: string;
  confidence?: Confidence;
  speaker?: SpeakerId;
  reveal?: WordReveal;
}

export interface Segment {
  id: string;
  interval: TimeInterval;
  text: string;
  words: Word[];
  speaker?: SpeakerId;
  wordTiming?: WordTiming;
}

export interface TranscriptMetadata {
  wordTiming: WordTiming | "mixed" | "none";
  alignedSegments: number;
  approximatedSegments: number;
  syntheticSegments: number;
}

export interface Transcript {
  language: string;
  segments: Segment[];
  sourceEngine: SourceEngine;
  diarized: boolean;
  metadata?: TranscriptMetadata;
}

export interface DiarizationTurn {
  interval: TimeInterval;
  speaker: SpeakerId;
}

/** A word as reported by the aligned engine: the interval is missing when alignment failed for that token. */
export interface RawWord extends Omit<Word, "interval" | "reveal"> {
  interval: TimeInterval | null;
}

export interface AlignedSegment extends Omit<Segment, "words" | "wordTiming"> {
  words: RawWord[];
}

/**
 * Output of the word-alignment adapter. Diarization turns travel with it
 * until the synchronizer consumes them.
 */
export interface AlignedTranscript {
  language: string;
  segments: AlignedSegment[];
  sourceEngine: "aligned";
  diarized: boolean;
  turns: DiarizationTurn[];
}
