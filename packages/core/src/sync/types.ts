import type { OptionalLogger } from "../logger";
import type { TimeInterval } from "../types/timing";
import type { SpeakerId, Transcript } from "../types/transcript";

export type RepairAction =
  | { kind: "approximated-segment"; segmentId: string; words: number }
  | {
      kind: "inverted-interval";
      word: string;
      original: TimeInterval;
      repaired: TimeInterval;
    }
  | {
      kind: "clamped-word";
      segmentId: string;
      word: string;
      original: TimeInterval;
      repaired: TimeInterval;
    }
  | { kind: "interpolated-word"; segmentId: string; word: string; interval: TimeInterval }
  | { kind: "orphan-segment"; segmentId: string; words: number; interval: TimeInterval }
  | {
      kind: "monotonic-clip";
      target: "segment" | "word";
      id: string;
      from: number;
      to: number;
    }
  | { kind: "speaker-inherited"; target: "segment" | "word"; id: string; speaker: SpeakerId };

export type RepairKind = RepairAction["kind"];

export interface SyncOptions {
  /** Alignment slack ε in seconds: how far outside a base segment an aligned word's midpoint may fall */
  slack?: number;
  /** Synthesize proportional word timing where no aligned words exist */
  approximate?: boolean;
  /** Clipped fraction above which a warning is logged */
  clipWarnRatio?: number;
  /** Clipped fraction above which synchronization fails */
  clipFatalRatio?: number;
  logger?: OptionalLogger;
}

export interface ClipStats {
  /** Monotonicity clips plus inverted intervals */
  clipped: number;
  /** Segments plus words in the merged transcript */
  total: number;
  ratio: number;
}

export interface SyncResult {
  transcript: Transcript;
  repairs: RepairAction[];
  clipStats: ClipStats;
}

export const DEFAULT_SYNC_OPTIONS = {
  slack: 0.25,
  approximate: true,
  clipWarnRatio: 0.05,
  clipFatalRatio: 0.2,
} as const;
