import type { TimeInterval } from "../types/timing";

// Values closer than this are treated as equal when comparing overlaps.
export const TIME_EPSILON = 1e-9;

const CLOCK_TIMESTAMP = /^(?:(\d+):)?(\d{1,2}):(\d{1,2})(?:[,.](\d{1,3}))?$/;
const SECONDS_TIMESTAMP = /^\d+(?:\.\d+)?$/;

/**
 * Parses `HH:MM:SS,mmm`, `MM:SS.mmm` or fractional seconds (`12.5`) into
 * seconds. Returns `null` for anything else.
 */
export function parseTimestamp(value: string): number | null {
  const text = value.trim();
  const clock = CLOCK_TIMESTAMP.exec(text);
  if (clock) {
    const [, hours = "0", minutes, seconds, fraction = "0"] = clock;
    // "5" after the separator means 500 ms, not 5 ms
    const millis = Number(fraction.padEnd(3, "0"));
    return (
      Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds) + millis / 1000
    );
  }
  if (SECONDS_TIMESTAMP.test(text)) {
    return Number(text);
  }
  return null;
}

const pad = (value: number, size = 2) => String(value).padStart(size, "0");

/** Rounds seconds to whole milliseconds, never below zero. */
export const toMillis = (seconds: number): number =>
  Math.max(0, Math.round(seconds * 1000));

export function formatClock(seconds: number, separator: "," | "." = ","): string {
  const totalMs = toMillis(seconds);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const hh = Math.floor(totalSeconds / 3600);
  const mm = Math.floor((totalSeconds % 3600) / 60);
  const ss = totalSeconds % 60;
  return `${pad(hh)}:${pad(mm)}:${pad(ss)}${separator}${pad(ms, 3)}`;
}

/** ASS clock: `H:MM:SS.cc` with centiseconds. */
export function formatAssTime(seconds: number): string {
  const totalCs = Math.max(0, Math.round(seconds * 100));
  const cs = totalCs % 100;
  const totalSeconds = Math.floor(totalCs / 100);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const s = totalSeconds % 60;
  return `${h}:${pad(m)}:${pad(s)}.${pad(cs)}`;
}

export const duration = (interval: TimeInterval): number =>
  interval.end - interval.start;

export const midpoint = (interval: TimeInterval): number =>
  (interval.start + interval.end) / 2;

/** Length of the shared part of two intervals, 0 when disjoint. */
export const overlap = (a: TimeInterval, b: TimeInterval): number =>
  Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));

/** Gap between two intervals, 0 when they touch or overlap. */
export const distance = (a: TimeInterval, b: TimeInterval): number =>
  Math.max(0, a.start - b.end, b.start - a.end);

/** Distance from a point to an interval, 0 when the point lies inside. */
export const pointDistance = (point: number, interval: TimeInterval): number =>
  Math.max(0, interval.start - point, point - interval.end);

export const isZeroLength = (interval: TimeInterval): boolean =>
  Math.abs(interval.end - interval.start) <= TIME_EPSILON;

/** Clamps an interval into `bounds`, keeping `end >= start`. */
export function clampInterval(
  interval: TimeInterval,
  bounds: TimeInterval
): TimeInterval {
  const start = Math.min(Math.max(interval.start, bounds.start), bounds.end);
  const end = Math.min(Math.max(interval.end, start), bounds.end);
  return { start, end };
}

export const sameInterval = (a: TimeInterval, b: TimeInterval): boolean =>
  Math.abs(a.start - b.start) <= TIME_EPSILON &&
  Math.abs(a.end - b.end) <= TIME_EPSILON;
