/**
 * A closed span of media time, in seconds.
 *
 * `end >= start` always holds for intervals produced by the adapters and the
 * synchronizer. Zero-length intervals are legal (instantaneous markers) but
 * the validator reports them.
 */
export interface TimeInterval {
  start: number;
  end: number;
}

/** Recognition confidence in `[0, 1]`. */
export type Confidence = number;
