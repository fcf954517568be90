/**
 * TimingContext
 *
 * Holds the record counter and the two timing markers shared by every
 * step of one instrumented session. Not synchronised: one context per
 * session.
 */

export type NanoClock = () => bigint;
export type WallClock = () => number;

export interface TimingContextOptions {
  /** Monotonic clock in nanoseconds (default: process.hrtime.bigint) */
  nanoClock?: NanoClock;
  /** Wall clock in milliseconds since epoch (default: Date.now) */
  wallClock?: WallClock;
}

const NANOS_PER_MILLI = 1_000_000;
const MILLIS_PER_SECOND = 1_000;

export class TimingContext {
  private readonly nanoClock: NanoClock;
  private readonly wallClock: WallClock;
  private nextRecordNumber: number = 1;
  // start of the current step (before action/gather)
  private elapsedStepMarker: bigint;
  // end of the last completed action
  private sinceLastStepMarker: bigint;

  constructor(options: TimingContextOptions = {}) {
    this.nanoClock = options.nanoClock ?? (() => process.hrtime.bigint());
    this.wallClock = options.wallClock ?? (() => Date.now());
    const now = this.nanoClock();
    this.elapsedStepMarker = now;
    this.sinceLastStepMarker = now;
  }

  /**
   * Hand out the next record number (post-increment)
   */
  takeRecordNumber(): number {
    return this.nextRecordNumber++;
  }

  /**
   * Peek at the number the next record will get
   */
  peekRecordNumber(): number {
    return this.nextRecordNumber;
  }

  now(): number {
    return this.wallClock();
  }

  /**
   * Time since the last action ended, for every step after the first
   */
  markBeginAction(stepNumber: number): number | undefined {
    if (stepNumber > 1) {
      return Number(this.nanoClock() - this.sinceLastStepMarker);
    }
    return undefined;
  }

  markEndAction(): void {
    this.sinceLastStepMarker = this.nanoClock();
  }

  markBeginStep(): void {
    this.elapsedStepMarker = this.nanoClock();
  }

  /**
   * Time since the current step began
   */
  measureStep(): number {
    return Number(this.nanoClock() - this.elapsedStepMarker);
  }

  /**
   * Start over: counter back to 1, both markers at the current time
   */
  reset(): void {
    this.nextRecordNumber = 1;
    const now = this.nanoClock();
    this.elapsedStepMarker = now;
    this.sinceLastStepMarker = now;
  }
}

let defaultContext: TimingContext | null = null;

/**
 * Process-wide context used by steps built without an explicit one
 */
export function getDefaultTimingContext(): TimingContext {
  if (!defaultContext) {
    defaultContext = new TimingContext();
  }
  return defaultContext;
}

export function resetDefaultTimingContext(): void {
  getDefaultTimingContext().reset();
}

/**
 * Render a nanosecond duration as "<seconds> sec <milliseconds> ms"
 *
 * @example
 * formattedNanoTime(2_345_000_000) // "2 sec 345 ms"
 */
export function formattedNanoTime(durationNs: number): string {
  const totalMillis = Math.trunc(durationNs / NANOS_PER_MILLI);
  const seconds = Math.trunc(totalMillis / MILLIS_PER_SECOND);
  const millis = totalMillis - seconds * MILLIS_PER_SECOND;
  return `${seconds} sec ${millis} ms`;
}
