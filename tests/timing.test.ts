/**
 * Tests for TimingContext
 */

import {
  TimingContext,
  formattedNanoTime,
  getDefaultTimingContext,
  resetDefaultTimingContext,
} from '../src/timing';
import { createFakeClock } from './test-utils';

describe('TimingContext', () => {
  it('should hand out record numbers starting at 1', () => {
    const context = new TimingContext();

    expect(context.takeRecordNumber()).toBe(1);
    expect(context.takeRecordNumber()).toBe(2);
    expect(context.peekRecordNumber()).toBe(3);
  });

  it('should not measure time since last action for the first step', () => {
    const { context, advance } = createFakeClock();
    advance(5_000n);

    expect(context.markBeginAction(1)).toBeUndefined();
    expect(context.markBeginAction(2)).toBe(5_000);
  });

  it('should measure from the end of the last action', () => {
    const { context, advance } = createFakeClock();

    advance(10_000n);
    context.markEndAction();
    advance(3_000n);

    expect(context.markBeginAction(2)).toBe(3_000);
  });

  it('should measure the current step from its start marker', () => {
    const { context, advance } = createFakeClock();

    context.markBeginStep();
    advance(7_500_000n);

    expect(context.measureStep()).toBe(7_500_000);
  });

  it('should restart numbering and markers on reset', () => {
    const { context, advance } = createFakeClock();
    context.takeRecordNumber();
    context.takeRecordNumber();
    advance(1_000n);
    context.markEndAction();
    advance(9_000n);

    context.reset();

    expect(context.peekRecordNumber()).toBe(1);
    expect(context.markBeginAction(2)).toBe(0);
  });

  it('should share one default context across the process', () => {
    resetDefaultTimingContext();
    const context = getDefaultTimingContext();

    context.takeRecordNumber();

    expect(getDefaultTimingContext()).toBe(context);
    expect(getDefaultTimingContext().peekRecordNumber()).toBe(2);

    resetDefaultTimingContext();
    expect(getDefaultTimingContext().peekRecordNumber()).toBe(1);
  });
});

describe('formattedNanoTime', () => {
  it('should split into seconds and remaining milliseconds', () => {
    expect(formattedNanoTime(2_345_678_901)).toBe('2 sec 345 ms');
    expect(formattedNanoTime(60_000_000_000)).toBe('60 sec 0 ms');
  });

  it('should truncate sub-millisecond durations', () => {
    expect(formattedNanoTime(999_999)).toBe('0 sec 0 ms');
    expect(formattedNanoTime(0)).toBe('0 sec 0 ms');
  });
});
