import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeGatedEmitter } from '../change-gated-emitter.js';
import { pseudoRandomValues } from '../../algorithms/__tests__/helpers.js';

describe('ChangeGatedEmitter', () => {
  let emitter: ChangeGatedEmitter;

  beforeEach(() => {
    emitter = new ChangeGatedEmitter();
  });

  it('should emit the first defined median', () => {
    expect(emitter.offer(1n, 5)).toEqual({ timestamp: 1n, formattedMedian: '5.00000000' });
    expect(emitter.lastEmitted()).toBe('5.00000000');
  });

  it('should suppress repeats of the same median', () => {
    const records = [
      emitter.offer(1n, 5),
      emitter.offer(2n, 5),
      emitter.offer(3n, 5),
    ];

    expect(records).toEqual([{ timestamp: 1n, formattedMedian: '5.00000000' }, null, null]);
  });

  it('should emit again when the median returns to an earlier value', () => {
    expect(emitter.offer(1n, 1)).not.toBeNull();
    expect(emitter.offer(2n, 2)).not.toBeNull();
    expect(emitter.offer(3n, 1)).toEqual({ timestamp: 3n, formattedMedian: '1.00000000' });
  });

  it('should skip undefined medians without touching state', () => {
    expect(emitter.offer(1n, null)).toBeNull();
    expect(emitter.lastEmitted()).toBeNull();

    expect(emitter.offer(2n, 1.5)).toEqual({ timestamp: 2n, formattedMedian: '1.50000000' });
  });

  it('should treat differences beyond the 8th decimal as no change', () => {
    emitter.offer(1n, 1);
    expect(emitter.offer(2n, 1.000000001)).toBeNull();
    expect(emitter.offer(3n, 1.00000001)).toEqual({ timestamp: 3n, formattedMedian: '1.00000001' });
  });

  it('should honour a custom precision', () => {
    const coarse = new ChangeGatedEmitter(2);
    expect(coarse.offer(1n, 1.001)).toEqual({ timestamp: 1n, formattedMedian: '1.00' });
    expect(coarse.offer(2n, 1.004)).toBeNull();
  });

  it('should emit rows that share a timestamp when the median changes', () => {
    expect(emitter.offer(10n, 1)).not.toBeNull();
    expect(emitter.offer(10n, 2.5)).toEqual({ timestamp: 10n, formattedMedian: '2.50000000' });
  });

  it('should forget the last emission on reset', () => {
    emitter.offer(1n, 5);
    emitter.reset();

    expect(emitter.lastEmitted()).toBeNull();
    expect(emitter.offer(2n, 5)).toEqual({ timestamp: 2n, formattedMedian: '5.00000000' });
  });

  it('should emit an order-preserving subsequence without consecutive repeats', () => {
    // Few distinct values, so runs of repeats are common
    const medians = pseudoRandomValues(400, 9, 8).map((v) => v / 2);
    const emitted: Array<{ index: number; formattedMedian: string }> = [];

    medians.forEach((median, index) => {
      const record = emitter.offer(BigInt(index), median);
      if (record) emitted.push({ index, formattedMedian: record.formattedMedian });
    });

    expect(emitted.length).toBeGreaterThan(0);
    expect(emitted.length).toBeLessThan(medians.length);
    for (let i = 1; i < emitted.length; i++) {
      expect(emitted[i]!.index).toBeGreaterThan(emitted[i - 1]!.index);
      expect(emitted[i]!.formattedMedian).not.toBe(emitted[i - 1]!.formattedMedian);
    }
  });

  it('should keep independent state per instance', () => {
    const other = new ChangeGatedEmitter();
    emitter.offer(1n, 5);

    expect(other.offer(1n, 5)).not.toBeNull();
  });
});
