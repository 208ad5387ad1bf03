import { describe, it, expect } from 'vitest';
import { HistoryBuffer, HISTORY_CAPACITY } from '../../../src/utils/history-buffer.js';

describe('HistoryBuffer', () => {
  it('defaults to a capacity of 100', () => {
    expect(new HistoryBuffer<number>().capacity).toBe(HISTORY_CAPACITY);
    expect(HISTORY_CAPACITY).toBe(100);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new HistoryBuffer<number>(0)).toThrow(RangeError);
    expect(() => new HistoryBuffer<number>(2.5)).toThrow('positive integer');
  });

  it('lists entries oldest first', () => {
    const buffer = new HistoryBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.latest()).toBe(2);
    expect(buffer.length).toBe(2);
    expect(buffer.isFull).toBe(false);
  });

  it('evicts the oldest entry once full', () => {
    const buffer = new HistoryBuffer<number>(3);
    expect(buffer.push(1)).toBeUndefined();
    buffer.push(2);
    buffer.push(3);

    expect(buffer.push(4)).toBe(1);
    expect(buffer.toArray()).toEqual([2, 3, 4]);
    expect(buffer.length).toBe(3);
    expect(buffer.isFull).toBe(true);
  });

  it('never holds more than 100 samples', () => {
    const buffer = new HistoryBuffer<number>();
    for (let i = 1; i <= 101; i++) buffer.push(i);

    expect(buffer.length).toBe(100);
    expect(buffer.toArray()[0]).toBe(2);
    expect(buffer.latest()).toBe(101);
  });

  it('clears back to empty', () => {
    const buffer = new HistoryBuffer<string>(2);
    buffer.push('a');
    buffer.clear();

    expect(buffer.length).toBe(0);
    expect(buffer.latest()).toBeUndefined();
    expect(buffer.toArray()).toEqual([]);
  });
});
