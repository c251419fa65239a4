import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { RingBuffer, RollingAverage } from './ringBuffer';

describe('RingBuffer', () => {
  it('reads back 60 appends in order', () => {
    const buffer = new RingBuffer<number>(60);
    for (let i = 1; i <= 60; i++) {
      buffer.push(i);
    }

    expect(buffer.isFull).toBe(true);
    expect(buffer.toArray()).toEqual(Array.from({ length: 60 }, (_, i) => i + 1));
  });

  it('drops the oldest entry on overflow', () => {
    const buffer = new RingBuffer<number>(60);
    for (let i = 1; i <= 61; i++) {
      buffer.push(i);
    }

    const values = buffer.toArray();
    expect(values).toHaveLength(60);
    expect(values[0]).toBe(2);
    expect(values[59]).toBe(61);
  });

  it('left-pads to capacity', () => {
    const buffer = new RingBuffer<number>(4);
    buffer.push(7);
    buffer.push(8);

    expect(buffer.toPaddedArray(0)).toEqual([0, 0, 7, 8]);
  });

  it('keeps the last `capacity` items for any sequence', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.array(fc.integer()), (capacity, items) => {
        const buffer = new RingBuffer<number>(capacity);
        items.forEach(item => buffer.push(item));
        expect(buffer.toArray()).toEqual(items.slice(-capacity));
      })
    );
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow('positive integer');
  });

  it('clears', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
  });
});

describe('RollingAverage', () => {
  it('is null before the first sample', () => {
    expect(new RollingAverage(3).getAverage()).toBeNull();
  });

  it('averages only the most recent samples', () => {
    const average = new RollingAverage(3);
    [10, 20, 30, 40].forEach(value => average.add(value));

    expect(average.getAverage()).toBe(30);
  });
});
