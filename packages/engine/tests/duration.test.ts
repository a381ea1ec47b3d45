import { durationOf, exactDurationOf } from '../src/theory/duration.js';

describe('duration calculator', () => {
  test('quarter note at 120 BPM is 500 ms', () => {
    expect(durationOf(4, 120)).toBe(500);
    expect(durationOf(4, 120, false)).toBe(500);
  });

  test('common lengths at 120 BPM', () => {
    expect(durationOf(1, 120)).toBe(2000);
    expect(durationOf(2, 120)).toBe(1000);
    expect(durationOf(8, 120)).toBe(250);
    expect(durationOf(16, 120)).toBe(125);
  });

  test('dotted notes last one and a half times as long', () => {
    expect(durationOf(4, 120, true)).toBe(750);
    expect(durationOf(8, 120, true)).toBe(375);
    for (const tempo of [32, 60, 97, 120, 150, 255]) {
      for (const length of [1, 2, 3, 4, 6, 8, 12, 16, 32, 64]) {
        const plain = exactDurationOf(length, tempo);
        const dotted = exactDurationOf(length, tempo, true);
        expect(dotted).toBeCloseTo(plain * 1.5, 9);
        expect(durationOf(length, tempo, true)).toBeGreaterThanOrEqual(durationOf(length, tempo));
      }
    }
  });

  test('doubling the length or the tempo halves the duration', () => {
    expect(exactDurationOf(8, 90)).toBeCloseTo(exactDurationOf(4, 90) / 2, 9);
    expect(exactDurationOf(4, 180)).toBeCloseTo(exactDurationOf(4, 90) / 2, 9);
    expect(durationOf(4, 240)).toBe(250);
    expect(durationOf(4, 60)).toBe(1000);
  });

  test('rounds to the nearest millisecond', () => {
    // 240000 / 360 = 666.67
    expect(durationOf(3, 120)).toBe(667);
    // 240000 / (255 * 64) = 14.7
    expect(durationOf(64, 255)).toBe(15);
  });

  test('never returns less than 1 ms', () => {
    expect(durationOf(10000, 255)).toBe(1);
  });
});
