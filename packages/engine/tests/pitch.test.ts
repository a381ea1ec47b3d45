import {
  frequencyOf,
  frequencyOfKey,
  keySemitoneIndex,
  semitoneIndex,
  soundingOctave,
} from '../src/theory/pitch.js';
import { Accidental, NoteLetter } from '../src/parser/ast.js';

describe('pitch calculator', () => {
  test('A4 is the 440 Hz reference', () => {
    expect(semitoneIndex('A', 0, 4)).toBe(0);
    expect(frequencyOf('A', 0, 4)).toBe(440);
  });

  test('natural notes of octave 4 round to whole Hz', () => {
    const letters: NoteLetter[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];
    expect(letters.map(l => frequencyOf(l, 0, 4))).toEqual([262, 294, 330, 349, 392, 440, 494]);
  });

  test('octave boundaries', () => {
    expect(frequencyOf('C', 0, 1)).toBe(33);
    expect(frequencyOf('A', 0, 1)).toBe(55);
    expect(frequencyOf('A', 0, 8)).toBe(7040);
    expect(frequencyOf('B', 0, 8)).toBe(7902);
  });

  test('accidentals shift by one semitone and may cross the octave', () => {
    expect(frequencyOf('C', 1, 4)).toBe(277);
    expect(frequencyOf('D', -1, 4)).toBe(277);
    expect(frequencyOf('C', -1, 4)).toBe(frequencyOf('B', 0, 3));
    expect(frequencyOf('B', 1, 4)).toBe(frequencyOf('C', 0, 5));
    expect(semitoneIndex('B', 1, 4)).toBe(semitoneIndex('C', 0, 5));
  });

  test('chromatic ladder is strictly increasing over octaves 1..8', () => {
    const chromatic: [NoteLetter, Accidental][] = [
      ['C', 0], ['C', 1], ['D', 0], ['D', 1], ['E', 0], ['F', 0],
      ['F', 1], ['G', 0], ['G', 1], ['A', 0], ['A', 1], ['B', 0],
    ];
    const ladder: number[] = [];
    const indices: number[] = [];
    for (let octave = 1; octave <= 8; octave++) {
      for (const [letter, accidental] of chromatic) {
        ladder.push(frequencyOf(letter, accidental, octave));
        indices.push(semitoneIndex(letter, accidental, octave));
      }
    }
    expect(ladder).toHaveLength(96);
    for (let i = 1; i < ladder.length; i++) {
      expect(indices[i]).toBe(indices[i - 1] + 1);
      expect(ladder[i]).toBeGreaterThan(ladder[i - 1]);
    }
  });

  test('flats land on the same pitch as the sharp below', () => {
    expect(frequencyOf('E', -1, 5)).toBe(frequencyOf('D', 1, 5));
    expect(frequencyOf('G', -1, 2)).toBe(frequencyOf('F', 1, 2));
  });

  test('absolute keys start at C1', () => {
    expect(keySemitoneIndex(1)).toBe(semitoneIndex('C', 0, 1));
    expect(frequencyOfKey(1)).toBe(33);
    expect(frequencyOfKey(46)).toBe(440);
    expect(frequencyOfKey(49)).toBe(523);
    expect(frequencyOfKey(96)).toBe(7902);
  });

  test('accidentals can move a note into the neighbouring octave', () => {
    expect(soundingOctave('B', 1, 8)).toBe(9);
    expect(soundingOctave('C', -1, 1)).toBe(0);
    expect(soundingOctave('B', 0, 8)).toBe(8);
    expect(soundingOctave('E', 1, 4)).toBe(4);
  });
});
