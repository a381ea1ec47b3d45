import { Accidental, NoteLetter } from '../parser/ast.js';

/** A4 */
export const REFERENCE_FREQUENCY = 440;
export const REFERENCE_OCTAVE = 4;

export const SEMITONE_OFFSETS: Readonly<Record<NoteLetter, number>> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11,
};

const A_OFFSET = SEMITONE_OFFSETS.A;

export const MIN_KEY = 1;
export const MAX_KEY = 96;

/**
 * Semitones from A4. An accidental may cross the octave boundary:
 * B+ in octave 4 is the same index as C in octave 5.
 */
export function semitoneIndex(letter: NoteLetter, accidental: Accidental, octave: number): number {
  return (octave - REFERENCE_OCTAVE) * 12 + (SEMITONE_OFFSETS[letter] + accidental - A_OFFSET);
}

/** Equal-tempered frequency in whole Hz for a semitone index relative to A4. */
export function frequencyOfSemitone(index: number): number {
  return Math.round(REFERENCE_FREQUENCY * Math.pow(2, index / 12));
}

/** Octave a note actually sounds in once its accidental is applied (`o1 c-` is octave 0). */
export function soundingOctave(letter: NoteLetter, accidental: Accidental, octave: number): number {
  return octave + Math.floor((SEMITONE_OFFSETS[letter] + accidental) / 12);
}

export function frequencyOf(letter: NoteLetter, accidental: Accidental, octave: number): number {
  return frequencyOfSemitone(semitoneIndex(letter, accidental, octave));
}

/**
 * Semitone index of an absolute key number, where key 1 is C1 and key 96 is B8.
 * Range checking is left to the caller.
 */
export function keySemitoneIndex(key: number): number {
  const zeroBased = key - 1;
  const octave = Math.floor(zeroBased / 12) + 1;
  return (octave - REFERENCE_OCTAVE) * 12 + (zeroBased % 12) - A_OFFSET;
}

export function frequencyOfKey(key: number): number {
  return frequencyOfSemitone(keySemitoneIndex(key));
}
