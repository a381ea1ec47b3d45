export const MIN_OCTAVE = 1;
export const MAX_OCTAVE = 8;
export const DEFAULT_OCTAVE = 4;
export const DEFAULT_LENGTH = 4;
export const DEFAULT_TEMPO = 120;

/**
 * Performance state carried across the commands of one track.
 * `defaultDotted` is set by a dotted length command (`l8.`) and applies to
 * every note written without its own length.
 */
export interface PerformanceState {
  octave: number;
  defaultLength: number;
  defaultDotted: boolean;
  tempo: number;
}

export function createPerformanceState(): PerformanceState {
  return {
    octave: DEFAULT_OCTAVE,
    defaultLength: DEFAULT_LENGTH,
    defaultDotted: false,
    tempo: DEFAULT_TEMPO,
  };
}

export function isValidOctave(octave: number): boolean {
  return Number.isInteger(octave) && octave >= MIN_OCTAVE && octave <= MAX_OCTAVE;
}

/** What a `<`/`>` past octave 1 or 8 does. */
export type OctaveShiftPolicy = 'error' | 'clamp';

/** What a tie into a note of a different pitch does. */
export type TieMismatchPolicy = 'error' | 'break';

export interface InterpretOptions {
  octaveShift: OctaveShiftPolicy;
  tieMismatch: TieMismatchPolicy;
}

export const DEFAULT_INTERPRET_OPTIONS: Readonly<InterpretOptions> = Object.freeze({
  octaveShift: 'error',
  tieMismatch: 'error',
});

export function resolveInterpretOptions(opts: Partial<InterpretOptions> = {}): InterpretOptions {
  return {
    octaveShift: opts.octaveShift ?? DEFAULT_INTERPRET_OPTIONS.octaveShift,
    tieMismatch: opts.tieMismatch ?? DEFAULT_INTERPRET_OPTIONS.tieMismatch,
  };
}
