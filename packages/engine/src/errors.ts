import { SourceSpan } from './parser/ast.js';

export type MmlErrorKind =
  | 'SyntaxError'
  | 'InvalidOctave'
  | 'InvalidLength'
  | 'InvalidTempo'
  | 'InvalidNote'
  | 'TrackIndexOutOfRange'
  | 'TieMismatch';

/**
 * Base class of every error the engine raises while reading a score.
 * `span` points at the offending command when there is one.
 */
export abstract class MmlError extends Error {
  abstract readonly kind: MmlErrorKind;
  readonly span?: SourceSpan;

  constructor(message: string, span?: SourceSpan) {
    super(message);
    this.name = new.target.name;
    this.span = span;
  }
}

export class MmlSyntaxError extends MmlError {
  readonly kind = 'SyntaxError' as const;

  constructor(readonly char: string, span: SourceSpan) {
    super(`Unexpected character '${char}'`, span);
  }
}

export class InvalidOctaveError extends MmlError {
  readonly kind = 'InvalidOctave' as const;

  constructor(readonly octave: number, span?: SourceSpan) {
    super(`Octave ${octave} is out of range 1..8`, span);
  }
}

export class InvalidLengthError extends MmlError {
  readonly kind = 'InvalidLength' as const;

  constructor(readonly length: number, span?: SourceSpan) {
    super(`Note length ${length} must be a positive integer`, span);
  }
}

export class InvalidTempoError extends MmlError {
  readonly kind = 'InvalidTempo' as const;

  constructor(readonly bpm: number, span?: SourceSpan) {
    super(`Tempo ${bpm} must be a positive number of beats per minute`, span);
  }
}

export class InvalidNoteError extends MmlError {
  readonly kind = 'InvalidNote' as const;

  constructor(readonly key: number | undefined, span?: SourceSpan) {
    super(
      key === undefined
        ? 'Absolute note is missing its key number (1..96)'
        : `Absolute note ${key} is out of range 1..96`,
      span,
    );
  }
}

export class TrackIndexOutOfRangeError extends MmlError {
  readonly kind = 'TrackIndexOutOfRange' as const;

  constructor(readonly index: number, readonly trackCount: number) {
    super(`Track ${index} does not exist (score has ${trackCount} track${trackCount === 1 ? '' : 's'})`);
  }
}

export class TieMismatchError extends MmlError {
  readonly kind = 'TieMismatch' as const;

  /** `from` is undefined when the tie has no preceding note. */
  constructor(readonly from: number | undefined, readonly to: number | undefined, span?: SourceSpan) {
    super(
      from === undefined
        ? 'Tie has no preceding note to continue'
        : `Tie from ${from} Hz cannot continue into ${to} Hz`,
      span,
    );
  }
}

export function isMmlError(err: unknown): err is MmlError {
  return err instanceof MmlError;
}
