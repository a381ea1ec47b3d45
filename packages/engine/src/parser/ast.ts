/**
 * Command node definitions for mmlbeep.
 *
 * The tokenizer produces one `Command` per MML command it recognises; the
 * interpreter consumes them in order. Numeric fields are absent when the
 * command was written without digits (`o`, `l`, `t`, `v`, or a note without a
 * length), which means "fall back to the default".
 */

export interface SourcePosition {
  /** Offset into the whole score, 0-based. */
  offset: number;
  /** 1-based line in the whole score. */
  line: number;
  /** 1-based column in the whole score. */
  column: number;
}

export interface SourceSpan extends SourcePosition {
  length: number;
}

export type NoteLetter = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

/** -1 flat, 0 natural, +1 sharp. */
export type Accidental = -1 | 0 | 1;

export interface SetOctaveCommand {
  type: 'setOctave';
  octave?: number;
  span: SourceSpan;
}

export interface ShiftOctaveCommand {
  type: 'shiftOctave';
  delta: 1 | -1;
  span: SourceSpan;
}

export interface SetDefaultLengthCommand {
  type: 'setDefaultLength';
  length?: number;
  dotted: boolean;
  span: SourceSpan;
}

export interface SetTempoCommand {
  type: 'setTempo';
  bpm?: number;
  span: SourceSpan;
}

export interface SetVolumeCommand {
  type: 'setVolume';
  volume?: number;
  span: SourceSpan;
}

export interface NoteCommand {
  type: 'note';
  letter: NoteLetter;
  accidental: Accidental;
  length?: number;
  dotted: boolean;
  tied: boolean;
  span: SourceSpan;
}

// `n<key>`: key 1 is C1, always played at the default length
export interface AbsoluteNoteCommand {
  type: 'absoluteNote';
  key?: number;
  span: SourceSpan;
}

export interface RestCommand {
  type: 'rest';
  length?: number;
  dotted: boolean;
  span: SourceSpan;
}

// free-standing `&` between two notes
export interface TieCommand {
  type: 'tie';
  span: SourceSpan;
}

export type Command =
  | SetOctaveCommand
  | ShiftOctaveCommand
  | SetDefaultLengthCommand
  | SetTempoCommand
  | SetVolumeCommand
  | NoteCommand
  | AbsoluteNoteCommand
  | RestCommand
  | TieCommand;

/** One playback step: `frequency` 0 is silence. */
export interface Event {
  readonly frequency: number;
  readonly duration: number;
}
