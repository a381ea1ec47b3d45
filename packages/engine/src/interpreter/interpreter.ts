import { Command, Event, SourceSpan } from '../parser/ast.js';
import {
  InvalidLengthError,
  InvalidNoteError,
  InvalidOctaveError,
  InvalidTempoError,
  TieMismatchError,
} from '../errors.js';
import { frequencyOf, frequencyOfKey, MAX_KEY, MIN_KEY, soundingOctave } from '../theory/pitch.js';
import { durationOf } from '../theory/duration.js';
import { createLogger } from '../util/logger.js';
import { warn } from '../util/diag.js';
import {
  createPerformanceState,
  DEFAULT_LENGTH,
  DEFAULT_OCTAVE,
  DEFAULT_TEMPO,
  InterpretOptions,
  isValidOctave,
  PerformanceState,
  resolveInterpretOptions,
} from './state.js';

const log = createLogger('interpreter');

/** The most recent note or rest, held back until we know it is not tied onward. */
interface PendingEvent {
  frequency: number;
  duration: number;
  tied: boolean;
  span: SourceSpan;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

/**
 * Turns the commands of a single track into playback events.
 *
 * An Interpreter is single-use: it owns the performance state of one track
 * and the events it has emitted so far.
 */
export class Interpreter {
  readonly state: PerformanceState = createPerformanceState();
  private readonly options: InterpretOptions;
  private readonly events: Event[] = [];
  private pending: PendingEvent | null = null;

  constructor(options: Partial<InterpretOptions> = {}) {
    this.options = resolveInterpretOptions(options);
  }

  run(commands: Iterable<Command>): Event[] {
    for (const command of commands) {
      this.apply(command);
    }
    return this.finish();
  }

  apply(command: Command): void {
    switch (command.type) {
      case 'setOctave': {
        const octave = command.octave ?? DEFAULT_OCTAVE;
        if (!isValidOctave(octave)) throw new InvalidOctaveError(octave, command.span);
        this.state.octave = octave;
        return;
      }
      case 'shiftOctave':
        this.shiftOctave(command.delta, command.span);
        return;
      case 'setDefaultLength': {
        if (command.length === undefined && command.dotted) {
          // `l.` dots the current default length
          this.state.defaultDotted = true;
          return;
        }
        const length = command.length ?? DEFAULT_LENGTH;
        if (length <= 0) throw new InvalidLengthError(length, command.span);
        this.state.defaultLength = length;
        this.state.defaultDotted = command.dotted;
        return;
      }
      case 'setTempo': {
        const bpm = command.bpm ?? DEFAULT_TEMPO;
        if (bpm <= 0) throw new InvalidTempoError(bpm, command.span);
        this.state.tempo = bpm;
        return;
      }
      case 'setVolume':
        // single-tone devices have no volume control
        log.debug(`Ignoring volume ${command.volume ?? '(default)'} at offset ${command.span.offset}`);
        return;
      case 'note': {
        const octave = soundingOctave(command.letter, command.accidental, this.state.octave);
        if (!isValidOctave(octave)) throw new InvalidOctaveError(octave, command.span);
        this.play(
          frequencyOf(command.letter, command.accidental, this.state.octave),
          command.length,
          command.dotted,
          command.tied,
          command.span,
        );
        return;
      }
      case 'absoluteNote': {
        const { key } = command;
        if (key === undefined || key < MIN_KEY || key > MAX_KEY) throw new InvalidNoteError(key, command.span);
        this.play(frequencyOfKey(key), undefined, false, false, command.span);
        return;
      }
      case 'rest':
        this.play(0, command.length, command.dotted, false, command.span);
        return;
      case 'tie':
        if (!this.pending) throw new TieMismatchError(undefined, undefined, command.span);
        this.pending.tied = true;
        return;
      default:
        assertNever(command);
    }
  }

  /** Flush the held event and return everything emitted. */
  finish(): Event[] {
    this.release();
    return this.events;
  }

  private shiftOctave(delta: 1 | -1, span: SourceSpan): void {
    const octave = this.state.octave + delta;
    if (isValidOctave(octave)) {
      this.state.octave = octave;
      return;
    }
    if (this.options.octaveShift === 'error') throw new InvalidOctaveError(octave, span);
    // clamp: stay on the boundary octave
    warn('interpreter', `Octave shift to ${octave} clamped to ${this.state.octave}`, { loc: span });
  }

  private play(frequency: number, length: number | undefined, dotted: boolean, tied: boolean, span: SourceSpan): void {
    if (length !== undefined && length <= 0) throw new InvalidLengthError(length, span);
    const duration = durationOf(
      length ?? this.state.defaultLength,
      this.state.tempo,
      dotted || (length === undefined && this.state.defaultDotted),
    );

    const pending = this.pending;
    if (pending?.tied) {
      if (pending.frequency === frequency) {
        pending.duration += duration;
        pending.tied = tied;
        return;
      }
      if (this.options.tieMismatch === 'error') throw new TieMismatchError(pending.frequency, frequency, span);
      warn('interpreter', `Tie from ${pending.frequency} Hz into ${frequency} Hz dropped`, { loc: span });
    }

    this.release();
    this.pending = { frequency, duration, tied, span };
  }

  private release(): void {
    if (!this.pending) return;
    const { frequency, duration } = this.pending;
    this.events.push(Object.freeze({ frequency, duration }));
    this.pending = null;
  }
}

/**
 * Interpret one track's commands with a fresh performance state.
 */
export function interpret(commands: Iterable<Command>, options: Partial<InterpretOptions> = {}): Event[] {
  return new Interpreter(options).run(commands);
}
