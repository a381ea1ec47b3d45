import type { ILexingError, IToken } from 'chevrotain';
import { Accidental, Command, NoteLetter, SourceSpan } from './ast.js';
import { lex } from './lexer.js';
import { isTokenName, TokenName } from './tokens.js';
import { MmlSyntaxError } from '../errors.js';
import { PositionTracker, TrackSource } from '../score/tracks.js';

// Component parts of a token image. Every image reaching these has already
// been matched by the corresponding token pattern.
const NOTE_PARTS = /^([A-Ga-g])([+#-]?)(\d*)(\.?)(&?)$/;
const REST_PARTS = /^[Rr](\d*)(\.?)$/;
const LENGTH_PARTS = /^[Ll](\d*)(\.?)$/;
const NUMBER_SUFFIX = /^[A-Za-z](\d*)$/;

function toNumber(digits: string | undefined): number | undefined {
  return digits ? Number.parseInt(digits, 10) : undefined;
}

function toLetter(ch: string): NoteLetter {
  switch (ch.toUpperCase()) {
    case 'C': return 'C';
    case 'D': return 'D';
    case 'E': return 'E';
    case 'F': return 'F';
    case 'G': return 'G';
    case 'A': return 'A';
    default: return 'B';
  }
}

function toAccidental(marker: string): Accidental {
  if (marker === '+' || marker === '#') return 1;
  if (marker === '-') return -1;
  return 0;
}

function toCommand(name: TokenName, image: string, span: SourceSpan): Command | null {
  switch (name) {
    case 'WhiteSpace':
      return null;
    case 'Note': {
      const [, letter = 'C', accidental = '', digits, dot, tie] = NOTE_PARTS.exec(image) ?? [];
      return {
        type: 'note',
        letter: toLetter(letter),
        accidental: toAccidental(accidental),
        length: toNumber(digits),
        dotted: dot === '.',
        tied: tie === '&',
        span,
      };
    }
    case 'AbsoluteNote':
      return { type: 'absoluteNote', key: toNumber(NUMBER_SUFFIX.exec(image)?.[1]), span };
    case 'Rest': {
      const [, digits, dot] = REST_PARTS.exec(image) ?? [];
      return { type: 'rest', length: toNumber(digits), dotted: dot === '.', span };
    }
    case 'Octave':
      return { type: 'setOctave', octave: toNumber(NUMBER_SUFFIX.exec(image)?.[1]), span };
    case 'OctaveUp':
      return { type: 'shiftOctave', delta: 1, span };
    case 'OctaveDown':
      return { type: 'shiftOctave', delta: -1, span };
    case 'Length': {
      const [, digits, dot] = LENGTH_PARTS.exec(image) ?? [];
      return { type: 'setDefaultLength', length: toNumber(digits), dotted: dot === '.', span };
    }
    case 'Tempo':
      return { type: 'setTempo', bpm: toNumber(NUMBER_SUFFIX.exec(image)?.[1]), span };
    case 'Volume':
      return { type: 'setVolume', volume: toNumber(NUMBER_SUFFIX.exec(image)?.[1]), span };
    case 'Tie':
      return { type: 'tie', span };
  }
}

/**
 * The commands of one track, read lazily.
 *
 * Each iteration lexes the track afresh, so the sequence can be walked any
 * number of times. An unrecognised character throws MmlSyntaxError once the
 * iteration reaches it; commands before it are yielded normally.
 */
export class CommandSequence implements Iterable<Command> {
  constructor(readonly source: TrackSource) {}

  *[Symbol.iterator](): Generator<Command, void, undefined> {
    const { tokens, errors } = lex(this.source.text);
    const positions = new PositionTracker(this.source);
    const firstError: ILexingError | undefined = errors[0];

    for (const token of tokens) {
      if (firstError && token.startOffset > firstError.offset) {
        throw this.syntaxError(firstError, positions);
      }
      const command = this.commandOf(token, positions);
      if (command) yield command;
    }
    if (firstError) throw this.syntaxError(firstError, positions);
  }

  private commandOf(token: IToken, positions: PositionTracker): Command | null {
    const name = token.tokenType.name;
    if (!isTokenName(name)) {
      throw new Error(`Lexer produced unknown token type '${name}'`);
    }
    const span = { ...positions.at(token.startOffset), length: token.image.length };
    return toCommand(name, token.image, span);
  }

  private syntaxError(err: ILexingError, positions: PositionTracker): MmlSyntaxError {
    const char = this.source.text.charAt(err.offset);
    return new MmlSyntaxError(char, { ...positions.at(err.offset), length: 1 });
  }
}

export function tokenize(source: TrackSource): CommandSequence {
  return new CommandSequence(source);
}

/** Read every command of a track eagerly. */
export function tokenizeAll(source: TrackSource): Command[] {
  return Array.from(tokenize(source));
}
