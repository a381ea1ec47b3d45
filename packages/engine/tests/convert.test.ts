import { convert, convertAll } from '../src/index.js';
import { InvalidOctaveError, MmlSyntaxError, TrackIndexOutOfRangeError } from '../src/errors.js';

const pairs = (score: string, track?: number) =>
  convert(score, { track }).map(ev => [ev.frequency, ev.duration]);

describe('convert', () => {
  test('plays the first track by default', () => {
    expect(pairs('t120 l4 c d e')).toEqual([[262, 500], [294, 500], [330, 500]]);
  });

  test('half-note rest', () => {
    expect(pairs('r2')).toEqual([[0, 1000]]);
  });

  test('tied quarter notes make one half-note event', () => {
    expect(pairs('c&c')).toEqual([[262, 1000]]);
  });

  test('selects the requested track', () => {
    expect(pairs('c,d,e', 2)).toEqual([[294, 500]]);
    expect(pairs('c,d,e', 3)).toEqual([[330, 500]]);
  });

  test('requesting track 3 of a 2-track score fails', () => {
    expect(() => convert('c,d', { track: 3 })).toThrow(TrackIndexOutOfRangeError);
    expect(() => convert('c,d', { track: 0 })).toThrow(TrackIndexOutOfRangeError);
  });

  test('header and terminator', () => {
    expect(pairs('MML@t120 l8 c;garbage')).toEqual([[262, 250]]);
  });

  test('passes interpreter policies through', () => {
    expect(convert('o8 > c', { octaveShift: 'clamp' })).toEqual([{ frequency: 4186, duration: 500 }]);
    expect(convert('c&d', { tieMismatch: 'break' })).toEqual([
      { frequency: 262, duration: 500 },
      { frequency: 294, duration: 500 },
    ]);
  });

  test('accidentals are range-checked against the sounding octave', () => {
    expect(() => convert('o8 b+')).toThrow(InvalidOctaveError);
    expect(() => convert('o1 c-')).toThrow(InvalidOctaveError);
    expect(pairs('o8 b')).toEqual([[7902, 500]]);
  });

  test('a bare dotted length command dots the current default', () => {
    expect(pairs('l8 l. c')).toEqual([[262, 375]]);
  });

  test('only the selected track is read', () => {
    expect(pairs('c, x', 1)).toEqual([[262, 500]]);
    expect(() => convert('c, x', { track: 2 })).toThrow(MmlSyntaxError);
  });

  test('syntax errors report score positions', () => {
    expect.assertions(3);
    expect(() => convert('c\nd e!', { track: 1 })).toThrow("Unexpected character '!'");
    try {
      convert('c,\nd e!', { track: 2 });
    } catch (err) {
      expect(err).toBeInstanceOf(MmlSyntaxError);
      if (err instanceof MmlSyntaxError) {
        expect(err.span).toEqual({ offset: 6, line: 2, column: 4, length: 1 });
      }
    }
  });
});

describe('convertAll', () => {
  test('each track has its own state', () => {
    const tracks = convertAll('t60 o5 c, d');
    expect(tracks.map(t => t.map(ev => [ev.frequency, ev.duration]))).toEqual([[[523, 1000]], [[294, 500]]]);
  });

  test('an error in any track aborts', () => {
    expect(() => convertAll('c, o9 d')).toThrow('Octave 9 is out of range 1..8');
  });
});
