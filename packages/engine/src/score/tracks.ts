import { SourcePosition } from '../parser/ast.js';
import { TrackIndexOutOfRangeError } from '../errors.js';

/**
 * One track's slice of a score. `offset`, `line` and `column` locate the
 * first character of `text` in the whole score so that positions reported
 * while reading the track point into the original input.
 */
export interface TrackSource {
  /** 1-based track number. */
  index: number;
  text: string;
  offset: number;
  line: number;
  column: number;
}

const HEADER = /^MML@/i;
const TRACK_SEPARATOR = ',';
const SCORE_TERMINATOR = ';';

/**
 * Maps offsets inside a track back to score positions. Lookups are expected
 * in ascending order; asking for an earlier offset rescans from the start.
 */
export class PositionTracker {
  private cursor = 0;
  private line: number;
  private column: number;

  constructor(private readonly source: TrackSource) {
    this.line = source.line;
    this.column = source.column;
  }

  at(localOffset: number): SourcePosition {
    if (localOffset < this.cursor) {
      this.cursor = 0;
      this.line = this.source.line;
      this.column = this.source.column;
    }
    const { text } = this.source;
    while (this.cursor < localOffset) {
      if (text[this.cursor] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.cursor++;
    }
    return { offset: this.source.offset + localOffset, line: this.line, column: this.column };
  }
}

/**
 * Split a score into its tracks.
 *
 * An optional `MML@` header is skipped, `,` starts a new track and `;` ends
 * the score (anything after it is ignored). Newlines are ordinary whitespace
 * inside a track. An empty score yields a single empty track.
 */
export function splitTracks(score: string): TrackSource[] {
  const tracks: TrackSource[] = [];
  const start = HEADER.test(score) ? 4 : 0;

  let line = 1;
  let column = start + 1;
  let trackStart = { offset: start, line, column };

  const push = (end: number) => {
    tracks.push({
      index: tracks.length + 1,
      text: score.slice(trackStart.offset, end),
      ...trackStart,
    });
  };

  for (let i = start; i < score.length; i++) {
    const ch = score[i];
    if (ch === SCORE_TERMINATOR) {
      push(i);
      return tracks;
    }
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    if (ch === TRACK_SEPARATOR) {
      push(i);
      trackStart = { offset: i + 1, line, column };
    }
  }
  push(score.length);
  return tracks;
}

/**
 * Return track `index` (1-based) of `score`.
 * Throws TrackIndexOutOfRangeError when the track does not exist.
 */
export function selectTrack(score: string, index: number): TrackSource {
  const tracks = splitTracks(score);
  if (!Number.isInteger(index) || index < 1 || index > tracks.length) {
    throw new TrackIndexOutOfRangeError(index, tracks.length);
  }
  return tracks[index - 1];
}

export function countTracks(score: string): number {
  return splitTracks(score).length;
}
