import { Event } from './parser/ast.js';
import { tokenize } from './parser/tokenizer.js';
import { selectTrack, splitTracks } from './score/tracks.js';
import { interpret } from './interpreter/interpreter.js';
import { InterpretOptions } from './interpreter/state.js';
import { createLogger } from './util/logger.js';

const log = createLogger('engine');

export interface ConvertOptions extends Partial<InterpretOptions> {
  /** 1-based track number, default 1. */
  track?: number;
}

/**
 * Convert one track of an MML score into playback events.
 *
 * @example
 * ```typescript
 * convert('t120 l4 c d e');
 * // [{ frequency: 262, duration: 500 }, { frequency: 294, duration: 500 }, { frequency: 330, duration: 500 }]
 * ```
 */
export function convert(score: string, options: ConvertOptions = {}): Event[] {
  const { track = 1, ...interpretOptions } = options;
  const source = selectTrack(score, track);
  const events = interpret(tokenize(source), interpretOptions);
  log.debug(`Track ${track}: ${events.length} events`);
  return events;
}

/** Convert every track of a score, each with its own performance state. */
export function convertAll(score: string, options: Partial<InterpretOptions> = {}): Event[][] {
  return splitTracks(score).map(source => {
    const events = interpret(tokenize(source), options);
    log.debug(`Track ${source.index}: ${events.length} events`);
    return events;
  });
}

export * from './parser/ast.js';
export * from './errors.js';
export { tokenize, tokenizeAll, CommandSequence } from './parser/tokenizer.js';
export { lex, type LexResult } from './parser/lexer.js';
export { splitTracks, selectTrack, countTracks, PositionTracker, type TrackSource } from './score/tracks.js';
export { interpret, Interpreter } from './interpreter/interpreter.js';
export * from './interpreter/state.js';
export * from './theory/index.js';
export * from './export/index.js';
export * from './util/index.js';
