// Tempo counts quarter notes per minute, so a whole note (length 1) lasts
// four beats.
const MS_PER_MINUTE = 60_000;
const BEATS_PER_WHOLE_NOTE = 4;
const DOT_FACTOR = 1.5;

/** Unrounded duration in milliseconds. */
export function exactDurationOf(length: number, tempo: number, dotted = false): number {
  const base = (MS_PER_MINUTE * BEATS_PER_WHOLE_NOTE) / (tempo * length);
  return dotted ? base * DOT_FACTOR : base;
}

/**
 * Duration in whole milliseconds of a note of the given length (1 whole,
 * 4 quarter, 16 sixteenth, ...) at `tempo` BPM. Never less than 1 ms.
 */
export function durationOf(length: number, tempo: number, dotted = false): number {
  return Math.max(1, Math.round(exactDurationOf(length, tempo, dotted)));
}
