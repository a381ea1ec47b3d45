/*
 * JSON export: the beep document consumed by tone players, an array of
 * `[frequency, duration]` pairs (frequency 0 = delay).
 */
import { writeFileSync } from 'fs';
import { Event } from '../parser/ast.js';
import { createLogger } from '../util/logger.js';
import { error } from '../util/diag.js';

const log = createLogger('export');

export type BeepPair = [frequency: number, duration: number];

export interface ExportOptions {
  debug?: boolean;
  verbose?: boolean;
}

export function toBeepPairs(events: readonly Event[]): BeepPair[] {
  return events.map(ev => [ev.frequency, ev.duration]);
}

/**
 * Reject anything a tone device could not play: negative or fractional
 * values. Throws an Error listing every offending event.
 */
export function validateEvents(events: readonly Event[]): void {
  const errors: string[] = [];
  events.forEach((ev, i) => {
    if (!Number.isInteger(ev.frequency) || ev.frequency < 0) errors.push(`event ${i} has invalid frequency ${ev.frequency}`);
    if (!Number.isInteger(ev.duration) || ev.duration < 0) errors.push(`event ${i} has invalid duration ${ev.duration}`);
  });
  if (errors.length > 0) throw new Error('Event validation failed:\n' + errors.map(e => ` - ${e}`).join('\n'));
}

/** One track as a compact JSON document: `[[262,500],[0,250]]`. */
export function formatJSON(events: readonly Event[]): string {
  validateEvents(events);
  return JSON.stringify(toBeepPairs(events));
}

/** Every track, one array of pairs per track. */
export function formatJSONTracks(tracks: readonly (readonly Event[])[]): string {
  tracks.forEach(validateEvents);
  return JSON.stringify(tracks.map(toBeepPairs));
}

function normalizeJSONPath(outPath: string): string {
  return outPath.toLowerCase().endsWith('.json') ? outPath : `${outPath}.json`;
}

function write(outPath: string, document: string, opts: ExportOptions): string {
  const target = normalizeJSONPath(outPath);
  try {
    writeFileSync(target, document, 'utf8');
  } catch (err) {
    error('export', `Failed to write ${target}: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
  if (opts.debug) log.debug(`Wrote ${document.length} bytes of JSON to ${target}`);
  return target;
}

/**
 * Write one track to `outPath` (".json" is appended when missing).
 * Returns the path actually written.
 */
export function exportJSON(events: readonly Event[], outPath: string, opts: ExportOptions = {}): string {
  if (opts.verbose) log.info(`Exporting ${events.length} events to JSON: ${outPath}`);
  return write(outPath, formatJSON(events), opts);
}

export function exportJSONTracks(tracks: readonly (readonly Event[])[], outPath: string, opts: ExportOptions = {}): string {
  if (opts.verbose) log.info(`Exporting ${tracks.length} tracks to JSON: ${outPath}`);
  return write(outPath, formatJSONTracks(tracks), opts);
}
