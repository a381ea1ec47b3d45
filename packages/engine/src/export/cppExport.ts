/*
 * C++ export: a translation unit defining the note table a Beep()/Sleep()
 * player links against, e.g.
 *
 *   extern std::vector<Note> notes;
 *   for (auto [frequency, duration] : notes) ...
 */
import { writeFileSync } from 'fs';
import { Event } from '../parser/ast.js';
import { createLogger } from '../util/logger.js';
import { error } from '../util/diag.js';
import { ExportOptions, validateEvents } from './jsonExport.js';

const log = createLogger('export');

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface CppOptions {
  /** Name of the vector, default `notes`. */
  variable?: string;
  /** Emit the `Note` struct definition, default true. */
  includeStruct?: boolean;
  indent?: string;
}

export function formatCpp(events: readonly Event[], opts: CppOptions = {}): string {
  const variable = opts.variable ?? 'notes';
  const indent = opts.indent ?? '    ';
  if (!IDENTIFIER.test(variable)) {
    throw new Error(`'${variable}' is not a valid C++ identifier`);
  }
  validateEvents(events);

  const lines: string[] = ['#include <vector>', ''];
  if (opts.includeStruct !== false) {
    lines.push('struct Note {', `${indent}unsigned int frequency;`, `${indent}unsigned int duration;`, '};', '');
  }
  if (events.length === 0) {
    lines.push(`std::vector<Note> ${variable} = {};`);
  } else {
    lines.push(`std::vector<Note> ${variable} = {`);
    for (const ev of events) lines.push(`${indent}{${ev.frequency}, ${ev.duration}},`);
    lines.push('};');
  }
  return lines.join('\n') + '\n';
}

export function exportCpp(
  events: readonly Event[],
  outPath: string,
  cppOpts: CppOptions = {},
  opts: ExportOptions = {},
): string {
  if (opts.verbose) log.info(`Exporting ${events.length} events to C++: ${outPath}`);
  const source = formatCpp(events, cppOpts);
  try {
    writeFileSync(outPath, source, 'utf8');
  } catch (err) {
    error('export', `Failed to write ${outPath}: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
  if (opts.debug) log.debug(`Wrote ${source.length} bytes of C++ to ${outPath}`);
  return outPath;
}
