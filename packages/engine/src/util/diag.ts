import { SourcePosition } from '../parser/ast.js';
import { MmlError, MmlErrorKind } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  file?: string;
  loc?: SourcePosition | null;
}

const componentByKind: Record<MmlErrorKind, string> = {
  SyntaxError: 'tokenizer',
  TrackIndexOutOfRange: 'tracks',
  InvalidOctave: 'interpreter',
  InvalidLength: 'interpreter',
  InvalidTempo: 'interpreter',
  InvalidNote: 'interpreter',
  TieMismatch: 'interpreter',
};

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const parts: string[] = [`[${level}]`, `[${component || 'unknown'}]`, message];
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (meta.loc) {
      fields.push(`line=${meta.loc.line}`);
      fields.push(`column=${meta.loc.column}`);
    }
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

/**
 * Render an engine error the way the CLI reports it, e.g.
 * `[ERROR] [tokenizer] Unexpected character '!' file=song.mml, line=1, column=5`.
 */
export function formatError(err: MmlError, file?: string): string {
  return formatDiagnostic('ERROR', componentByKind[err.kind], err.message, { file, loc: err.span });
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, formatError, warn, error };
