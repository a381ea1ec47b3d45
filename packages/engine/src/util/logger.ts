/**
 * mmlbeep Logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (tokenizer, interpreter, export, cli, ...)
 * - Structured logging support (objects are passed through to the console)
 * - Safe production defaults (error-only)
 * - Environment configuration for Node.js processes
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@mmlbeep/engine';
 *
 * const log = createLogger('interpreter');
 *
 * log.debug('Starting track');
 * log.info({ track: 1, events: 42 });
 * log.warn('Octave clamped');
 * log.error('Failed to write output', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(level => level === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['interpreter', 'tokenizer'],
 *   timestamps: false
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[mmlbeep] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Looks for: MMLBEEP_LOG_LEVEL, MMLBEEP_LOG_MODULES (comma separated).
 * An unknown level is ignored.
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const levelStr = env.MMLBEEP_LOG_LEVEL?.trim().toLowerCase();
  const level = levelStr && isLogLevel(levelStr) ? levelStr : undefined;
  const modulesStr = env.MMLBEEP_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (level || modules) {
    configureLogging({
      level: level ?? config.level,
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

/**
 * Restore the default configuration (error level, all modules).
 */
export function resetLogging(): void {
  config = { level: 'error', modules: undefined, timestamps: true };
  moduleSet.clear();
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

type OutputLevel = Exclude<LogLevel, 'none'>;

const sinks: Record<OutputLevel, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.info(...args),
  debug: (...args) => console.log(...args),
};

function output(level: OutputLevel, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  sinks[level](prefix, ...args);
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'tokenizer', 'interpreter', 'cli')
 */
export function createLogger(module: string): Logger {
  const emit = (level: OutputLevel) => (...args: unknown[]) => {
    if (shouldLog(level, module)) {
      output(level, module, args);
    }
  };
  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
  };
}

export default createLogger;
