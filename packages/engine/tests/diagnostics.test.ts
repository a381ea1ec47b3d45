import { formatDiagnostic, formatError } from '../src/util/diag.js';
import {
  configureLogging,
  createLogger,
  getLoggingConfig,
  loadLoggingFromEnv,
  resetLogging,
} from '../src/util/logger.js';
import { MmlSyntaxError, TieMismatchError, TrackIndexOutOfRangeError } from '../src/errors.js';

afterEach(() => {
  resetLogging();
});

describe('diagnostics', () => {
  test('formats level, component, message and location', () => {
    expect(formatDiagnostic('WARN', 'interpreter', 'Octave clamped', { file: 'a.mml', loc: { offset: 0, line: 2, column: 3 } })).toBe(
      '[WARN] [interpreter] Octave clamped file=a.mml, line=2, column=3',
    );
    expect(formatDiagnostic('INFO', '', 'hello')).toBe('[INFO] [unknown] hello');
  });

  test('formats engine errors by component', () => {
    const syntax = new MmlSyntaxError('!', { offset: 4, line: 1, column: 5, length: 1 });
    expect(formatError(syntax, 'song.mml')).toBe("[ERROR] [tokenizer] Unexpected character '!' file=song.mml, line=1, column=5");
    expect(formatError(new TrackIndexOutOfRangeError(3, 2))).toBe('[ERROR] [tracks] Track 3 does not exist (score has 2 tracks)');
    expect(formatError(new TieMismatchError(262, 294, { offset: 2, line: 1, column: 3, length: 1 }))).toBe(
      '[ERROR] [interpreter] Tie from 262 Hz cannot continue into 294 Hz line=1, column=3',
    );
  });

  test('errors are named after their class', () => {
    expect(new TrackIndexOutOfRangeError(0, 1).name).toBe('TrackIndexOutOfRangeError');
    expect(new TrackIndexOutOfRangeError(1, 1).message).toBe('Track 1 does not exist (score has 1 track)');
  });
});

describe('logger', () => {
  let warnSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn');
    logSpy = jest.spyOn(console, 'log');
    warnSpy.mockClear();
    logSpy.mockClear();
  });

  test('defaults to error level', () => {
    expect(getLoggingConfig().level).toBe('error');
    createLogger('test').warn('hidden');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  test('prints messages at or above the configured level', () => {
    configureLogging({ level: 'warn', timestamps: false });
    const log = createLogger('test');
    log.warn('careful', { octave: 9 });
    log.debug('hidden');
    expect(warnSpy).toHaveBeenCalledWith('[test]', 'careful', { octave: 9 });
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('module filter limits output to the named modules', () => {
    configureLogging({ level: 'debug', timestamps: false, modules: ['cli'] });
    createLogger('interpreter').debug('hidden');
    createLogger('cli').debug('shown');
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[cli]', 'shown');
  });

  test('reads level and modules from the environment', () => {
    loadLoggingFromEnv({ MMLBEEP_LOG_LEVEL: 'WARN', MMLBEEP_LOG_MODULES: 'cli, export' });
    expect(getLoggingConfig()).toMatchObject({ level: 'warn', modules: ['cli', 'export'] });
  });

  test('ignores an unknown level', () => {
    loadLoggingFromEnv({ MMLBEEP_LOG_LEVEL: 'loud' });
    expect(getLoggingConfig().level).toBe('error');
  });
});
