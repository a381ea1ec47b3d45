import { Command, InvalidArgumentError, Option } from 'commander';
import { readFileSync } from 'fs';
import {
  configureLogging,
  convert,
  convertAll,
  createLogger,
  exportCpp,
  exportJSON,
  exportJSONTracks,
  formatError,
  isMmlError,
  OctaveShiftPolicy,
  selectTrack,
  splitTracks,
  TieMismatchPolicy,
  tokenizeAll,
} from '@mmlbeep/engine';

const log = createLogger('cli');

type OutputFormat = 'json' | 'cpp';

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
};

interface ConvertCommandOptions {
  track: number;
  format: OutputFormat;
  all?: boolean;
  variable: string;
  octaveShift: OctaveShiftPolicy;
  tieMismatch: TieMismatchPolicy;
}

interface InspectCommandOptions {
  track: number;
}

function parseTrackOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Track must be an integer.');
  return n;
}

const extensions: Record<OutputFormat, string> = { json: '.json', cpp: '.cpp' };

export function defaultOutputPath(input: string, format: OutputFormat): string {
  return input.replace(/\.[^/.]+$/, '') + extensions[format];
}

/**
 * Print an error the way every command reports it: engine errors as a
 * diagnostic with exit code 2, anything else with exit code 1.
 */
function reportFailure(action: string, file: string, err: unknown, debug: boolean): void {
  if (isMmlError(err)) {
    console.error(formatError(err, file));
    if (debug && err.stack) console.error(err.stack);
    process.exitCode = 2;
    return;
  }
  const detail = err instanceof Error ? (debug && err.stack ? err.stack : err.message) : String(err);
  console.error(`Failed to ${action} ${file}:`, detail);
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  const globalOpts = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name('mmlbeep')
    .description('Convert Music Macro Language scores into frequency/duration beep tables')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  program.hook('preAction', () => {
    const { verbose, debug } = globalOpts();
    if (debug) configureLogging({ level: 'debug' });
    else if (verbose) configureLogging({ level: 'info' });
  });

  program
    .command('convert', { isDefault: true })
    .description('Convert one track (or every track) of an MML file')
    .argument('<input>', 'Path to the MML text file')
    .argument('[output]', 'Output file path (default: input name with the format extension)')
    .option('-t, --track <n>', 'Track to convert, 1-based', parseTrackOption, 1)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'cpp']).default('json'))
    .option('-a, --all', 'Write every track as a JSON array of tracks')
    .option('--variable <name>', 'Name of the C++ note vector', 'notes')
    .addOption(
      new Option('--octave-shift <policy>', 'What < and > do past octave 1 or 8').choices(['error', 'clamp']).default('error'),
    )
    .addOption(
      new Option('--tie-mismatch <policy>', 'What a tie into a different pitch does').choices(['error', 'break']).default('error'),
    )
    .action((input: string, output: string | undefined, options: ConvertCommandOptions) => {
      const { verbose = false, debug = false } = globalOpts();
      const policies = { octaveShift: options.octaveShift, tieMismatch: options.tieMismatch };
      const outPath = output ?? defaultOutputPath(input, options.format);

      if (options.all && options.format !== 'json') {
        console.error('--all is only supported with --format json');
        process.exitCode = 2;
        return;
      }

      try {
        const src = readFileSync(input, 'utf8');
        if (options.all) {
          const tracks = convertAll(src, policies);
          const written = exportJSONTracks(tracks, outPath, { debug, verbose });
          console.log(`[OK] Exported ${tracks.length} tracks to ${written}`);
          return;
        }

        const events = convert(src, { track: options.track, ...policies });
        const written =
          options.format === 'cpp'
            ? exportCpp(events, outPath, { variable: options.variable }, { debug, verbose })
            : exportJSON(events, outPath, { debug, verbose });
        console.log(`[OK] Exported ${events.length} events from track ${options.track} to ${written}`);
      } catch (err) {
        reportFailure('convert', input, err, debug);
      }
    });

  program
    .command('verify')
    .description('Parse and interpret every track; exit 0 if valid, non-zero if invalid')
    .argument('<input>', 'Path to the MML text file')
    .action((input: string) => {
      const { debug = false } = globalOpts();
      try {
        const tracks = convertAll(readFileSync(input, 'utf8'));
        const total = tracks.reduce((sum, events) => sum + events.length, 0);
        log.info(`Verified ${input}`, { tracks: tracks.length, events: total });
        console.log(`OK: ${input} parsed (${tracks.length} track${tracks.length === 1 ? '' : 's'}, ${total} events)`);
        process.exitCode = 0;
      } catch (err) {
        reportFailure('verify', input, err, debug);
      }
    });

  program
    .command('inspect')
    .description('Print the commands of one track as JSON')
    .argument('<input>', 'Path to the MML text file')
    .option('-t, --track <n>', 'Track to inspect, 1-based', parseTrackOption, 1)
    .action((input: string, options: InspectCommandOptions) => {
      const { debug = false } = globalOpts();
      try {
        const src = readFileSync(input, 'utf8');
        log.debug(`${input} has ${splitTracks(src).length} tracks`);
        const commands = tokenizeAll(selectTrack(src, options.track));
        console.log(JSON.stringify(commands, null, 2));
      } catch (err) {
        reportFailure('inspect', input, err, debug);
      }
    });

  return program;
}

export async function run(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
