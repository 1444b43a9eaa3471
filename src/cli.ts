/**
 * exifsweep CLI
 *
 * Modes:
 *  • default      safe copy of <root>/*.jpg into <root>/output
 *  • --from-input auto mode over <root>/input (stability-gated)
 *  • --clean-inline [paths…]  scrub in place under <root>
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join, resolve } from 'node:path';

import { loadConfig, LOG_LEVELS } from './config.js';
import type { AppConfig, LogLevel } from './config.js';
import { CliUsageError, ExifSweepError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createTool } from './engine/index.js';
import { StabilityLedger, resolveStateLocation } from './operations/ledger.js';
import { runSweep } from './operations/sweep.js';
import { runInline, runSafeCopy } from './operations/modes.js';
import { formatTags, inspectFile } from './operations/inspect.js';
import { RunSummary } from './operations/summary.js';
import type { DuplicatePolicy, EngineName, ShowTagsMode, SweepDirectories, TagDisplay } from './types.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function getVersion(): string {
  const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

/**
 * Where CLI output goes. Summaries and tag listings are stdout; fatal
 * reasons are stderr.
 */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
exifsweep [files|dirs...] [options]

Strip EXIF/XMP/IPTC metadata from JPEGs, keeping exposure and orientation tags.

MODES
  (default)                   Scrub <root>/*.jpg into <root>/output, originals untouched
  --from-input                Auto mode: sweep <root>/input into output/ and processed/
  --clean-inline [paths...]   Scrub files in place (destructive)

SCRUBBING
  --paranoia                  Also strip the ICC colour profile
  --copyright <text>          Stamp EXIF Copyright and XMP dc:rights
  --comment <text>            Stamp EXIF UserComment and XMP dc:description
  --engine <name>             exiftool | builtin (default: exiftool)

SELECTION
  -r, --recursive             Recurse into directories
  --max-files <N>             Process at most N files
  --dry-run                   List actions without performing them
  --preview                   Scrub a temporary copy of one file and show its tags

AUTO MODE
  --on-duplicate <policy>     delete | move (default: delete)
  --delete-original           Delete originals instead of moving to processed/
  --stable-seconds <N>        Minimum file age before processing (default: 120)
  --state-file <path>         Stability ledger path, or 'disabled'

OUTPUT
  --show-tags <when>          before | after | both
  --log-level <level>         fatal | error | warn | info | debug | trace | silent
  --debug                     Shorthand for --log-level debug
  -q, --quiet                 Suppress output on success
  --root <dir>                Photos root (default: $EXIFSWEEP_ROOT or /photos)
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export interface CliArgs {
  files: string[];
  fromInput: boolean;
  cleanInline: boolean;
  recursive: boolean;
  dryRun: boolean;
  preview: boolean;
  paranoia: boolean;
  deleteOriginal: boolean;
  quiet: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
  maxFiles?: number;
  onDuplicate?: DuplicatePolicy;
  stableSeconds?: number;
  stateFile?: string;
  engine?: EngineName;
  root?: string;
  showTags?: ShowTagsMode;
  copyright?: string;
  comment?: string;
  logLevel?: LogLevel;
}

function choice<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new CliUsageError(`${flag} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function nonNegativeInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new CliUsageError(`${flag} must be a non-negative integer`);
  }
  return n;
}

export function parseArgs(raw: readonly string[]): CliArgs {
  const args: CliArgs = {
    files: [],
    fromInput: false,
    cleanInline: false,
    recursive: false,
    dryRun: false,
    preview: false,
    paranoia: false,
    deleteOriginal: false,
    quiet: false,
    debug: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i] ?? '';
    const take = (): string => {
      const val = raw[i + 1];
      if (val === undefined) {
        throw new CliUsageError(`${a} requires a value`);
      }
      i++;
      return val;
    };

    switch (a) {
      case '--from-input':                      args.fromInput = true; break;
      case '--clean-inline':                    args.cleanInline = true; break;
      case '-r': case '--recursive':            args.recursive = true; break;
      case '--dry-run':                         args.dryRun = true; break;
      case '--preview':                         args.preview = true; break;
      case '--paranoia':                        args.paranoia = true; break;
      case '--delete-original':                 args.deleteOriginal = true; break;
      case '-q': case '--quiet':                args.quiet = true; break;
      case '--debug':                           args.debug = true; break;
      case '-h': case '--help':                 args.help = true; break;
      case '-v': case '--version':              args.version = true; break;

      case '--max-files':      args.maxFiles = nonNegativeInt(a, take()); break;
      case '--stable-seconds': args.stableSeconds = nonNegativeInt(a, take()); break;
      case '--on-duplicate':   args.onDuplicate = choice(a, take(), ['delete', 'move'] as const); break;
      case '--engine':         args.engine = choice(a, take(), ['exiftool', 'builtin'] as const); break;
      case '--show-tags':      args.showTags = choice(a, take(), ['before', 'after', 'both'] as const); break;
      case '--log-level': {
        const level = take();
        args.logLevel = level === 'crit' ? 'fatal' : choice(a, level, LOG_LEVELS);
        break;
      }
      case '--state-file':     args.stateFile = take(); break;
      case '--root':           args.root = take(); break;
      case '--copyright':      args.copyright = take(); break;
      case '--comment':        args.comment = take(); break;

      default:
        if (a.startsWith('-') && a !== '-') {
          throw new CliUsageError(`Unknown option: ${a}`);
        }
        args.files.push(a);
    }
  }

  if (args.cleanInline && args.fromInput) {
    throw new CliUsageError('--clean-inline and --from-input cannot be used together.');
  }
  if (args.files.length > 0 && !args.cleanInline) {
    throw new CliUsageError('Positional file or directory arguments require --clean-inline.');
  }
  return args;
}

// ─── Run ──────────────────────────────────────────────────────────────────────

function logLevelFor(args: CliArgs, config: AppConfig): LogLevel {
  if (args.quiet) return 'silent';
  if (args.debug) return 'debug';
  return args.logLevel ?? config.LOG_LEVEL;
}

export function pipelineDirectories(root: string): SweepDirectories {
  return {
    input: join(root, 'input'),
    output: join(root, 'output'),
    processed: join(root, 'processed'),
    errors: join(root, 'errors'),
  };
}

function tagDisplay(mode: ShowTagsMode, io: CliIo, log: Logger): TagDisplay {
  return {
    mode,
    async print(label, path) {
      try {
        const tags = await inspectFile(path);
        io.out('');
        io.out(`Tags ${label} ${path}:`);
        for (const line of formatTags(tags)) io.out(line);
      } catch (err) {
        log.error({ path, err: errorMessage(err) }, 'Failed to read tags');
      }
    },
  };
}

async function run(args: CliArgs, config: AppConfig, io: CliIo, log: Logger): Promise<RunSummary> {
  const root = resolve(args.root ?? config.EXIFSWEEP_ROOT);
  const directories = pipelineDirectories(root);

  log.debug({ args, root, engine: args.engine ?? config.EXIFSWEEP_ENGINE }, 'CLI arguments');

  const statePath = await resolveStateLocation({
    override: args.stateFile,
    envPath: config.EXIFSWEEP_STATE,
    root,
    logger: log,
  });
  io.out(`State path: ${statePath ?? 'disabled'}`);
  if (statePath === null) io.out('State disabled: using mtime-only stability.');

  const tool = createTool(args.engine ?? config.EXIFSWEEP_ENGINE, { exiftoolPath: config.EXIFTOOL_PATH });
  const showTagsMode = args.preview ? 'both' : args.showTags;
  const showTags = showTagsMode ? tagDisplay(showTagsMode, io, log) : undefined;
  const stamp = { copyright: args.copyright, comment: args.comment };
  const common = {
    tool,
    recursive: args.recursive,
    dryRun: args.dryRun || args.preview,
    paranoia: args.paranoia,
    maxFiles: args.preview ? 1 : args.maxFiles,
    stamp,
    showTags,
    logger: log,
    summary: new RunSummary(),
  };

  if (args.fromInput) {
    return runSweep({
      ...common,
      directories,
      ledger: new StabilityLedger(statePath, log),
      stableSeconds: args.stableSeconds ?? config.EXIFSWEEP_STABLE_SECONDS,
      onDuplicate: args.onDuplicate ?? config.EXIFSWEEP_ON_DUPLICATE,
      deleteOriginal: args.deleteOriginal,
    });
  }
  if (args.cleanInline) {
    return runInline({ ...common, root, paths: args.files, preview: args.preview ? showTags?.print : undefined });
  }
  return runSafeCopy({ ...common, root, directories });
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and resolve to the process exit code.
 *
 * @param uid - effective user id, undefined where the platform has none
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = consoleIo,
  uid: number | undefined = process.getuid?.()
): Promise<number> {
  let args: CliArgs;
  let config: AppConfig;
  try {
    args = parseArgs(argv);
    if (args.help) {
      io.out(HELP);
      return 0;
    }
    if (args.version) {
      io.out(`exifsweep ${getVersion()}`);
      return 0;
    }
    config = loadConfig(env);
  } catch (err) {
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  }

  if (uid === 0 && !config.ALLOW_ROOT) {
    io.err('Running as root is not allowed unless ALLOW_ROOT=1 is set.');
    return 1;
  }

  // quiet: hold stdout back, replay it on stderr only when the run fails
  const held: string[] = [];
  const output: CliIo = args.quiet ? { out: line => held.push(line), err: io.err } : io;
  const log = createLogger({ level: logLevelFor(args, config), format: config.LOG_FORMAT });

  try {
    const summary = await run(args, config, output, log);
    for (const line of summary.renderLines()) output.out(line);
    output.out(summary.machineLine());
    return 0;
  } catch (err) {
    for (const line of held) io.err(line);
    io.err(err instanceof ExifSweepError ? err.message : `Error: ${errorMessage(err)}`);
    return 1;
  }
}
