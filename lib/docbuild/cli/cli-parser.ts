// ABOUTME: CLI argument parsing, output formatting and exit-code mapping for the docs build command.
// ABOUTME: Supports make-style short flags alongside --flag value and --flag=value forms.

import { BuildError } from '../build/errors';
import type { BuildReport, TargetOutcome } from '../build/types';
import { BUILD_EVENT_KINDS, type BuildEventDisplayFormat, type BuildEventKind } from '../events/event-logger';

/**
 * Command-line arguments for the build command
 */
export interface BuildCliArgs {
  /** Targets to bring up to date, in order (empty means the default goal) */
  goals: string[];
  /** Print commands without running them */
  dryRun: boolean;
  /** Run nothing; exit status says whether the goals are up to date */
  question: boolean;
  /** Treat every target as out of date */
  alwaysMake: boolean;
  /** Directory to run the build in */
  directory?: string;
  /** Path to a JSON configuration file */
  configFile?: string;
  /** SQLite file receiving build events */
  eventsDb?: string;
  /** Print recorded build events instead of building */
  showEvents: boolean;
  /** Maximum number of events to print */
  limit: number;
  /** Only print events of this kind */
  kind?: BuildEventKind;
  /** Only print events recorded at or after this time (ms since epoch) */
  since?: number;
  /** Output results in JSON format for automation */
  json: boolean;
  /** Enable verbose logging output */
  verbose: boolean;
  /** Show help information */
  help: boolean;
}

/**
 * Exit codes for different scenarios
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  OUT_OF_DATE: 1,
  ERROR: 1,
  RECIPE_FAILED: 2,
  INVALID_ARGUMENTS: 3,
  UNKNOWN_TARGET: 4,
  DEPENDENCY_CYCLE: 5,
  MISSING_SOURCE: 6,
  COMMAND_NOT_FOUND: 127
} as const;

/**
 * Emoji indicators for consistent output formatting
 */
export const EMOJI = {
  SUCCESS: '✅',
  ERROR: '❌',
  WARNING: '⚠️',
  INFO: 'ℹ️',
  BUILD: '🔨',
  CLEAN: '🧹',
  SUMMARY: '📊',
  ROCKET: '🚀'
} as const;

const VALUE_FLAGS = new Set(['directory', 'config', 'events-db', 'limit', 'kind', 'since']);

const SHORT_FLAGS: Record<string, string> = {
  n: 'dry-run',
  q: 'question',
  B: 'always-make',
  C: 'directory',
  v: 'verbose',
  h: 'help'
};

export const DEFAULT_EVENT_LIMIT = 20;

/**
 * Parse command-line arguments for the build command
 */
export function parseBuildArgs(argv: string[]): BuildCliArgs {
  const args: BuildCliArgs = {
    goals: [],
    dryRun: false,
    question: false,
    alwaysMake: false,
    showEvents: false,
    limit: DEFAULT_EVENT_LIMIT,
    json: false,
    verbose: false,
    help: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // Everything after a bare -- is a goal
    if (arg === '--') {
      args.goals.push(...argv.slice(i + 1));
      break;
    }

    // Handle --flag=value format
    if (arg.startsWith('--') && arg.includes('=')) {
      const separator = arg.indexOf('=');
      setArgValue(args, arg.slice(2, separator), arg.slice(separator + 1));
      continue;
    }

    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (VALUE_FLAGS.has(flag)) {
        setArgValue(args, flag, takeValue(argv, i, arg));
        i++; // Skip the value we just consumed
      } else {
        setArgValue(args, flag, 'true');
      }
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      i = parseShortFlags(args, argv, i);
      continue;
    }

    args.goals.push(arg);
  }

  return args;
}

function takeValue(argv: string[], index: number, arg: string): string {
  if (index + 1 >= argv.length || argv[index + 1].startsWith('-')) {
    throw new BuildCliArgumentError(`Missing value for ${arg}`);
  }
  return argv[index + 1];
}

/**
 * Parse a make-style cluster such as -nB or -Cdocs; returns the index of
 * the last argument consumed.
 */
function parseShortFlags(args: BuildCliArgs, argv: string[], index: number): number {
  const arg = argv[index];
  for (let pos = 1; pos < arg.length; pos++) {
    const letter = arg[pos];
    const flag = SHORT_FLAGS[letter];
    if (flag === undefined) {
      throw new BuildCliArgumentError(`Unknown flag: -${letter}`);
    }
    if (!VALUE_FLAGS.has(flag)) {
      setArgValue(args, flag, 'true');
      continue;
    }

    const attached = arg.slice(pos + 1);
    if (attached.length > 0) {
      setArgValue(args, flag, attached);
      return index;
    }
    setArgValue(args, flag, takeValue(argv, index, `-${letter}`));
    return index + 1;
  }
  return index;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!/^\d+$/.test(value) || limit < 1) {
    throw new BuildCliArgumentError(`Invalid value for --limit: ${value} (expected a positive integer)`);
  }
  return limit;
}

function parseKind(value: string): BuildEventKind {
  const kind = BUILD_EVENT_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new BuildCliArgumentError(`Invalid value for --kind: ${value} (expected one of ${BUILD_EVENT_KINDS.join(', ')})`);
  }
  return kind;
}

function parseSince(value: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new BuildCliArgumentError(`Invalid value for --since: ${value}`);
  }
  return time;
}

function parseBoolean(flag: string, value: string): boolean {
  if (value === 'true' || value === '') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw new BuildCliArgumentError(`Invalid value for --${flag}: ${value}`);
}

/**
 * Set argument value based on flag name
 */
function setArgValue(args: BuildCliArgs, flag: string, value: string): void {
  switch (flag) {
    case 'dry-run':
    case 'just-print':
      args.dryRun = parseBoolean(flag, value);
      break;

    case 'question':
      args.question = parseBoolean(flag, value);
      break;

    case 'always-make':
      args.alwaysMake = parseBoolean(flag, value);
      break;

    case 'directory':
      args.directory = value;
      break;

    case 'config':
      args.configFile = value;
      break;

    case 'events-db':
      args.eventsDb = value;
      break;

    case 'show-events':
      args.showEvents = parseBoolean(flag, value);
      break;

    case 'limit':
      args.limit = parseLimit(value);
      break;

    case 'kind':
      args.kind = parseKind(value);
      break;

    case 'since':
      args.since = parseSince(value);
      break;

    case 'json':
      args.json = parseBoolean(flag, value);
      break;

    case 'verbose':
      args.verbose = parseBoolean(flag, value);
      break;

    case 'help':
      args.help = parseBoolean(flag, value);
      break;

    default:
      throw new BuildCliArgumentError(`Unknown flag: --${flag}`);
  }
}

/**
 * Validate argument combinations and throw appropriate errors
 */
export function validateArgs(args: BuildCliArgs): void {
  // Help flag takes precedence
  if (args.help) {
    return;
  }

  if (args.dryRun && args.question) {
    throw new BuildCliArgumentError('--dry-run and --question cannot be combined');
  }

  for (const goal of args.goals) {
    if (goal.trim().length === 0) {
      throw new BuildCliArgumentError('Target names cannot be empty strings');
    }
  }

  if (args.directory !== undefined && args.directory.trim().length === 0) {
    throw new BuildCliArgumentError('Directory path cannot be empty');
  }

  if (args.showEvents && (args.dryRun || args.question || args.alwaysMake)) {
    throw new BuildCliArgumentError('--show-events cannot be combined with --dry-run, --question or --always-make');
  }

  if (!args.showEvents && (args.kind !== undefined || args.since !== undefined)) {
    throw new BuildCliArgumentError('--kind and --since require --show-events');
  }
}

const SEVERITY_EMOJI: Record<BuildEventDisplayFormat['severity'], string> = {
  info: EMOJI.INFO,
  warning: EMOJI.WARNING,
  error: EMOJI.ERROR
};

/**
 * Format recorded build events, oldest first
 */
export function formatEvents(events: BuildEventDisplayFormat[], options: Pick<BuildCliArgs, 'json'>): string[] {
  if (options.json) {
    return [JSON.stringify({ success: true, events }, null, 2)];
  }

  if (events.length === 0) {
    return [`${EMOJI.INFO} No build events recorded`];
  }

  const lines: string[] = [];
  for (const event of events) {
    lines.push(`${SEVERITY_EMOJI[event.severity]} ${event.timestamp} ${event.summary}`);
    if (event.details) {
      lines.push(`   ${event.details}`);
    }
  }
  return lines;
}

function describeOutcome(outcome: TargetOutcome): string {
  switch (outcome.action) {
    case 'rebuilt':
      return `${EMOJI.BUILD} Rebuilt ${outcome.name}` + (outcome.reason ? ` (${outcome.reason})` : '');
    case 'removed':
      return `${EMOJI.CLEAN} ${outcome.name} done`;
    case 'would-rebuild':
      return `${EMOJI.INFO} Would rebuild ${outcome.name}` + (outcome.reason ? ` (${outcome.reason})` : '');
    case 'nothing-to-do':
      return `${EMOJI.INFO} Nothing to be done for '${outcome.name}'`;
    case 'up-to-date':
      return `${EMOJI.SUCCESS} '${outcome.name}' is up to date`;
  }
}

/**
 * Format a finished build for output; returns the lines printed
 */
export function formatReport(report: BuildReport, options: BuildCliArgs): string[] {
  if (options.json) {
    const jsonOutput = {
      success: true,
      changed: report.changed,
      goals: report.goals,
      targets: report.outcomes.map((outcome) => ({
        name: outcome.name,
        action: outcome.action,
        reason: outcome.reason ?? null,
        command: outcome.commandLine ?? null,
        newer_prerequisites: outcome.newerPrerequisites ?? []
      })),
      duration_ms: report.durationMs
    };
    return [JSON.stringify(jsonOutput, null, 2)];
  }

  const lines: string[] = [];

  if (options.question) {
    lines.push(
      report.changed
        ? `${EMOJI.WARNING} Out of date: ${report.goals.join(', ')}`
        : `${EMOJI.SUCCESS} Up to date: ${report.goals.join(', ')}`
    );
    return lines;
  }

  // Only goals get a line when nothing happened to them, like make
  for (const outcome of report.outcomes) {
    const isGoal = report.goals.includes(outcome.name);
    if (outcome.action === 'up-to-date' || outcome.action === 'nothing-to-do') {
      if (isGoal) {
        lines.push(describeOutcome(outcome));
      }
      continue;
    }
    if (options.verbose) {
      lines.push(describeOutcome(outcome));
    }
  }

  if (options.verbose) {
    const rebuilt = report.outcomes.filter((outcome) => outcome.action === 'rebuilt').length;
    lines.push(`${EMOJI.SUMMARY} ${report.outcomes.length} target(s) checked, ${rebuilt} rebuilt in ${report.durationMs}ms`);
  }

  return lines;
}

/**
 * Show usage/help information
 */
export function showUsage(command: string = 'zwo-docs-build'): void {
  const usage = [
    `${EMOJI.ROCKET} Zwift workout docs build - ${command}`,
    '================================',
    '',
    'USAGE:',
    `  ${command} [options] [target...]`,
    '',
    'TARGETS:',
    '  zwift_workout_file_tag_reference.md   Render the tag reference (default)',
    '  tag_attr_usage.json                   Analyse ./workouts into the usage report',
    '  clean-md | clean-json | clean-all     Remove generated files',
    '',
    'OPTIONS:',
    '  --dry-run, -n           Print commands without running them',
    '  --question, -q          Run nothing; exit 1 if anything is out of date',
    '  --always-make, -B       Rebuild every target',
    '  --directory, -C <dir>   Run the build in <dir>',
    '  --config <file>         JSON configuration file',
    '  --events-db <file>      Record build events in a SQLite database',
    '  --show-events           Print recorded build events (for the given targets, if any)',
    `  --limit <n>             Number of events to print (default ${DEFAULT_EVENT_LIMIT})`,
    '  --kind <kind>           Only print events of this kind (e.g. TARGET_FAILED)',
    '  --since <date>          Only print events recorded since this date',
    '  --json                  Output results in JSON format',
    '  --verbose, -v           Enable verbose logging',
    '  --help, -h              Show this help message',
    '',
    'Short flags can be combined as in make: -nB, -Cdocs.',
    '',
    'ENVIRONMENT VARIABLES:',
    '  DOCBUILD_CONFIG           Configuration file (falls back from --config)',
    '  DOCBUILD_ANALYSE_COMMAND  Analyser command line',
    '  DOCBUILD_RENDER_COMMAND   Renderer command line',
    '  DOCBUILD_EVENTS_DB        Build event database (falls back from --events-db)',
    '',
    'EXIT CODES:',
    `  ${EXIT_CODES.SUCCESS}    Success`,
    `  ${EXIT_CODES.OUT_OF_DATE}    Out of date (--question) or unexpected error`,
    `  ${EXIT_CODES.RECIPE_FAILED}    A recipe failed`,
    `  ${EXIT_CODES.INVALID_ARGUMENTS}    Invalid arguments or configuration`,
    `  ${EXIT_CODES.UNKNOWN_TARGET}    Unknown target`,
    `  ${EXIT_CODES.DEPENDENCY_CYCLE}    Dependency cycle`,
    `  ${EXIT_CODES.MISSING_SOURCE}    Missing source file`,
    `  ${EXIT_CODES.COMMAND_NOT_FOUND}  Command not found`,
    ''
  ];

  console.log(usage.join('\n'));
}

/**
 * Map an error to the process exit code
 */
export function resolveExitCode(error: unknown): number {
  if (error instanceof BuildCliError) {
    return EXIT_CODES.INVALID_ARGUMENTS;
  }

  if (error instanceof BuildError) {
    switch (error.code) {
      case 'INVALID_CONFIG':
        return EXIT_CODES.INVALID_ARGUMENTS;
      case 'UNKNOWN_TARGET':
        return EXIT_CODES.UNKNOWN_TARGET;
      case 'DEPENDENCY_CYCLE':
        return EXIT_CODES.DEPENDENCY_CYCLE;
      case 'MISSING_SOURCE':
        return EXIT_CODES.MISSING_SOURCE;
      case 'RECIPE_FAILED':
        return EXIT_CODES.RECIPE_FAILED;
      case 'COMMAND_NOT_FOUND':
        return EXIT_CODES.COMMAND_NOT_FOUND;
    }
  }

  return EXIT_CODES.ERROR;
}

/**
 * Report an error with structured output; returns the exit code to use
 */
export function handleError(error: unknown, options: Pick<BuildCliArgs, 'json' | 'verbose'>): number {
  const normalized = error instanceof Error ? error : new Error(String(error));
  const code =
    normalized instanceof BuildError || normalized instanceof BuildCliError ? normalized.code : 'UNKNOWN_ERROR';

  if (options.json) {
    // JSON error mode for automation
    const jsonError = {
      success: false,
      error: {
        name: normalized.name,
        message: normalized.message,
        code
      }
    };

    console.error(JSON.stringify(jsonError, null, 2));
  } else if (normalized instanceof BuildCliArgumentError) {
    console.error(`${EMOJI.ERROR} ${normalized.message}`);
    console.error('Use --help for usage information.');
  } else if (normalized instanceof BuildError) {
    console.error(`${EMOJI.ERROR} ${normalized.message}`);
  } else {
    console.error(`${EMOJI.ERROR} Unexpected error: ${normalized.message}`);
    if (options.verbose) {
      console.error('');
      console.error('Stack trace:');
      console.error(normalized.stack);
    }
  }

  return resolveExitCode(normalized);
}

/**
 * Custom error types for CLI operations
 */
export class BuildCliError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'BuildCliError';
  }
}

/**
 * Error for missing or invalid arguments
 */
export class BuildCliArgumentError extends BuildCliError {
  constructor(message: string, code: string = 'INVALID_ARGUMENTS') {
    super(message, code);
    this.name = 'BuildCliArgumentError';
  }
}

/**
 * Log verbose message if verbose mode is enabled
 */
export function verboseLog(message: string, options: Pick<BuildCliArgs, 'verbose'>): void {
  if (options.verbose) {
    console.error(`${EMOJI.INFO} ${message}`);
  }
}
