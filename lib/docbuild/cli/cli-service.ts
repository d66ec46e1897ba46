// ABOUTME: CLI service layer wiring configuration, filesystem, command runner and event log into the orchestrator.

import { resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { BuildOrchestrator } from '../build/orchestrator';
import { NodeBuildFileSystem } from '../build/node-file-system';
import { TargetGraph } from '../build/target-graph';
import type { BuildFileSystem, CommandRunner } from '../build/types';
import { loadBuildConfig, type BuildConfig } from '../config/build-config';
import {
  createBuildEventLogger,
  openEventDatabase,
  type BuildEventLogger,
  type BuildEventRow
} from '../events/event-logger';
import { NodeCommandRunner } from '../process/command-runner';
import {
  BuildCliArgumentError,
  EXIT_CODES,
  formatEvents,
  formatReport,
  handleError,
  parseBuildArgs,
  showUsage,
  validateArgs,
  verboseLog,
  type BuildCliArgs
} from './cli-parser';

/**
 * Overridable collaborators, mainly for tests
 */
export interface BuildCliDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  fs?: BuildFileSystem;
  runner?: CommandRunner;
  eventLogger?: BuildEventLogger;
  /** Receives stdout lines; defaults to console.log */
  print?: (line: string) => void;
}

const FALLBACK_ARGS: Pick<BuildCliArgs, 'json' | 'verbose'> = { json: false, verbose: false };

/**
 * Parse argv, run the requested goals and return the exit status
 */
export async function runBuildCli(argv: string[], deps: BuildCliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  let args: BuildCliArgs | undefined;
  let database: Database.Database | undefined;

  try {
    args = parseBuildArgs(argv);
    validateArgs(args);

    if (args.help) {
      showUsage();
      return EXIT_CODES.SUCCESS;
    }

    const workingDirectory = resolve(deps.cwd ?? process.cwd(), args.directory ?? '.');
    const config: BuildConfig = loadBuildConfig({
      workingDirectory,
      configFile: args.configFile,
      env: deps.env
    });
    if (config.source) {
      verboseLog(`Loaded configuration from ${config.source}`, args);
    }
    for (const warning of config.warnings) {
      verboseLog(warning, args);
    }

    const fs = deps.fs ?? new NodeBuildFileSystem(workingDirectory);
    const root = await fs.stat('.');
    if (!root || !root.isDirectory) {
      throw new BuildCliArgumentError(`Directory not found: ${workingDirectory}`);
    }

    let eventLogger = deps.eventLogger;
    const eventsDb = args.eventsDb ?? config.eventsDb;
    if (!eventLogger && eventsDb) {
      database = openEventDatabase(resolve(workingDirectory, eventsDb));
      eventLogger = createBuildEventLogger(database);
      verboseLog(`Recording build events in ${eventsDb}`, args);
    }

    if (args.showEvents) {
      if (!eventLogger) {
        throw new BuildCliArgumentError(
          '--show-events needs an events database (--events-db, DOCBUILD_EVENTS_DB or eventsDb in the configuration)'
        );
      }
      const events = selectEvents(eventLogger, args);
      for (const line of formatEvents(eventLogger.formatEventsForCli(events), args)) {
        print(line);
      }
      return EXIT_CODES.SUCCESS;
    }

    const orchestrator = new BuildOrchestrator({
      graph: new TargetGraph(config.targets),
      fs,
      runner: deps.runner ?? new NodeCommandRunner({ workingDirectory }),
      eventLogger
    });

    const options = args;
    if (!options.question && !options.json) {
      orchestrator.on('command', (event) => print(event.commandLine));
    }
    orchestrator.on('targetComplete', (outcome) => {
      if (outcome.action === 'up-to-date') {
        verboseLog(`'${outcome.name}' is up to date`, options);
      }
    });

    const goals = args.goals.length > 0 ? args.goals : [config.defaultGoal];
    verboseLog(`Goals: ${goals.join(', ')} (working directory ${workingDirectory})`, args);

    const report = await orchestrator.build(goals, {
      dryRun: args.dryRun || args.question,
      alwaysMake: args.alwaysMake
    });

    for (const line of formatReport(report, args)) {
      print(line);
    }

    if (args.question && report.changed) {
      return EXIT_CODES.OUT_OF_DATE;
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return handleError(error, args ?? FALLBACK_ARGS);
  } finally {
    database?.close();
  }
}

/**
 * Pick the events asked for by --show-events, oldest first and at most --limit of them
 */
function selectEvents(eventLogger: BuildEventLogger, args: BuildCliArgs): BuildEventRow[] {
  let events: BuildEventRow[];
  if (args.goals.length > 0) {
    events = args.goals.flatMap((goal) => eventLogger.getTargetEvents(goal));
  } else if (args.kind !== undefined) {
    events = eventLogger.getEventsByKind(args.kind, args.limit);
  } else if (args.since !== undefined) {
    events = eventLogger.getEventsByTimeRange(args.since, Date.now());
  } else {
    events = eventLogger.getAllEvents(args.limit);
  }

  const { kind, since } = args;
  return events
    .filter((event) => kind === undefined || event.kind === kind)
    .filter((event) => since === undefined || event.ts >= since)
    .sort((a, b) => a.ts - b.ts || a.id - b.id)
    .slice(-args.limit);
}
