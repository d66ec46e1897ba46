// ABOUTME: Incremental build orchestrator: plans goals, checks staleness by mtime, runs recipes in order.
// ABOUTME: Captured output goes to a temporary sibling and replaces the target only on success.

import { EventEmitter } from 'node:events';
import { basename, dirname, join } from 'node:path';
import { CommandNotFoundError, RecipeFailedError, BuildError } from './errors';
import { TargetGraph, type PlannedTarget } from './target-graph';
import type {
  BuildFileSystem,
  BuildOptions,
  BuildReport,
  CommandRunner,
  CommandRunResult,
  Recipe,
  RecipeToken,
  StaleReason,
  TargetDefinition,
  TargetOutcome
} from './types';
import type { BuildEventLogger } from '../events/event-logger';

export interface BuildOrchestratorDeps {
  graph: TargetGraph;
  fs: BuildFileSystem;
  runner: CommandRunner;
  eventLogger?: BuildEventLogger;
}

export interface StalenessVerdict {
  stale: boolean;
  reason?: StaleReason;
  newerPrerequisites?: string[];
}

export interface CommandEvent {
  target: string;
  commandLine: string;
  dryRun: boolean;
}

export interface BuildOrchestrator {
  on(event: 'command', listener: (event: CommandEvent) => void): this;
  on(event: 'targetComplete', listener: (outcome: TargetOutcome) => void): this;
  emit(event: 'command', payload: CommandEvent): boolean;
  emit(event: 'targetComplete', payload: TargetOutcome): boolean;
}

/**
 * Quote an argv element for display the way a POSIX shell would need it
 */
function shellQuote(arg: string): string {
  if (arg.length > 0 && /^[A-Za-z0-9_\-./=:@%+,]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommandLine(argv: string[], stdoutPath?: string): string {
  const command = argv.map(shellQuote).join(' ');
  return stdoutPath ? `${command} > ${shellQuote(stdoutPath)}` : command;
}

export function temporaryPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.tmp`);
}

/**
 * Expand recipe tokens; a first-prerequisite reference with no
 * prerequisites disappears rather than becoming an empty argument.
 */
export function expandTokens(tokens: RecipeToken[], prerequisites: string[]): string[] {
  const expanded: string[] = [];
  for (const token of tokens) {
    if (typeof token === 'string') {
      expanded.push(token);
    } else if (prerequisites.length > 0) {
      expanded.push(prerequisites[0]);
    }
  }
  return expanded;
}

/**
 * True only for the executable itself being missing; an ENOENT from opening
 * the output file carries a different syscall.
 */
function isSpawnNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT' &&
    'syscall' in error &&
    typeof error.syscall === 'string' &&
    error.syscall.startsWith('spawn')
  );
}

export class BuildOrchestrator extends EventEmitter {
  private readonly graph: TargetGraph;
  private readonly fs: BuildFileSystem;
  private readonly runner: CommandRunner;
  private readonly eventLogger?: BuildEventLogger;

  constructor(deps: BuildOrchestratorDeps) {
    super();
    this.graph = deps.graph;
    this.fs = deps.fs;
    this.runner = deps.runner;
    this.eventLogger = deps.eventLogger;
  }

  /**
   * Bring every goal up to date, in order. Each target runs at most once.
   */
  async build(goals: string[], options: BuildOptions = {}): Promise<BuildReport> {
    const startTime = Date.now();
    const dryRun = options.dryRun === true;
    const alwaysMake = options.alwaysMake === true;

    this.eventLogger?.logBuildStarted({ goals, dry_run: dryRun, always_make: alwaysMake });

    const outcomes: TargetOutcome[] = [];
    try {
      const plan = await this.graph.plan(goals, this.fs);
      const rebuilt = new Set<string>();

      for (const step of plan.steps) {
        const outcome = await this.processStep(step, rebuilt, dryRun, alwaysMake);
        outcomes.push(outcome);
        this.emit('targetComplete', outcome);
      }
    } catch (error) {
      this.logBuildFinished(false, outcomes, startTime);
      throw error;
    }

    this.logBuildFinished(true, outcomes, startTime);

    return {
      goals,
      outcomes,
      changed: outcomes.some((outcome) => outcome.action !== 'up-to-date' && outcome.action !== 'nothing-to-do'),
      durationMs: Date.now() - startTime
    };
  }

  /**
   * Decide whether a target needs its recipe run
   */
  async checkStaleness(
    target: TargetDefinition,
    prerequisites: string[],
    rebuilt: ReadonlySet<string>,
    alwaysMake: boolean = false
  ): Promise<StalenessVerdict> {
    if (target.phony) {
      return { stale: true, reason: 'phony' };
    }

    const targetStat = await this.fs.stat(target.name);
    if (!targetStat) {
      return { stale: true, reason: 'missing' };
    }

    if (prerequisites.some((prerequisite) => this.graph.isPhony(prerequisite) || rebuilt.has(prerequisite))) {
      return { stale: true, reason: 'prerequisite-rebuilt' };
    }

    const newerPrerequisites: string[] = [];
    for (const prerequisite of prerequisites) {
      const stat = await this.fs.stat(prerequisite);
      if (stat && stat.mtimeMs > targetStat.mtimeMs) {
        newerPrerequisites.push(prerequisite);
      }
    }

    if (newerPrerequisites.length > 0) {
      return { stale: true, reason: 'newer-prerequisite', newerPrerequisites };
    }

    if (alwaysMake) {
      return { stale: true, reason: 'forced' };
    }

    return { stale: false };
  }

  private async processStep(
    step: PlannedTarget,
    rebuilt: Set<string>,
    dryRun: boolean,
    alwaysMake: boolean
  ): Promise<TargetOutcome> {
    const { target, prerequisites } = step;
    const startTime = Date.now();
    const verdict = await this.checkStaleness(target, prerequisites, rebuilt, alwaysMake);

    if (!verdict.stale) {
      this.eventLogger?.logTargetUpToDate(target.name);
      return { name: target.name, action: 'up-to-date', durationMs: Date.now() - startTime };
    }

    rebuilt.add(target.name);

    try {
      const { action, commandLine } = await this.runRecipe(target, target.recipe, prerequisites, dryRun);
      const outcome: TargetOutcome = {
        name: target.name,
        action,
        reason: verdict.reason,
        newerPrerequisites: verdict.newerPrerequisites,
        commandLine,
        durationMs: Date.now() - startTime
      };

      if (!dryRun && action === 'rebuilt' && verdict.reason) {
        this.eventLogger?.logTargetRebuilt(target.name, {
          reason: verdict.reason,
          command_line: commandLine,
          newer_prerequisites: verdict.newerPrerequisites,
          duration_ms: outcome.durationMs
        });
      }

      return outcome;
    } catch (error) {
      if (error instanceof Error) {
        this.eventLogger?.logTargetFailed(target.name, {
          error: {
            name: error.name,
            message: error.message,
            code: error instanceof BuildError ? error.code : undefined
          },
          exit_code: error instanceof RecipeFailedError ? error.exitCode : undefined,
          stderr: error instanceof RecipeFailedError ? error.stderr : undefined
        });
      }
      throw error;
    }
  }

  private async runRecipe(
    target: TargetDefinition,
    recipe: Recipe,
    prerequisites: string[],
    dryRun: boolean
  ): Promise<{ action: TargetOutcome['action']; commandLine?: string }> {
    switch (recipe.kind) {
      case 'none':
        return { action: 'nothing-to-do' };

      case 'remove': {
        const path: string | undefined = expandTokens([recipe.path], prerequisites)[0];
        const commandLine = path ? formatCommandLine(['rm', '-f', path]) : 'rm -f';
        this.emit('command', { target: target.name, commandLine, dryRun });

        if (dryRun) {
          return { action: 'would-rebuild', commandLine };
        }

        const existed = path ? await this.fs.remove(path) : false;
        this.eventLogger?.logTargetRemoved(target.name, { path: path ?? null, existed });
        return { action: 'removed', commandLine };
      }

      case 'capture': {
        const argv = expandTokens(recipe.argv, prerequisites);
        const commandLine = formatCommandLine(argv, target.name);
        this.emit('command', { target: target.name, commandLine, dryRun });

        if (dryRun) {
          return { action: 'would-rebuild', commandLine };
        }

        await this.captureToTarget(target.name, argv);
        return { action: 'rebuilt', commandLine };
      }
    }
  }

  private async captureToTarget(targetName: string, argv: string[]): Promise<void> {
    const temporaryPath = temporaryPathFor(targetName);

    let result: CommandRunResult;
    try {
      result = await this.runner.run(argv, { stdoutPath: temporaryPath });
    } catch (error) {
      await this.fs.remove(temporaryPath);
      if (isSpawnNotFound(error)) {
        throw new CommandNotFoundError(argv[0], targetName);
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      await this.fs.remove(temporaryPath);
      throw new RecipeFailedError(targetName, result.exitCode, result.signal, result.stderr);
    }

    await this.fs.rename(temporaryPath, targetName);
  }

  private logBuildFinished(success: boolean, outcomes: TargetOutcome[], startTime: number): void {
    this.eventLogger?.logBuildFinished({
      success,
      targets_rebuilt: outcomes.filter((outcome) => outcome.action === 'rebuilt' || outcome.action === 'removed').length,
      targets_up_to_date: outcomes.filter((outcome) => outcome.action === 'up-to-date').length,
      duration_ms: Date.now() - startTime
    });
  }
}
