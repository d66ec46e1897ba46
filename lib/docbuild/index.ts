// ABOUTME: Main export file for the Zwift workout docs build orchestrator.

export { BuildOrchestrator, formatCommandLine, expandTokens } from './build/orchestrator';
export type { BuildOrchestratorDeps, CommandEvent, StalenessVerdict } from './build/orchestrator';
export { TargetGraph } from './build/target-graph';
export type { BuildPlan, PlannedTarget, ResolvedDependency } from './build/target-graph';
export { NodeBuildFileSystem } from './build/node-file-system';
export { NodeCommandRunner } from './process/command-runner';
export { createDefaultTargets, DEFAULT_GOAL, DEFAULT_COMMANDS } from './build/targets';
export type { ToolCommands } from './build/targets';
export * from './build/errors';
export type {
  BuildFileSystem,
  BuildOptions,
  BuildReport,
  CommandRunner,
  CommandRunResult,
  DependencySpec,
  Recipe,
  RecipeToken,
  TargetDefinition,
  TargetOutcome
} from './build/types';
export { FIRST_PREREQUISITE } from './build/types';
export { loadBuildConfig, validateConfig } from './config/build-config';
export type { BuildConfig } from './config/build-config';
export { createBuildEventLogger, openEventDatabase } from './events/event-logger';
export type { BuildEventLogger, BuildEventKind, BuildEventRow } from './events/event-logger';
export { runBuildCli } from './cli/cli-service';
