// ABOUTME: Configuration loading for the docs build: optional JSON file, environment overrides, defaults.
// ABOUTME: Validates file contents by hand and converts JSON target definitions into typed targets.

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { BuildConfigError } from '../build/errors';
import { createDefaultTargets, DEFAULT_COMMANDS, DEFAULT_GOAL, type ToolCommands } from '../build/targets';
import { FIRST_PREREQUISITE, type DependencySpec, type Recipe, type RecipeToken, type TargetDefinition } from '../build/types';

export const DEFAULT_CONFIG_FILE = 'docbuild.config.json';

/** Recipe token that stands for the first prerequisite in JSON configs */
export const FIRST_PREREQUISITE_TOKEN = '$<';

export interface BuildConfig {
  defaultGoal: string;
  commands: ToolCommands;
  eventsDb?: string;
  targets: TargetDefinition[];
  /** File the configuration was read from, if any */
  source?: string;
  /** Settings that were accepted but have no effect */
  warnings: string[];
}

export interface LoadBuildConfigOptions {
  workingDirectory?: string;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function validateDependency(value: unknown, where: string, errors: string[]): void {
  if (!isObject(value)) {
    errors.push(`${where} must be an object`);
    return;
  }

  switch (value.kind) {
    case 'path':
    case 'optional':
    case 'existing':
      if (!isNonEmptyString(value.path)) {
        errors.push(`${where} must have a non-empty path`);
      }
      break;
    case 'glob':
      if (!isNonEmptyString(value.root) || !isNonEmptyString(value.pattern)) {
        errors.push(`${where} must have a root and a pattern`);
      }
      break;
    default:
      errors.push(`${where} has unknown kind '${String(value.kind)}'`);
  }
}

function validateRecipe(value: unknown, where: string, errors: string[]): void {
  if (!isObject(value)) {
    errors.push(`${where} must be an object`);
    return;
  }

  switch (value.kind) {
    case 'capture':
      if (!isStringArray(value.argv) || value.argv.length === 0) {
        errors.push(`${where} must have a non-empty argv of strings`);
      }
      break;
    case 'remove':
      if (!isNonEmptyString(value.path)) {
        errors.push(`${where} must have a path`);
      }
      break;
    case 'none':
      break;
    default:
      errors.push(`${where} has unknown kind '${String(value.kind)}'`);
  }
}

/**
 * Validate the raw contents of a configuration file
 */
export function validateConfig(config: unknown): { isValid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isObject(config)) {
    return { isValid: false, errors: ['Configuration must be a JSON object'] };
  }

  if (config.defaultGoal !== undefined && !isNonEmptyString(config.defaultGoal)) {
    errors.push('defaultGoal must be a non-empty string');
  }

  if (config.eventsDb !== undefined && !isNonEmptyString(config.eventsDb)) {
    errors.push('eventsDb must be a non-empty string');
  }

  if (config.commands !== undefined) {
    if (!isObject(config.commands)) {
      errors.push('commands must be an object');
    } else {
      for (const tool of ['analyse', 'render'] as const) {
        const argv = config.commands[tool];
        if (argv !== undefined && (!isStringArray(argv) || argv.length === 0)) {
          errors.push(`commands.${tool} must be a non-empty array of strings`);
        }
      }
    }
  }

  if (config.targets !== undefined && config.commands !== undefined) {
    errors.push('commands cannot be combined with targets: put the tool argv in each target recipe');
  }

  if (config.targets !== undefined) {
    if (!Array.isArray(config.targets) || config.targets.length === 0) {
      errors.push('targets must be a non-empty array');
    } else {
      const seen = new Set<string>();
      config.targets.forEach((target: unknown, index: number) => {
        const where = `targets[${index}]`;
        if (!isObject(target)) {
          errors.push(`${where} must be an object`);
          return;
        }
        if (!isNonEmptyString(target.name)) {
          errors.push(`${where} must have a name`);
        } else if (seen.has(target.name)) {
          errors.push(`${where} duplicates target '${target.name}'`);
        } else {
          seen.add(target.name);
        }
        if (target.phony !== undefined && typeof target.phony !== 'boolean') {
          errors.push(`${where}.phony must be a boolean`);
        }
        if (!Array.isArray(target.dependencies)) {
          errors.push(`${where}.dependencies must be an array`);
        } else {
          target.dependencies.forEach((dependency: unknown, depIndex: number) =>
            validateDependency(dependency, `${where}.dependencies[${depIndex}]`, errors)
          );
        }
        validateRecipe(target.recipe, `${where}.recipe`, errors);
      });
    }
  }

  return {
    isValid: errors.length === 0,
    errors
  };
}

function toToken(value: string): RecipeToken {
  return value === FIRST_PREREQUISITE_TOKEN ? FIRST_PREREQUISITE : value;
}

function toDependency(value: JsonObject): DependencySpec {
  if (value.kind === 'glob') {
    return { kind: 'glob', root: String(value.root), pattern: String(value.pattern) };
  }
  if (value.kind === 'optional') {
    return { kind: 'optional', path: String(value.path) };
  }
  if (value.kind === 'existing') {
    return { kind: 'existing', path: String(value.path) };
  }
  return { kind: 'path', path: String(value.path) };
}

function toRecipe(value: JsonObject): Recipe {
  if (value.kind === 'capture' && isStringArray(value.argv)) {
    return { kind: 'capture', argv: value.argv.map(toToken) };
  }
  if (value.kind === 'remove') {
    return { kind: 'remove', path: toToken(String(value.path)) };
  }
  return { kind: 'none' };
}

/**
 * Convert validated JSON target definitions into typed targets
 */
export function parseTargetDefinitions(targets: unknown[]): TargetDefinition[] {
  return targets.filter(isObject).map((target): TargetDefinition => ({
    name: String(target.name),
    phony: target.phony === true,
    dependencies: Array.isArray(target.dependencies) ? target.dependencies.filter(isObject).map(toDependency) : [],
    recipe: isObject(target.recipe) ? toRecipe(target.recipe) : { kind: 'none' }
  }));
}

/**
 * Split a command override such as "docker run analyse" into argv
 */
export function parseCommandOverride(value: string): string[] {
  return value.trim().split(/\s+/).filter((part) => part.length > 0);
}

function readConfigFile(path: string): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BuildConfigError(`Failed to read configuration ${path}`, [reason]);
  }

  const validation = validateConfig(raw);
  if (!validation.isValid || !isObject(raw)) {
    throw new BuildConfigError(`Invalid configuration ${path}`, validation.errors);
  }

  return raw;
}

/**
 * Resolve the effective configuration. Precedence: environment over file over defaults.
 */
export function loadBuildConfig(options: LoadBuildConfigOptions = {}): BuildConfig {
  const workingDirectory = options.workingDirectory || process.cwd();
  const env = options.env || process.env;

  const explicitFile = options.configFile || env.DOCBUILD_CONFIG;
  let source: string | undefined;
  if (explicitFile) {
    source = resolve(workingDirectory, explicitFile);
    if (!existsSync(source)) {
      throw new BuildConfigError(`Configuration file not found: ${source}`);
    }
  } else {
    const candidate = resolve(workingDirectory, DEFAULT_CONFIG_FILE);
    source = existsSync(candidate) ? candidate : undefined;
  }

  const file: JsonObject = source ? readConfigFile(source) : {};
  const fileCommands: JsonObject = isObject(file.commands) ? file.commands : {};

  const commands: ToolCommands = {
    analyse: isStringArray(fileCommands.analyse) ? fileCommands.analyse : DEFAULT_COMMANDS.analyse,
    render: isStringArray(fileCommands.render) ? fileCommands.render : DEFAULT_COMMANDS.render
  };

  const customTargets = Array.isArray(file.targets);
  const warnings: string[] = [];
  const overrides = [
    ['DOCBUILD_ANALYSE_COMMAND', 'analyse'],
    ['DOCBUILD_RENDER_COMMAND', 'render']
  ] as const;
  for (const [variable, tool] of overrides) {
    const value = env[variable];
    if (!value || !value.trim()) {
      continue;
    }
    if (customTargets) {
      warnings.push(`${variable} is ignored because the configuration declares its own targets`);
    } else {
      commands[tool] = parseCommandOverride(value);
    }
  }

  const targets = Array.isArray(file.targets) ? parseTargetDefinitions(file.targets) : createDefaultTargets(commands);
  // Like make, a custom target list defaults to its first rule
  let defaultGoal = DEFAULT_GOAL;
  if (isNonEmptyString(file.defaultGoal)) {
    defaultGoal = file.defaultGoal;
  } else if (customTargets && targets.length > 0) {
    defaultGoal = targets[0].name;
  }

  if (!targets.some((target) => target.name === defaultGoal)) {
    throw new BuildConfigError(`Default goal '${defaultGoal}' is not a declared target`);
  }

  const eventsDb = env.DOCBUILD_EVENTS_DB || (isNonEmptyString(file.eventsDb) ? file.eventsDb : undefined);

  return { defaultGoal, commands, eventsDb, targets, source, warnings };
}
