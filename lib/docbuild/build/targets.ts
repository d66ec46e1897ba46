// ABOUTME: Declared targets for generating the Zwift workout file tag reference.
// ABOUTME: Mirrors the analyse -> render pipeline plus the clean-* phony targets.

import { FIRST_PREREQUISITE, type TargetDefinition } from './types';

export const REFERENCE_MARKDOWN = 'zwift_workout_file_tag_reference.md';
export const USAGE_JSON = 'tag_attr_usage.json';
export const DESCRIPTIONS_YAML = 'descriptions.yaml';
export const WORKOUTS_PATH = 'workouts';
export const TOOL_SOURCES_ROOT = 'zwift_zwo_docs';

export const DEFAULT_GOAL = REFERENCE_MARKDOWN;

export interface ToolCommands {
  /** argv prefix for the analyser; `--json <workouts>` is appended */
  analyse: string[];
  /** argv prefix for the renderer; `<json> <yaml>` is appended */
  render: string[];
}

export const DEFAULT_COMMANDS: ToolCommands = {
  analyse: ['zwift-zwo-docs-analyse'],
  render: ['zwift-zwo-docs-render']
};

export function createDefaultTargets(commands: ToolCommands = DEFAULT_COMMANDS): TargetDefinition[] {
  return [
    {
      name: REFERENCE_MARKDOWN,
      dependencies: [
        { kind: 'glob', root: TOOL_SOURCES_ROOT, pattern: '*.py' },
        { kind: 'path', path: DESCRIPTIONS_YAML },
        { kind: 'path', path: USAGE_JSON }
      ],
      recipe: { kind: 'capture', argv: [...commands.render, USAGE_JSON, DESCRIPTIONS_YAML] }
    },
    {
      name: USAGE_JSON,
      dependencies: [{ kind: 'optional', path: WORKOUTS_PATH }],
      recipe: { kind: 'capture', argv: [...commands.analyse, '--json', FIRST_PREREQUISITE] }
    },
    {
      name: 'clean-md',
      phony: true,
      dependencies: [{ kind: 'existing', path: REFERENCE_MARKDOWN }],
      recipe: { kind: 'remove', path: FIRST_PREREQUISITE }
    },
    {
      name: 'clean-json',
      phony: true,
      dependencies: [{ kind: 'existing', path: USAGE_JSON }],
      recipe: { kind: 'remove', path: FIRST_PREREQUISITE }
    },
    {
      name: 'clean-all',
      phony: true,
      dependencies: [
        { kind: 'path', path: 'clean-md' },
        { kind: 'path', path: 'clean-json' }
      ],
      recipe: { kind: 'none' }
    }
  ];
}
