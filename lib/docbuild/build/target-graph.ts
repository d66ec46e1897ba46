// ABOUTME: Target graph with dependency expansion, cycle detection and dependency-ordered planning.
// ABOUTME: Planning touches the filesystem read-only, so every resolution error surfaces before a recipe runs.

import { join } from 'node:path';
import { minimatch } from 'minimatch';
import { DependencyCycleError, MissingSourceError, UnknownTargetError, BuildConfigError } from './errors';
import type { BuildFileSystem, DependencySpec, TargetDefinition } from './types';

export interface PlannedTarget {
  target: TargetDefinition;
  /** Resolved prerequisite paths, in declaration order, without duplicates */
  prerequisites: string[];
}

export interface ResolvedDependency {
  path: string;
  /** Checked for presence only: never built, never required */
  existenceOnly: boolean;
}

export interface BuildPlan {
  goals: string[];
  /** Post-order: every target appears after all of its prerequisite targets */
  steps: PlannedTarget[];
}

async function collectFiles(
  fs: BuildFileSystem,
  dir: string,
  predicate: (name: string) => boolean
): Promise<string[]> {
  const entries = await fs.readdir(dir);
  if (!entries) {
    // Missing root behaves like `find` on an absent directory: no matches
    return [];
  }

  const collected: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory) {
      collected.push(...(await collectFiles(fs, fullPath, predicate)));
    } else if (predicate(entry.name)) {
      collected.push(fullPath);
    }
  }

  return collected;
}

export class TargetGraph {
  private readonly targets = new Map<string, TargetDefinition>();

  constructor(definitions: TargetDefinition[]) {
    for (const definition of definitions) {
      if (this.targets.has(definition.name)) {
        throw new BuildConfigError('Invalid target definitions', [`Duplicate target '${definition.name}'`]);
      }
      this.targets.set(definition.name, definition);
    }
  }

  getTarget(name: string): TargetDefinition {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return target;
  }

  isPhony(name: string): boolean {
    return this.targets.get(name)?.phony === true;
  }

  /**
   * Expand one dependency spec against the current filesystem state
   */
  async expandDependency(spec: DependencySpec, fs: BuildFileSystem): Promise<string[]> {
    switch (spec.kind) {
      case 'path':
        return [spec.path];

      case 'optional':
      case 'existing':
        return (await fs.stat(spec.path)) ? [spec.path] : [];

      case 'glob': {
        const files = await collectFiles(fs, spec.root, (name) => minimatch(name, spec.pattern, { dot: true }));
        return files.sort();
      }
    }
  }

  /**
   * Expand every dependency spec in declaration order, dropping duplicates.
   * A path listed both as existence-only and as a real prerequisite stays a real one.
   */
  async resolveDependencies(target: TargetDefinition, fs: BuildFileSystem): Promise<ResolvedDependency[]> {
    const resolved: ResolvedDependency[] = [];
    for (const spec of target.dependencies) {
      for (const path of await this.expandDependency(spec, fs)) {
        const existing = resolved.find((dependency) => dependency.path === path);
        if (!existing) {
          resolved.push({ path, existenceOnly: spec.kind === 'existing' });
        } else if (spec.kind !== 'existing') {
          existing.existenceOnly = false;
        }
      }
    }
    return resolved;
  }

  /**
   * Resolve goals into a dependency-ordered plan.
   * Throws UnknownTargetError, DependencyCycleError or MissingSourceError.
   */
  async plan(goals: string[], fs: BuildFileSystem): Promise<BuildPlan> {
    for (const goal of goals) {
      if (!this.targets.has(goal)) {
        throw new UnknownTargetError(goal);
      }
    }

    const steps: PlannedTarget[] = [];
    const planned = new Set<string>();
    const visiting: string[] = [];

    const visit = async (name: string): Promise<void> => {
      if (planned.has(name)) {
        return;
      }

      const cycleStart = visiting.indexOf(name);
      if (cycleStart !== -1) {
        throw new DependencyCycleError([...visiting.slice(cycleStart), name]);
      }

      const target = this.getTarget(name);
      visiting.push(name);

      const dependencies = await this.resolveDependencies(target, fs);
      for (const dependency of dependencies) {
        if (dependency.existenceOnly) {
          continue;
        }
        if (this.targets.has(dependency.path)) {
          await visit(dependency.path);
        } else if (!(await fs.stat(dependency.path))) {
          throw new MissingSourceError(dependency.path, name);
        }
      }

      visiting.pop();
      planned.add(name);
      steps.push({ target, prerequisites: dependencies.map((dependency) => dependency.path) });
    };

    for (const goal of goals) {
      await visit(goal);
    }

    return { goals, steps };
  }
}
