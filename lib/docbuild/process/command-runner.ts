// ABOUTME: Spawns recipe commands with stdout redirected into a file and stderr captured.
// ABOUTME: Stderr is also forwarded live so tool diagnostics reach the user.

import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import type { Writable } from 'node:stream';
import { isNotFound } from '../build/node-file-system';
import type { CommandRunOptions, CommandRunResult, CommandRunner } from '../build/types';

export interface NodeCommandRunnerOptions {
  workingDirectory?: string;
  /** Where to forward the child's stderr; null disables forwarding */
  stderrSink?: Writable | null;
}

export class NodeCommandRunner implements CommandRunner {
  private readonly workingDirectory: string;
  private readonly stderrSink: Writable | null;

  constructor(options: NodeCommandRunnerOptions = {}) {
    this.workingDirectory = options.workingDirectory || process.cwd();
    this.stderrSink = options.stderrSink === undefined ? process.stderr : options.stderrSink;
  }

  /**
   * Run argv to completion. Rejects with the spawn error (e.g. ENOENT)
   * when the command cannot be started.
   */
  async run(argv: string[], options: CommandRunOptions): Promise<CommandRunResult> {
    const [command, ...args] = argv;
    if (!command) {
      throw new Error('Cannot run an empty command');
    }

    // spawn reports a missing cwd as ENOENT for the command itself
    const directory = await fs.stat(this.workingDirectory).catch((error: unknown) => {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    });
    if (!directory || !directory.isDirectory()) {
      throw new Error(`Working directory does not exist: ${this.workingDirectory}`);
    }

    const output = await fs.open(resolve(this.workingDirectory, options.stdoutPath), 'w');

    try {
      return await new Promise<CommandRunResult>((resolvePromise, reject) => {
        const child = spawn(command, args, {
          cwd: this.workingDirectory,
          stdio: ['ignore', output.fd, 'pipe'],
          shell: false
        });

        let stderr = '';
        child.stderr?.on('data', (data: Buffer) => {
          stderr += data.toString();
          this.stderrSink?.write(data);
        });

        child.on('error', (error) => {
          reject(error);
        });

        child.on('close', (code, signal) => {
          resolvePromise({ exitCode: code, signal, stderr });
        });
      });
    } finally {
      await output.close();
    }
  }
}
