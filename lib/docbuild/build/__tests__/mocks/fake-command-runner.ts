// ABOUTME: CommandRunner double that answers registered commands and writes their stdout into a MemoryFileSystem.

import type { CommandRunOptions, CommandRunResult, CommandRunner } from '../../types';
import type { MemoryFileSystem } from './memory-file-system';

export interface FakeCommandResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export type FakeCommandHandler = (args: string[]) => FakeCommandResponse;

export class FakeCommandRunner implements CommandRunner {
  readonly invocations: string[][] = [];

  constructor(
    private readonly fs: MemoryFileSystem,
    private readonly handlers: Record<string, FakeCommandHandler>
  ) {}

  setHandler(command: string, handler: FakeCommandHandler): void {
    this.handlers[command] = handler;
  }

  commandNames(): string[] {
    return this.invocations.map((argv) => argv[0]);
  }

  async run(argv: string[], options: CommandRunOptions): Promise<CommandRunResult> {
    this.invocations.push(argv);

    const [command, ...args] = argv;
    const handler = this.handlers[command];
    if (!handler) {
      throw Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT', syscall: `spawn ${command}` });
    }

    const response = handler(args);
    // Like a shell redirect, the output file exists even when the command fails
    this.fs.writeFile(options.stdoutPath, response.stdout ?? '');

    return {
      exitCode: response.exitCode ?? 0,
      signal: null,
      stderr: response.stderr ?? ''
    };
  }
}
