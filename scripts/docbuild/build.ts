#!/usr/bin/env node
// ABOUTME: Entry point for regenerating the workout file tag reference and its usage report.
// ABOUTME: Usage: zwo-docs-build [options] [target...]

import { argv } from 'node:process';
import { runBuildCli } from '../../lib/docbuild/cli/cli-service';

async function main(): Promise<void> {
  const exitCode = await runBuildCli(argv.slice(2));
  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('zwo-docs-build failed:', error);
    process.exit(1);
  });
}
