#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { env, exit as processExit, stderr, stdin, stdout } from 'node:process';
import { run } from './program.js';

process.on('unhandledRejection', (err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  stderr.write(`Error: ${msg}\n`);
  processExit(1);
});

process.exitCode = await run(process.argv.slice(2), { stdin, stdout, stderr, env });
