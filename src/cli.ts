#!/usr/bin/env node
// ABOUTME: CLI entry point for polydev
// ABOUTME: Turns SIGINT into an abort so the running tool stops and a partial summary is printed

import { createProgram } from './program.js';
import { errorMessage } from './errors.js';

const controller = new AbortController();

// A second Ctrl-C falls through to Node's default handler and exits at once
process.once('SIGINT', () => {
  controller.abort();
});

const program = createProgram({
  signal: controller.signal,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('\n❌ Error:', errorMessage(error));
  process.exitCode = 1;
});
