#!/usr/bin/env tsx
import { createProgram } from './program';
import { reportError } from './report-error';
import type { GlobalOptions } from './session';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exitCode = reportError(e, program.opts<GlobalOptions>());
  }
}

void main();
