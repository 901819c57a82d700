#!/usr/bin/env tsx
import { reportError } from './errors';
import { createProgram } from './program';
import type { GlobalOptions } from './types';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}

void main();
