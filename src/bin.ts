#!/usr/bin/env node
import { buildProgram } from './cli';
import { red } from './lib/logger';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(red(`Failed: ${error instanceof Error ? error.message : error}`));
    process.exitCode = 1;
  });
