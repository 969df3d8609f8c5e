#!/usr/bin/env node

import { ExitCode } from './types';
import { main, processIO, watchOutputErrors } from './cli';

watchOutputErrors(process.stdout, err => {
  process.exitCode = ExitCode.ERROR;
  processIO.stderr(`Error: ${err.message}\n`);
});
watchOutputErrors(process.stderr, () => {
  process.exitCode = ExitCode.ERROR;
});

process.exitCode = main(process.argv.slice(2));
