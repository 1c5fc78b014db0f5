#!/usr/bin/env node
import { EXIT_CODES, main } from './cli/index.js';

main(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Fatal Error:', error);
    process.exitCode = EXIT_CODES.INTERNAL;
  },
);
