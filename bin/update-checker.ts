#!/usr/bin/env node

import { createProgram } from '../src/cli';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  });
