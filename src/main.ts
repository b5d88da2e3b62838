#!/usr/bin/env node
import { createProgram } from './cli';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(
      `❌ Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  });
