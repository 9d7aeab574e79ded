#!/usr/bin/env -S node --import tsx

/**
 * koboldgate CLI entry
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
