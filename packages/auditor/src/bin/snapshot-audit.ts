#!/usr/bin/env node
import { errorMessage } from '@snapshot-audit/shared';
import { createProgram } from '../cli/program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`[ERROR] ${errorMessage(error)}`);
    process.exit(1);
  });
