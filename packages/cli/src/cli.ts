#!/usr/bin/env node
import { loadLoggingFromEnv } from '@mmlbeep/engine';
import { run } from './program.js';

loadLoggingFromEnv();

run().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
