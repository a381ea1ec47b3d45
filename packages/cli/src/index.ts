// Re-export convenient top-level helpers from the engine package so the CLI
// package can expose a single entrypoint for tools and scripts.
export { convert, convertAll, exportJSON, exportCpp } from '@mmlbeep/engine';
export { createProgram, run, defaultOutputPath } from './program.js';
