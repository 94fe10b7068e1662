/**
 * Early-life biographer
 *
 * Library entry point. The bio-research CLI lives in ./cli.ts.
 */
export * from './agents/index.js';
export * from './config/index.js';
export * from './prompts/early-life.js';
export * from './services/secrets.js';
export * from './tools/index.js';
export * from './utils/errors.js';
export * from './workflow/state-machine.js';
export * from './workflow/verdict.js';
