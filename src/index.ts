/**
 * Library entry point. The CLI lives in cli.ts.
 */
export * from './agents/index.js';
export * from './config/index.js';
export * from './intent/index.js';
export * from './inventory/index.js';
export * from './llm/index.js';
export * from './planner/index.js';
export * from './synthesis/index.js';
export * from './workflow/index.js';
export { createServer, startServer, type ServerOptions } from './server/index.js';
export * from './errors.js';
export { VERSION } from './version.js';
