// packages/node-runtime/src/index.ts
export * from '../../core/src/index.js';
export { run, createProgram, type CliIO } from './program.js';
