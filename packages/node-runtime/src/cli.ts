#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { argv, stdout, stderr } from 'node:process';
import { run } from './program.js';

run(argv.slice(2), {
  stdout: text => { stdout.write(text); },
  stderr: text => { stderr.write(text); },
}).then(
  code => { process.exitCode = code; },
  (err: unknown) => {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
    process.exitCode = 1;
  },
);
