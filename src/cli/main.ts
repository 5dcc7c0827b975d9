#!/usr/bin/env node
import process from 'node:process';
import { EXIT_ERROR, main } from './run.js';

main(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
    process.stderr.write(`internal error: ${detail}\n`);
    process.exitCode = EXIT_ERROR;
  }
);
