#!/usr/bin/env node

/**
 * CLI entry point for the scorer
 */

import { stdin, stdout, stderr } from 'node:process';
import { runCli } from './run-cli.js';

async function readStdin(): Promise<string> {
  let inputData = '';
  for await (const chunk of stdin) {
    inputData += chunk;
  }
  return inputData;
}

runCli(process.argv.slice(2), {
  readInput: readStdin,
  write: text => stdout.write(text),
  writeError: text => stderr.write(text),
}).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    stderr.write(`${String(error)}\n`);
    process.exitCode = 1;
  }
);
