#!/usr/bin/env node
/**
 * tabq CLI
 *
 * Usage:
 *   tabq <file> [--where <condition>] [--aggregate <expression>]
 *               [--order-by <expression>] [--format grid|simple|json]
 *               [--log-level debug|info|warn|error]
 */

import { runCli } from './program.js';
import type { CliIO } from './types.js';

const interrupt = new AbortController();

const io: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  signal: interrupt.signal,
};

// A second Ctrl-C falls back to the default handler and terminates at once.
process.once('SIGINT', () => {
  interrupt.abort();
});

runCli(process.argv.slice(2), io).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    io.stderr(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
