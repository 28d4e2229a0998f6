#!/usr/bin/env node

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { buildProgram } from '../src/cli';
import { createActions } from '../src/commands';
import { CancelledError, WardenError } from '../src/errors';
import { log } from '../src/logger';

const EXIT_INTERNAL = 1;
const EXIT_CANCELLED = 130;

const controller = new AbortController();
let interrupted = false;

function onSignal(signal: NodeJS.Signals) {
  if (interrupted) {
    // Second interrupt: give up waiting for verifiers to wind down
    process.exit(EXIT_CANCELLED);
  }
  interrupted = true;
  log.warn(`Received ${signal}, cancelling`);
  controller.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

const program = buildProgram(
  createActions({
    signal: controller.signal,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  }),
);

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Help, version and usage errors have already been printed
    process.exitCode = error.exitCode;
    return;
  }
  if (error instanceof CancelledError || interrupted) {
    console.error(chalk.yellow('Cancelled: nothing was installed.'));
    process.exitCode = EXIT_CANCELLED;
    return;
  }
  if (error instanceof WardenError) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red(`Internal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`));
  }
  process.exitCode = EXIT_INTERNAL;
});
