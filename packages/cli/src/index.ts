#!/usr/bin/env node

// CLI entry point
// - `hostbench run [config_path]` loads the YAML configuration (bundled
//   default when omitted), installs missing tools, runs the enabled
//   categories and prints the written artifact paths.
// - Setup failures exit with the error's code; failed benchmark tests do not.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  isHostbenchError,
  InternalError,
  type HostbenchError,
} from '@hostbench/core';
import { renderCLIView } from './render.js';
import { runCommand, type RunCommandDependencies } from './commands/run.js';

export const VERSION = '0.1.0';

export function createProgram(
  deps: Partial<RunCommandDependencies> = {}
): Command {
  const program = new Command();

  program
    .name('hostbench')
    .description(
      'Install, run and report host benchmarks (CPU, memory, file I/O, network)'
    )
    .version(VERSION);

  program
    .command('run')
    .description('Run the benchmark suite described by a YAML configuration')
    .argument(
      '[config_path]',
      'YAML configuration file (default: bundled hostbench.yaml)'
    )
    .action(async (configPath: string | undefined) => {
      await runCommand({ configPath }, deps);
    });

  return program;
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: HostbenchError;
  if (isHostbenchError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(
  argv: string[] = process.argv,
  deps: Partial<RunCommandDependencies> = {}
): Promise<void> {
  await createProgram(deps).parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
