/* eslint-disable max-lines-per-function */
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';

import { isCategoryEnabled } from '../config/loader.js';
import type { SuiteConfig } from '../config/types.js';
import { ErrorCode } from '../errors/codes.js';
import { type CommandExecutor, formatCommand } from '../exec/executor.js';
import { SetupError } from '../types/errors.js';
import type { RunLogger } from '../util/log.js';

export type PackageManagerName = 'apt' | 'dnf' | 'yum' | 'pacman';

export interface PackageManager {
  name: PackageManagerName;
  binary: string;
  installArgs: readonly string[];
  /** Package index refresh run before installing, for managers that need one */
  refreshArgs?: readonly string[];
}

// Probe order: first match wins
export const PACKAGE_MANAGERS: readonly PackageManager[] = [
  {
    name: 'apt',
    binary: 'apt-get',
    installArgs: ['install', '-y'],
    refreshArgs: ['update'],
  },
  { name: 'dnf', binary: 'dnf', installArgs: ['install', '-y'] },
  { name: 'yum', binary: 'yum', installArgs: ['install', '-y'] },
  {
    name: 'pacman',
    binary: 'pacman',
    installArgs: ['-S', '--noconfirm', '--needed'],
    refreshArgs: ['-Sy'],
  },
];

export interface RequiredPackage {
  /** Package name, identical across the supported package managers */
  name: string;
  /** Executable the package provides */
  binary: string;
}

/** Resolves an executable name to its absolute path, or null when absent */
export type ExecutableProbe = (name: string) => Promise<string | null>;

export interface InstallDependencies {
  executor: CommandExecutor;
  probe: ExecutableProbe;
  logger: RunLogger;
  isRoot: boolean;
}

export interface InstallSummary {
  manager: PackageManagerName | null;
  installed: string[];
  alreadyPresent: string[];
  command?: string;
}

export const INSTALL_TIMEOUT_MS = 15 * 60 * 1000;

export function createPathProbe(
  env: NodeJS.ProcessEnv = process.env
): ExecutableProbe {
  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  return async (name) => {
    for (const dir of dirs) {
      const candidate = path.join(dir, name);
      try {
        await access(candidate, constants.X_OK);
        return candidate;
      } catch {
        // not in this PATH entry
      }
    }
    return null;
  };
}

export function requiredPackages(config: SuiteConfig): RequiredPackage[] {
  const packages: RequiredPackage[] = [];
  const usesSysbench = (['cpu', 'memory', 'fileio'] as const).some(
    (category) => isCategoryEnabled(config, category)
  );
  if (usesSysbench) {
    packages.push({ name: 'sysbench', binary: 'sysbench' });
  }
  if (config.global.systemInfo) {
    packages.push({ name: 'neofetch', binary: 'neofetch' });
  }
  if (isCategoryEnabled(config, 'network')) {
    packages.push({ name: 'iperf3', binary: 'iperf3' });
  }
  return packages;
}

export async function detectPackageManager(
  probe: ExecutableProbe
): Promise<PackageManager | null> {
  for (const manager of PACKAGE_MANAGERS) {
    if ((await probe(manager.binary)) !== null) {
      return manager;
    }
  }
  return null;
}

export function buildInstallCommand(
  manager: PackageManager,
  packages: readonly string[],
  useSudo: boolean
): string[] {
  const argv = [manager.binary, ...manager.installArgs, ...packages];
  return withSudo(argv, useSudo);
}

/** The index refresh command, or null when the manager refreshes on its own */
export function buildRefreshCommand(
  manager: PackageManager,
  useSudo: boolean
): string[] | null {
  if (!manager.refreshArgs) return null;
  return withSudo([manager.binary, ...manager.refreshArgs], useSudo);
}

function withSudo(argv: string[], useSudo: boolean): string[] {
  return useSudo ? ['sudo', '-n', ...argv] : argv;
}

async function resolveSudo(
  setting: boolean | 'auto',
  deps: InstallDependencies
): Promise<boolean> {
  if (setting !== 'auto') return setting;
  if (deps.isRoot) return false;
  return (await deps.probe('sudo')) !== null;
}

/**
 * Install whichever required packages are not already on PATH.
 * No package manager is needed when nothing is missing.
 */
export async function ensureDependencies(
  config: SuiteConfig,
  deps: InstallDependencies
): Promise<InstallSummary> {
  const required = requiredPackages(config);
  const missing: string[] = [];
  const alreadyPresent: string[] = [];
  for (const pkg of required) {
    if ((await deps.probe(pkg.binary)) === null) {
      missing.push(pkg.name);
    } else {
      alreadyPresent.push(pkg.name);
    }
  }

  if (!missing.length) {
    deps.logger.info(
      `dependencies present: ${alreadyPresent.join(', ') || 'none required'}`
    );
    return { manager: null, installed: [], alreadyPresent };
  }

  const manager = await detectPackageManager(deps.probe);
  if (!manager) {
    throw new SetupError({
      message: `No supported package manager found to install: ${missing.join(', ')}`,
      errorCode: ErrorCode.PACKAGE_MANAGER_NOT_FOUND,
      context: {
        suggestion: `Install ${missing.join(', ')} manually, or run on a host with apt-get, dnf, yum or pacman`,
      },
    });
  }

  const sudo = await resolveSudo(config.global.useSudo, deps);
  deps.logger.info(`installing ${missing.join(', ')} with ${manager.name}`);

  const refresh = buildRefreshCommand(manager, sudo);
  if (refresh) {
    await runSetupCommand(refresh, 'Package index refresh', deps);
  }
  const command = await runSetupCommand(
    buildInstallCommand(manager, missing, sudo),
    'Package installation',
    deps
  );

  return { manager: manager.name, installed: missing, alreadyPresent, command };
}

async function runSetupCommand(
  argv: string[],
  step: string,
  deps: InstallDependencies
): Promise<string> {
  const command = formatCommand(argv);
  deps.logger.info(`command: ${command}`);

  const outcome = await deps.executor.run({
    argv,
    timeoutMs: INSTALL_TIMEOUT_MS,
  });
  if (outcome.error !== undefined || outcome.timedOut || outcome.exitCode !== 0) {
    const reason =
      outcome.error ??
      (outcome.timedOut
        ? `timed out after ${INSTALL_TIMEOUT_MS / 1000}s`
        : `exit code ${outcome.exitCode ?? outcome.signal ?? 'unknown'}`);
    throw new SetupError({
      message: `${step} failed (${reason})`,
      errorCode: ErrorCode.PACKAGE_INSTALL_FAILED,
      context: {
        command,
        suggestion: lastLines(outcome.output, 5) || undefined,
      },
    });
  }
  return command;
}

function lastLines(text: string, count: number): string {
  return text.trimEnd().split('\n').slice(-count).join('\n');
}
