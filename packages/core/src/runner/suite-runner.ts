/* eslint-disable max-lines-per-function */
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { isCategoryEnabled } from '../config/loader.js';
import type { SuiteConfig } from '../config/types.js';
import {
  type CommandExecutor,
  type CommandOutcome,
  formatCommand,
} from '../exec/executor.js';
import { parseCategoryOutput } from '../parser/metric-parser.js';
import {
  parseSystemInfo,
  parseToolVersion,
  type SystemInfo,
} from '../parser/system-info.js';
import {
  type CategoryPlan,
  type PlannedCommand,
  type PlannedStep,
  type PlannedTest,
  planSuite,
} from '../plan/commands.js';
import { toError } from '../types/errors.js';
import type {
  CategoryResult,
  CategoryStatus,
  RunResults,
  StepResult,
  TestResult,
  TestStatus,
  ToolInfo,
} from '../types/results.js';
import type { RunLogger } from '../util/log.js';
import { formatRunTimestamp } from '../util/timestamp.js';

const PROBE_TIMEOUT_MS = 30_000;

export interface ScratchDirectory {
  path: string;
  /** Removes the directory when hostbench created it */
  release(): Promise<void>;
}

export interface SuiteRunDependencies {
  executor: CommandExecutor;
  logger: RunLogger;
  now?: () => Date;
  /** Value substituted for `threads: auto` (defaults to the host's parallelism) */
  cpuCount?: number;
  /** Provides the fileio working directory */
  acquireScratchDirectory?: (
    configured: string | null
  ) => Promise<ScratchDirectory>;
}

export async function acquireDefaultScratchDirectory(
  configured: string | null
): Promise<ScratchDirectory> {
  if (configured) {
    const dir = path.resolve(configured);
    await mkdir(dir, { recursive: true });
    return { path: dir, release: async () => {} };
  }
  const dir = await mkdtemp(path.join(os.tmpdir(), 'hostbench-fileio-'));
  return {
    path: dir,
    release: () => rm(dir, { recursive: true, force: true }),
  };
}

interface ExecutionSummary {
  status: TestStatus;
  exitCode: number | null;
  output: string;
  error?: string;
}

function summarizeOutcome(
  outcome: CommandOutcome,
  command: PlannedCommand
): ExecutionSummary {
  const base = { exitCode: outcome.exitCode, output: outcome.output };
  if (outcome.error !== undefined) {
    return {
      ...base,
      status: 'failed',
      error: `could not start: ${outcome.error}`,
    };
  }
  if (outcome.timedOut) {
    return {
      ...base,
      status: 'timeout',
      error: `timed out after ${Math.round(command.timeoutMs / 1000)}s`,
    };
  }
  if (outcome.exitCode !== 0) {
    const reason =
      outcome.exitCode === null
        ? `terminated by ${outcome.signal ?? 'signal'}`
        : `exit code ${outcome.exitCode}`;
    return { ...base, status: 'failed', error: reason };
  }
  return { ...base, status: 'success' };
}

function categoryStatus(tests: TestResult[]): CategoryStatus {
  if (!tests.length) return 'empty';
  const succeeded = tests.filter((test) => test.status === 'success').length;
  if (succeeded === tests.length) return 'success';
  return succeeded === 0 ? 'failed' : 'partial';
}

class SuiteRunner {
  constructor(private readonly deps: SuiteRunDependencies) {}

  async execute(command: PlannedCommand): Promise<ExecutionSummary> {
    const outcome = await this.deps.executor.run({
      argv: command.argv,
      timeoutMs: command.timeoutMs,
      cwd: command.cwd,
    });
    return summarizeOutcome(outcome, command);
  }

  async runTest(test: PlannedTest): Promise<TestResult> {
    const command = formatCommand(test.argv);
    this.deps.logger.info(`${test.id}: ${command}`);
    const summary = await this.execute(test);
    const metrics =
      summary.status === 'success'
        ? parseCategoryOutput(test.category, summary.output)
        : {};

    if (summary.status === 'success') {
      const count = Object.keys(metrics).length;
      this.deps.logger.info(`${test.id}: success (${count} metrics)`);
    } else {
      this.deps.logger.warn(
        `${test.id}: ${summary.status} (${summary.error ?? ''})`
      );
    }

    return {
      id: test.id,
      category: test.category,
      label: test.label,
      status: summary.status,
      command,
      exitCode: summary.exitCode,
      metrics,
      output: summary.output,
      ...(summary.error !== undefined ? { error: summary.error } : {}),
    };
  }

  async runStep(step: PlannedStep): Promise<StepResult> {
    const command = formatCommand(step.argv);
    this.deps.logger.info(`${step.id}: ${command}`);
    const summary = await this.execute(step);
    if (summary.status !== 'success') {
      this.deps.logger.warn(
        `${step.id}: ${summary.status} (${summary.error ?? ''})`
      );
    }
    return {
      id: step.id,
      kind: step.kind,
      status: summary.status,
      command,
      exitCode: summary.exitCode,
      output: summary.output,
      ...(summary.error !== undefined ? { error: summary.error } : {}),
    };
  }

  async runCategory(plan: CategoryPlan): Promise<CategoryResult> {
    const steps: StepResult[] = [];
    const tests: TestResult[] = [];

    let prepareError: string | undefined;
    if (plan.prepare) {
      const prepared = await this.runStep(plan.prepare);
      steps.push(prepared);
      if (prepared.status !== 'success') {
        prepareError = `${plan.prepare.id} ${prepared.status}: ${prepared.error ?? ''}`;
      }
    }

    // One at a time, in plan order
    for (const test of plan.tests) {
      if (prepareError !== undefined) {
        tests.push(skippedTest(test, prepareError));
        continue;
      }
      tests.push(await this.runTest(test));
    }

    if (plan.cleanup) {
      steps.push(await this.runStep(plan.cleanup));
    }

    return {
      category: plan.category,
      status: categoryStatus(tests),
      tests,
      steps,
    };
  }

  async probeTools(config: SuiteConfig): Promise<ToolInfo[]> {
    const probes: Array<{ name: string; banner: string; enabled: boolean }> = [
      {
        name: 'sysbench',
        banner: 'sysbench',
        enabled: (['cpu', 'memory', 'fileio'] as const).some((category) =>
          isCategoryEnabled(config, category)
        ),
      },
      {
        name: 'iperf3',
        banner: 'iperf',
        enabled: isCategoryEnabled(config, 'network'),
      },
    ];

    const tools: ToolInfo[] = [];
    for (const probe of probes.filter((entry) => entry.enabled)) {
      const outcome = await this.deps.executor.run({
        argv: [probe.name, '--version'],
        timeoutMs: PROBE_TIMEOUT_MS,
      });
      const version =
        outcome.exitCode === 0
          ? parseToolVersion(outcome.output, probe.banner)
          : undefined;
      if (version === undefined) {
        this.deps.logger.warn(`could not determine ${probe.name} version`);
      }
      tools.push(
        version === undefined ? { name: probe.name } : { name: probe.name, version }
      );
    }
    return tools;
  }

  async collectSystemInfo(): Promise<SystemInfo | undefined> {
    const outcome = await this.deps.executor.run({
      argv: ['neofetch', '--stdout'],
      timeoutMs: PROBE_TIMEOUT_MS,
    });
    if (
      outcome.error !== undefined ||
      outcome.timedOut ||
      outcome.exitCode !== 0
    ) {
      const reason =
        outcome.error ??
        (outcome.timedOut ? 'timed out' : `exit code ${outcome.exitCode ?? 'none'}`);
      this.deps.logger.warn(`system info unavailable (${reason})`);
      return undefined;
    }
    return parseSystemInfo(outcome.output);
  }
}

function skippedTest(test: PlannedTest, reason: string): TestResult {
  return {
    id: test.id,
    category: test.category,
    label: test.label,
    status: 'skipped',
    command: formatCommand(test.argv),
    exitCode: null,
    metrics: {},
    output: '',
    error: reason,
  };
}

/**
 * Run every enabled category in order and collect their results.
 * Per-test failures are recorded, never thrown.
 */
export async function runSuite(
  config: SuiteConfig,
  deps: SuiteRunDependencies
): Promise<RunResults> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runner = new SuiteRunner(deps);

  const tools = await runner.probeTools(config);
  const system = config.global.systemInfo
    ? await runner.collectSystemInfo()
    : undefined;

  const needsScratch =
    isCategoryEnabled(config, 'fileio') &&
    config.fileio.modes.some((mode) => mode.enabled);
  let scratch: ScratchDirectory | undefined;
  let scratchError: string | undefined;
  if (needsScratch) {
    const acquire =
      deps.acquireScratchDirectory ?? acquireDefaultScratchDirectory;
    try {
      scratch = await acquire(config.fileio.directory);
    } catch (error) {
      scratchError = `cannot prepare fileio directory: ${toError(error).message}`;
      deps.logger.warn(scratchError);
    }
  }

  const plans = planSuite(config, {
    cpuCount: deps.cpuCount ?? os.availableParallelism(),
    fileioDirectory: scratch?.path ?? '',
  });

  const categories: CategoryResult[] = [];
  try {
    for (const plan of plans) {
      deps.logger.info(
        `category ${plan.category}: ${plan.tests.length} test(s)`
      );
      if (plan.category === 'fileio' && scratchError !== undefined) {
        const reason = scratchError;
        const tests = plan.tests.map((test) => skippedTest(test, reason));
        categories.push({
          category: 'fileio',
          status: categoryStatus(tests),
          tests,
          steps: [],
        });
        continue;
      }
      categories.push(await runner.runCategory(plan));
    }
  } finally {
    if (scratch) {
      await scratch.release().catch((error: unknown) => {
        deps.logger.warn(
          `could not remove ${scratch?.path ?? 'scratch directory'}: ${toError(error).message}`
        );
      });
    }
  }

  return {
    runId: formatRunTimestamp(startedAt),
    startedAt: startedAt.toISOString(),
    finishedAt: now().toISOString(),
    configPath: config.source,
    tools,
    ...(system !== undefined ? { system } : {}),
    categories,
  };
}
