import {
  type CommandExecutor,
  type ExecutableProbe,
  type RunLogger,
  type ScratchDirectory,
  createPathProbe,
  createSpawnExecutor,
  createStderrLogger,
  ensureDependencies,
  loadConfig,
  runSuite,
} from '@hostbench/core';
import {
  type ChartRenderer,
  type RunArtifacts,
  svgChartRenderer,
  writeRunArtifacts,
} from '@hostbench/reporter';

export interface RunCommandOptions {
  /** YAML configuration file; the bundled default when absent */
  configPath?: string;
}

export interface RunCommandDependencies {
  executor: CommandExecutor;
  probe: ExecutableProbe;
  logger: RunLogger;
  isRoot: boolean;
  /** null: the run completes without charts */
  chartRenderer: ChartRenderer | null;
  now: () => Date;
  stdout: NodeJS.WritableStream;
  cpuCount?: number;
  acquireScratchDirectory?: (
    configured: string | null
  ) => Promise<ScratchDirectory>;
}

export function defaultRunDependencies(): RunCommandDependencies {
  return {
    executor: createSpawnExecutor(),
    probe: createPathProbe(),
    logger: createStderrLogger(),
    isRoot: process.getuid?.() === 0,
    chartRenderer: svgChartRenderer,
    now: () => new Date(),
    stdout: process.stdout,
  };
}

/**
 * `hostbench run [config_path]`: load configuration, install missing
 * tools, run every enabled category and write the run directory.
 *
 * Setup failures (configuration, installation, output) reject with a
 * HostbenchError; failed benchmark tests only show up in the results.
 */
export async function runCommand(
  options: RunCommandOptions,
  overrides: Partial<RunCommandDependencies> = {}
): Promise<RunArtifacts> {
  const deps: RunCommandDependencies = {
    ...defaultRunDependencies(),
    ...overrides,
  };
  const { logger } = deps;

  const config = await loadConfig({ path: options.configPath });
  logger.info(`configuration: ${config.source}`);

  if (config.global.installDependencies) {
    await ensureDependencies(config, deps);
  } else {
    logger.info('dependency installation disabled');
  }

  const results = await runSuite(config, {
    executor: deps.executor,
    logger,
    now: deps.now,
    cpuCount: deps.cpuCount,
    acquireScratchDirectory: deps.acquireScratchDirectory,
  });

  const tests = results.categories.flatMap((category) => category.tests);
  const succeeded = tests.filter((test) => test.status === 'success').length;
  logger.info(`${succeeded} of ${tests.length} test(s) succeeded`);

  const artifacts = await writeRunArtifacts(results, {
    outputDir: config.global.outputDir,
    reportFormats: config.global.reportFormats,
    charts: config.global.charts,
    chartRenderer: deps.chartRenderer,
    logger,
  });

  const written = [artifacts.rawResults, ...artifacts.reports, ...artifacts.charts];
  deps.stdout.write(`${written.join('\n')}\n`);
  return artifacts;
}
