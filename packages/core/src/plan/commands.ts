import { isCategoryEnabled } from '../config/loader.js';
import {
  CATEGORIES,
  type Category,
  type CpuConfig,
  type CpuTestConfig,
  type FileioConfig,
  type FileioMode,
  type MemoryConfig,
  type NetworkConfig,
  type SuiteConfig,
  type ThreadCount,
} from '../config/types.js';

/** Added to every test's configured duration to form its timeout */
export const TIMEOUT_MARGIN_SECONDS = 60;

export interface PlannedCommand {
  argv: string[];
  timeoutMs: number;
  cwd?: string;
}

export interface PlannedTest extends PlannedCommand {
  id: string;
  category: Category;
  label: string;
}

export interface PlannedStep extends PlannedCommand {
  id: string;
  kind: 'prepare' | 'cleanup';
}

export interface CategoryPlan {
  category: Category;
  tests: PlannedTest[];
  prepare?: PlannedStep;
  cleanup?: PlannedStep;
}

export interface PlanContext {
  /** Value substituted for `threads: auto` */
  cpuCount: number;
  /** Working directory for the fileio test files */
  fileioDirectory: string;
}

export function resolveThreads(threads: ThreadCount, cpuCount: number): number {
  return threads === 'auto' ? Math.max(1, cpuCount) : threads;
}

function timeoutFor(seconds: number): number {
  return (seconds + TIMEOUT_MARGIN_SECONDS) * 1000;
}

function cpuTest(
  id: string,
  label: string,
  test: CpuTestConfig,
  maxPrime: number,
  cpuCount: number
): PlannedTest {
  const threads = resolveThreads(test.threads, cpuCount);
  return {
    id,
    category: 'cpu',
    label: `${label} (${threads} ${threads === 1 ? 'thread' : 'threads'})`,
    argv: [
      'sysbench',
      'cpu',
      `--events=${test.events}`,
      `--time=${test.time}`,
      `--threads=${threads}`,
      `--cpu-max-prime=${maxPrime}`,
      'run',
    ],
    timeoutMs: timeoutFor(test.time),
  };
}

export function buildCpuPlan(config: CpuConfig, ctx: PlanContext): CategoryPlan {
  const tests: PlannedTest[] = [];
  if (config.singleThread.enabled) {
    tests.push(
      cpuTest(
        'cpu_single_thread',
        'CPU single thread',
        config.singleThread,
        config.maxPrime,
        ctx.cpuCount
      )
    );
  }
  if (config.multiThread.enabled) {
    tests.push(
      cpuTest(
        'cpu_multi_thread',
        'CPU multi thread',
        config.multiThread,
        config.maxPrime,
        ctx.cpuCount
      )
    );
  }
  return { category: 'cpu', tests };
}

export function buildMemoryPlan(
  config: MemoryConfig,
  ctx: PlanContext
): CategoryPlan {
  const threads = resolveThreads(config.threads, ctx.cpuCount);
  return {
    category: 'memory',
    tests: [
      {
        id: 'memory',
        category: 'memory',
        label: `Memory ${config.operation} (${config.blockSize} blocks)`,
        argv: [
          'sysbench',
          'memory',
          `--threads=${threads}`,
          `--time=${config.time}`,
          `--memory-block-size=${config.blockSize}`,
          `--memory-total-size=${config.totalSize}`,
          `--memory-oper=${config.operation}`,
          `--memory-access-mode=${config.accessMode}`,
          'run',
        ],
        timeoutMs: timeoutFor(config.time),
      },
    ],
  };
}

const FILEIO_MODE_LABELS: Record<FileioMode, string> = {
  seqwr: 'sequential write',
  seqrewr: 'sequential rewrite',
  seqrd: 'sequential read',
  rndrd: 'random read',
  rndwr: 'random write',
  rndrw: 'random read/write',
};

export function buildFileioPlan(
  config: FileioConfig,
  ctx: PlanContext
): CategoryPlan {
  const sizing = [
    `--file-total-size=${config.fileTotalSize}`,
    `--file-num=${config.fileNum}`,
  ];
  const threads = resolveThreads(config.threads, ctx.cpuCount);
  const cwd = ctx.fileioDirectory;

  const tests = config.modes
    .filter((mode) => mode.enabled)
    .map<PlannedTest>((mode) => ({
      id: `fileio_${mode.name}`,
      category: 'fileio',
      label: `File I/O ${FILEIO_MODE_LABELS[mode.name]}`,
      argv: [
        'sysbench',
        'fileio',
        ...sizing,
        `--threads=${threads}`,
        `--time=${config.time}`,
        `--file-test-mode=${mode.name}`,
        'run',
      ],
      timeoutMs: timeoutFor(config.time),
      cwd,
    }));

  if (!tests.length) {
    return { category: 'fileio', tests };
  }

  const stepTimeoutMs = config.prepareTimeout * 1000;
  return {
    category: 'fileio',
    tests,
    prepare: {
      id: 'fileio_prepare',
      kind: 'prepare',
      argv: ['sysbench', 'fileio', ...sizing, 'prepare'],
      timeoutMs: stepTimeoutMs,
      cwd,
    },
    ...(config.cleanup
      ? {
          cleanup: {
            id: 'fileio_cleanup',
            kind: 'cleanup' as const,
            argv: ['sysbench', 'fileio', ...sizing, 'cleanup'],
            timeoutMs: stepTimeoutMs,
            cwd,
          },
        }
      : {}),
  };
}

export function buildNetworkPlan(config: NetworkConfig): CategoryPlan {
  const argv = [
    'iperf3',
    '-c',
    config.serverIp ?? '',
    '-p',
    String(config.port),
    '-t',
    String(config.time),
    '-P',
    String(config.parallel),
    '-f',
    'm',
  ];
  if (config.reverse) {
    argv.push('-R');
  }
  return {
    category: 'network',
    tests: [
      {
        id: 'network',
        category: 'network',
        label: `Network ${config.reverse ? 'download' : 'upload'} to ${config.serverIp ?? '?'}:${config.port}`,
        argv,
        timeoutMs: timeoutFor(config.time),
      },
    ],
  };
}

/**
 * Plans every enabled category, in the fixed order cpu, memory, fileio,
 * network. Disabled categories are absent from the result.
 */
export function planSuite(config: SuiteConfig, ctx: PlanContext): CategoryPlan[] {
  const builders: Record<Category, () => CategoryPlan> = {
    cpu: () => buildCpuPlan(config.cpu, ctx),
    memory: () => buildMemoryPlan(config.memory, ctx),
    fileio: () => buildFileioPlan(config.fileio, ctx),
    network: () => buildNetworkPlan(config.network),
  };
  return CATEGORIES
    .filter((category) => isCategoryEnabled(config, category))
    .map((category) => builders[category]());
}
