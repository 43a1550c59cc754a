import type { Category } from '../config/types.js';
import type { Metrics } from '../parser/metric-parser.js';
import type { SystemInfo } from '../parser/system-info.js';

export type TestStatus = 'success' | 'failed' | 'timeout' | 'skipped';

/**
 * - success: every test succeeded
 * - partial: some tests succeeded
 * - failed: no test succeeded
 * - empty: the category is enabled but none of its tests are
 */
export type CategoryStatus = 'success' | 'partial' | 'failed' | 'empty';

export interface TestResult {
  id: string;
  category: Category;
  label: string;
  status: TestStatus;
  command: string;
  exitCode: number | null;
  metrics: Metrics;
  output: string;
  error?: string;
}

/** Preparation and teardown commands around a category's tests */
export interface StepResult {
  id: string;
  kind: 'prepare' | 'cleanup';
  status: TestStatus;
  command: string;
  exitCode: number | null;
  output: string;
  error?: string;
}

export interface CategoryResult {
  category: Category;
  status: CategoryStatus;
  tests: TestResult[];
  steps: StepResult[];
}

export interface ToolInfo {
  name: string;
  version?: string;
}

export interface RunResults {
  /** Local timestamp `YYYYMMDD_HHMMSS`; also names the run directory */
  runId: string;
  startedAt: string;
  finishedAt: string;
  configPath: string;
  tools: ToolInfo[];
  system?: SystemInfo;
  categories: CategoryResult[];
}
