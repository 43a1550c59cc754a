// @hostbench/core entry point
//
// Building blocks of a run, in the order the CLI uses them:
// loadConfig → ensureDependencies → runSuite (planSuite + CommandExecutor +
// parseCategoryOutput). Reporting lives in @hostbench/reporter.

// Configuration
export * from './config/types.js';
export {
  DEFAULT_CONFIG_PATH,
  getDefaultConfig,
  isCategoryEnabled,
  loadConfig,
  parseConfig,
} from './config/loader.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  ConfigError,
  HostbenchError,
  InternalError,
  OutputError,
  SetupError,
  isHostbenchError,
  toError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';

// Results
export type * from './types/results.js';

// Installer
export {
  INSTALL_TIMEOUT_MS,
  PACKAGE_MANAGERS,
  buildInstallCommand,
  buildRefreshCommand,
  createPathProbe,
  detectPackageManager,
  ensureDependencies,
  requiredPackages,
  type ExecutableProbe,
  type InstallDependencies,
  type InstallSummary,
  type PackageManager,
  type PackageManagerName,
  type RequiredPackage,
} from './install/package-manager.js';

// Execution
export {
  KILL_GRACE_MS,
  createSpawnExecutor,
  formatCommand,
  type CommandExecutor,
  type CommandOutcome,
  type CommandSpec,
} from './exec/executor.js';

// Planning
export {
  TIMEOUT_MARGIN_SECONDS,
  buildCpuPlan,
  buildFileioPlan,
  buildMemoryPlan,
  buildNetworkPlan,
  planSuite,
  resolveThreads,
  type CategoryPlan,
  type PlanContext,
  type PlannedCommand,
  type PlannedStep,
  type PlannedTest,
} from './plan/commands.js';

// Parsing
export {
  CPU_RULES,
  FILEIO_RULES,
  MEMORY_RULES,
  extractMetrics,
  parseCategoryOutput,
  parseIperfOutput,
  type MetricCapture,
  type MetricRule,
  type Metrics,
} from './parser/metric-parser.js';
export {
  parseSystemInfo,
  parseToolVersion,
  type SystemInfo,
} from './parser/system-info.js';

// Runner
export {
  acquireDefaultScratchDirectory,
  runSuite,
  type ScratchDirectory,
  type SuiteRunDependencies,
} from './runner/suite-runner.js';

// Utilities
export { createStderrLogger, silentLogger, type RunLogger } from './util/log.js';
export { formatRunTimestamp } from './util/timestamp.js';
