/**
 * Configuration Types
 */

export const CATEGORIES = ['cpu', 'memory', 'fileio', 'network'] as const;
export type Category = (typeof CATEGORIES)[number];

export const FILEIO_MODES = [
  'seqwr',
  'seqrewr',
  'seqrd',
  'rndrd',
  'rndwr',
  'rndrw',
] as const;
export type FileioMode = (typeof FILEIO_MODES)[number];

/** A positive thread count, or 'auto' for the host's available parallelism */
export type ThreadCount = number | 'auto';

export type ReportFormat = 'text' | 'markdown';

export interface GlobalConfig {
  enabledTests: Category[];
  outputDir: string;
  installDependencies: boolean;
  useSudo: boolean | 'auto';
  systemInfo: boolean;
  charts: boolean;
  reportFormats: ReportFormat[];
}

export interface CpuTestConfig {
  enabled: boolean;
  events: number;
  time: number;
  threads: ThreadCount;
}

export interface CpuConfig {
  enabled: boolean;
  maxPrime: number;
  singleThread: CpuTestConfig;
  multiThread: CpuTestConfig;
}

export interface MemoryConfig {
  enabled: boolean;
  threads: ThreadCount;
  time: number;
  blockSize: string;
  totalSize: string;
  operation: 'read' | 'write' | 'none';
  accessMode: 'seq' | 'rnd';
}

export interface FileioModeConfig {
  name: FileioMode;
  enabled: boolean;
}

export interface FileioConfig {
  enabled: boolean;
  /** Scratch directory for the test files; null means a fresh temp dir */
  directory: string | null;
  fileTotalSize: string;
  fileNum: number;
  threads: ThreadCount;
  time: number;
  prepareTimeout: number;
  modes: FileioModeConfig[];
  cleanup: boolean;
}

export interface NetworkConfig {
  enabled: boolean;
  serverIp: string | null;
  port: number;
  time: number;
  parallel: number;
  reverse: boolean;
}

export interface SuiteConfig {
  /** Absolute path of the file the configuration was loaded from */
  source: string;
  global: GlobalConfig;
  cpu: CpuConfig;
  memory: MemoryConfig;
  fileio: FileioConfig;
  network: NetworkConfig;
}

export interface ConfigLoaderOptions {
  path?: string;
}

/**
 * Document shape after schema validation with defaults applied
 * (keys as written in the YAML file).
 */
export interface RawSuiteConfig {
  global: {
    enabled_tests: Category[];
    output_dir: string;
    install_dependencies: boolean;
    use_sudo: boolean | 'auto';
    system_info: boolean;
    charts: boolean;
    report_formats: ReportFormat[];
  };
  cpu: {
    enabled: boolean;
    max_prime: number;
    single_thread: CpuTestConfig;
    multi_thread: CpuTestConfig;
  };
  memory: {
    enabled: boolean;
    threads: ThreadCount;
    time: number;
    block_size: string;
    total_size: string;
    operation: 'read' | 'write' | 'none';
    access_mode: 'seq' | 'rnd';
  };
  fileio: {
    enabled: boolean;
    directory: string | null;
    file_total_size: string;
    file_num: number;
    threads: ThreadCount;
    time: number;
    prepare_timeout: number;
    modes: FileioModeConfig[];
    cleanup: boolean;
  };
  network: {
    enabled: boolean;
    server_ip: string | null;
    port: number;
    time: number;
    parallel: number;
    reverse: boolean;
  };
}
