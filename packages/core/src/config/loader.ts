/**
 * Configuration Loader
 *
 * Reads a YAML file, validates it against config.schema.json and fills in
 * every missing key from the schema defaults.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import { parse, YAMLParseError } from 'yaml';

import { ErrorCode } from '../errors/codes.js';
import { ConfigError, toError } from '../types/errors.js';
import type {
  Category,
  ConfigLoaderOptions,
  RawSuiteConfig,
  SuiteConfig,
} from './types.js';

const Ajv = AjvModule.default;

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../../config/hostbench.yaml', import.meta.url)
);
const SCHEMA_PATH = fileURLToPath(
  new URL('../../config/config.schema.json', import.meta.url)
);

let validatorPromise: Promise<ValidateFunction<RawSuiteConfig>> | undefined;

async function getValidator(): Promise<ValidateFunction<RawSuiteConfig>> {
  validatorPromise ??= readFile(SCHEMA_PATH, 'utf8').then((raw) => {
    const ajv = new Ajv({
      allErrors: true,
      useDefaults: true,
      allowUnionTypes: true,
    });
    return ajv.compile<RawSuiteConfig>(JSON.parse(raw));
  });
  // A failed schema load is retried by the next caller
  return validatorPromise.catch((error: unknown) => {
    validatorPromise = undefined;
    throw error;
  });
}

/**
 * Load configuration from a YAML file (the bundled default when no path is
 * given).
 */
export async function loadConfig(
  options: ConfigLoaderOptions = {}
): Promise<SuiteConfig> {
  const source = path.resolve(options.path ?? DEFAULT_CONFIG_PATH);

  let content: string;
  try {
    content = await readFile(source, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read configuration file: ${source}`,
      errorCode: ErrorCode.CONFIG_UNREADABLE,
      context: {
        path: source,
        suggestion: 'Pass an existing YAML file: hostbench run <config_path>',
      },
      cause: toError(error),
    });
  }

  return parseConfig(content, source);
}

/**
 * Parse and validate YAML text. An empty document yields the defaults.
 */
export async function parseConfig(
  content: string,
  source: string
): Promise<SuiteConfig> {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    const reason =
      error instanceof YAMLParseError ? error.message : String(error);
    throw new ConfigError({
      message: `Configuration file is not valid YAML: ${reason}`,
      errorCode: ErrorCode.CONFIG_PARSE_FAILED,
      context: { path: source },
      cause: toError(error),
    });
  }

  const data = document ?? {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError({
      message: 'Configuration file must contain a mapping at the top level',
      errorCode: ErrorCode.CONFIG_PARSE_FAILED,
      context: { path: source },
    });
  }

  const validate = await getValidator();
  if (!validate(data)) {
    const errors = validate.errors ?? [];
    throw new ConfigError({
      message: `Invalid configuration: ${formatSchemaErrors(errors)}`,
      errorCode: ErrorCode.CONFIG_INVALID,
      context: { path: source, setting: toSetting(errors[0]) },
    });
  }

  const config = toSuiteConfig(data, source);
  assertCrossFieldRules(config);
  return config;
}

/**
 * Configuration with every key at its default value
 */
export async function getDefaultConfig(): Promise<SuiteConfig> {
  return parseConfig('', '<defaults>');
}

/**
 * A category runs when its own `enabled` flag is set and
 * `global.enabled_tests` lists it.
 */
export function isCategoryEnabled(
  config: SuiteConfig,
  category: Category
): boolean {
  return config[category].enabled && config.global.enabledTests.includes(category);
}

function toSuiteConfig(raw: RawSuiteConfig, source: string): SuiteConfig {
  return {
    source,
    global: {
      enabledTests: [...raw.global.enabled_tests],
      outputDir: raw.global.output_dir,
      installDependencies: raw.global.install_dependencies,
      useSudo: raw.global.use_sudo,
      systemInfo: raw.global.system_info,
      charts: raw.global.charts,
      reportFormats: [...raw.global.report_formats],
    },
    cpu: {
      enabled: raw.cpu.enabled,
      maxPrime: raw.cpu.max_prime,
      singleThread: { ...raw.cpu.single_thread },
      multiThread: { ...raw.cpu.multi_thread },
    },
    memory: {
      enabled: raw.memory.enabled,
      threads: raw.memory.threads,
      time: raw.memory.time,
      blockSize: raw.memory.block_size,
      totalSize: raw.memory.total_size,
      operation: raw.memory.operation,
      accessMode: raw.memory.access_mode,
    },
    fileio: {
      enabled: raw.fileio.enabled,
      directory: raw.fileio.directory,
      fileTotalSize: raw.fileio.file_total_size,
      fileNum: raw.fileio.file_num,
      threads: raw.fileio.threads,
      time: raw.fileio.time,
      prepareTimeout: raw.fileio.prepare_timeout,
      modes: raw.fileio.modes.map((mode) => ({ ...mode })),
      cleanup: raw.fileio.cleanup,
    },
    network: {
      enabled: raw.network.enabled,
      serverIp: raw.network.server_ip,
      port: raw.network.port,
      time: raw.network.time,
      parallel: raw.network.parallel,
      reverse: raw.network.reverse,
    },
  };
}

function assertCrossFieldRules(config: SuiteConfig): void {
  if (isCategoryEnabled(config, 'network') && !config.network.serverIp) {
    throw new ConfigError({
      message:
        'network.server_ip is required when the network test is enabled',
      errorCode: ErrorCode.CONFIG_INVALID,
      context: {
        path: config.source,
        setting: 'network.server_ip',
        suggestion: 'Set network.server_ip to a host running `iperf3 -s`',
      },
    });
  }
}

function formatSchemaErrors(errors: ErrorObject[]): string {
  if (!errors.length) {
    return 'unknown schema violation';
  }
  return errors
    .map((error) => `${toSetting(error) ?? '<root>'} ${error.message ?? ''}`.trim())
    .join('; ');
}

function toSetting(error: ErrorObject | undefined): string | undefined {
  if (!error) return undefined;
  const pointer =
    error.keyword === 'additionalProperties' &&
    typeof error.params.additionalProperty === 'string'
      ? `${error.instancePath}/${error.params.additionalProperty}`
      : error.instancePath;
  const setting = pointer.split('/').filter(Boolean).join('.');
  return setting || undefined;
}
