import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';
import {
  DEFAULT_CONFIG_PATH,
  getDefaultConfig,
  isCategoryEnabled,
  loadConfig,
  parseConfig,
} from '../loader.js';

async function expectConfigError(
  promise: Promise<unknown>
): Promise<ConfigError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );
  expect(error).toBeInstanceOf(ConfigError);
  if (!(error instanceof ConfigError)) {
    throw new Error('expected a ConfigError');
  }
  return error;
}

describe('parseConfig', () => {
  it('fills every key from defaults for an empty document', async () => {
    const config = await parseConfig('', '/tmp/empty.yaml');

    expect(config.source).toBe('/tmp/empty.yaml');
    expect(config.global).toEqual({
      enabledTests: ['cpu', 'memory', 'fileio', 'network'],
      outputDir: '.',
      installDependencies: true,
      useSudo: 'auto',
      systemInfo: true,
      charts: true,
      reportFormats: ['text'],
    });
    expect(config.cpu).toEqual({
      enabled: true,
      maxPrime: 10000,
      singleThread: { enabled: true, events: 0, time: 30, threads: 1 },
      multiThread: { enabled: true, events: 0, time: 30, threads: 'auto' },
    });
    expect(config.memory).toEqual({
      enabled: true,
      threads: 4,
      time: 30,
      blockSize: '1K',
      totalSize: '100G',
      operation: 'write',
      accessMode: 'seq',
    });
    expect(config.fileio).toEqual({
      enabled: true,
      directory: null,
      fileTotalSize: '4G',
      fileNum: 4,
      threads: 4,
      time: 60,
      prepareTimeout: 600,
      modes: [
        { name: 'rndrw', enabled: true },
        { name: 'seqrd', enabled: true },
      ],
      cleanup: true,
    });
    expect(config.network).toEqual({
      enabled: false,
      serverIp: null,
      port: 5201,
      time: 30,
      parallel: 1,
      reverse: false,
    });
  });

  it('keeps given values and defaults the rest of a section', async () => {
    const config = await parseConfig(
      [
        'cpu:',
        '  max_prime: 20000',
        '  multi_thread:',
        '    threads: 8',
        'fileio:',
        '  modes:',
        '    - name: seqwr',
      ].join('\n'),
      'inline'
    );

    expect(config.cpu.maxPrime).toBe(20000);
    expect(config.cpu.multiThread).toEqual({
      enabled: true,
      events: 0,
      time: 30,
      threads: 8,
    });
    expect(config.cpu.singleThread.threads).toBe(1);
    expect(config.fileio.modes).toEqual([{ name: 'seqwr', enabled: true }]);
  });

  it('returns fresh objects on every call', async () => {
    const first = await getDefaultConfig();
    first.global.enabledTests.pop();
    first.fileio.modes[0] = { name: 'seqwr', enabled: false };

    const second = await getDefaultConfig();
    expect(second.global.enabledTests).toEqual([
      'cpu',
      'memory',
      'fileio',
      'network',
    ]);
    expect(second.fileio.modes[0]).toEqual({ name: 'rndrw', enabled: true });
  });

  it('rejects malformed YAML', async () => {
    const error = await expectConfigError(
      parseConfig('cpu: [unclosed', 'broken.yaml')
    );
    expect(error.errorCode).toBe(ErrorCode.CONFIG_PARSE_FAILED);
    expect(error.context?.path).toBe('broken.yaml');
    expect(error.message.startsWith('Configuration file is not valid YAML:')).toBe(
      true
    );
  });

  it('rejects a document that is not a mapping', async () => {
    const list = await expectConfigError(parseConfig('- cpu\n- memory\n', 'l'));
    expect(list.errorCode).toBe(ErrorCode.CONFIG_PARSE_FAILED);

    const scalar = await expectConfigError(parseConfig('42\n', 's'));
    expect(scalar.errorCode).toBe(ErrorCode.CONFIG_PARSE_FAILED);
    expect(scalar.message).toBe(
      'Configuration file must contain a mapping at the top level'
    );
  });

  it('reports the offending setting for out-of-range values', async () => {
    const error = await expectConfigError(
      parseConfig('cpu:\n  max_prime: 0\n', 'c.yaml')
    );
    expect(error.errorCode).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.setting).toBe('cpu.max_prime');
    expect(error.message).toBe('Invalid configuration: cpu.max_prime must be >= 1');
  });

  it('reports unknown keys with their full path', async () => {
    const error = await expectConfigError(
      parseConfig('memory:\n  turbo: true\n', 'c.yaml')
    );
    expect(error.setting).toBe('memory.turbo');
    expect(error.message).toBe(
      'Invalid configuration: memory.turbo must NOT have additional properties'
    );
  });

  it('accepts "auto" as the only textual thread count', async () => {
    const auto = await parseConfig('memory:\n  threads: auto\n', 'c.yaml');
    expect(auto.memory.threads).toBe('auto');

    const error = await expectConfigError(
      parseConfig('memory:\n  threads: many\n', 'c.yaml')
    );
    expect(error.setting).toBe('memory.threads');
  });

  it('rejects sizes sysbench would not understand', async () => {
    const error = await expectConfigError(
      parseConfig('fileio:\n  file_total_size: 4 gigabytes\n', 'c.yaml')
    );
    expect(error.setting).toBe('fileio.file_total_size');
  });

  it('requires network.server_ip when the network test runs', async () => {
    const error = await expectConfigError(
      parseConfig('network:\n  enabled: true\n', 'n.yaml')
    );
    expect(error.errorCode).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.setting).toBe('network.server_ip');
    expect(error.getExitCode()).toBe(50);
  });

  it('does not require network.server_ip when network is not listed', async () => {
    const config = await parseConfig(
      'global:\n  enabled_tests: [cpu]\nnetwork:\n  enabled: true\n',
      'n.yaml'
    );
    expect(isCategoryEnabled(config, 'network')).toBe(false);
  });
});

describe('isCategoryEnabled', () => {
  it('needs both the section flag and the global list', async () => {
    const config = await parseConfig(
      [
        'global:',
        '  enabled_tests: [cpu, memory]',
        'memory:',
        '  enabled: false',
      ].join('\n'),
      'inline'
    );
    expect(isCategoryEnabled(config, 'cpu')).toBe(true);
    expect(isCategoryEnabled(config, 'memory')).toBe(false);
    expect(isCategoryEnabled(config, 'fileio')).toBe(false);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'hostbench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled configuration when no path is given', async () => {
    const config = await loadConfig();
    const defaults = await getDefaultConfig();

    expect(config.source).toBe(DEFAULT_CONFIG_PATH);
    expect({ ...config, source: '' }).toEqual({ ...defaults, source: '' });
  });

  it('resolves the path and records it as the source', async () => {
    const file = path.join(dir, 'bench.yaml');
    await writeFile(file, 'global:\n  output_dir: results\n', 'utf8');

    const config = await loadConfig({ path: file });
    expect(config.source).toBe(file);
    expect(config.global.outputDir).toBe('results');
  });

  it('fails with CONFIG_UNREADABLE for a missing file', async () => {
    const missing = path.join(dir, 'missing.yaml');
    const error = await expectConfigError(loadConfig({ path: missing }));

    expect(error.errorCode).toBe(ErrorCode.CONFIG_UNREADABLE);
    expect(error.context?.path).toBe(missing);
    expect(error.message).toBe(`Cannot read configuration file: ${missing}`);
    expect(error.cause).toBeInstanceOf(Error);
  });
});
