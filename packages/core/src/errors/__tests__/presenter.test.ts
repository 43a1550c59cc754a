import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../../errors/presenter.js';
import { ErrorCode } from '../../errors/codes.js';
import { ConfigError, SetupError } from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('CLI view carries code, location, setting and workaround', () => {
    const err = new ConfigError({
      message: 'network.server_ip is required',
      errorCode: ErrorCode.CONFIG_INVALID,
      context: {
        path: '/etc/hostbench.yaml',
        setting: 'network.server_ip',
        suggestion: 'Set network.server_ip',
      },
    });
    const view = new ErrorPresenter('dev', {
      colors: false,
      terminalWidth: 100,
    }).formatForCLI(err);

    expect(view.title).toBe('Error E302: network.server_ip is required');
    expect(view.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(view.location).toBe('Location: /etc/hostbench.yaml');
    expect(view.setting).toBe('network.server_ip');
    expect(view.workaround).toBe('Set network.server_ip');
    expect(view.colors).toBe(false);
    expect(view.terminalWidth).toBe(100);
  });

  test('setup view carries the failed command and its cause', () => {
    const err = new SetupError({
      message: 'Package installation failed (exit code 100)',
      context: {
        command: 'apt-get install -y sysbench',
        suggestion: 'Retry when apt is idle',
      },
      cause: new Error('apt lock held'),
    });
    const view = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);

    expect(view.code).toBe(ErrorCode.PACKAGE_INSTALL_FAILED);
    expect(view.command).toBe('apt-get install -y sysbench');
    expect(view.cause).toBe('apt lock held');
    expect(view.workaround).toBe('Retry when apt is idle');
    expect(view.location).toBeUndefined();
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new ConfigError({ message: 'Invalid' });

    process.env.NO_COLOR = '1';
    expect(
      new ErrorPresenter('dev', { colors: true }).formatForCLI(err).colors
    ).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(
      new ErrorPresenter('prod', { colors: false }).formatForCLI(err).colors
    ).toBe(true);
  });

  test('colors default to the environment when not specified', () => {
    const err = new ConfigError({ message: 'Invalid' });
    expect(new ErrorPresenter('dev').formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
  });
});
