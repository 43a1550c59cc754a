import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy
 */

import {
  HostbenchError,
  ConfigError,
  SetupError,
  OutputError,
  InternalError,
  isHostbenchError,
  toError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('HostbenchError base class', () => {
    class TestError extends HostbenchError {
      constructor(message: string) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes differently for dev and prod', () => {
      const error = new TestError('Serialized');
      expect(error.toJSON('dev').stack).toBeDefined();
      expect(error.toJSON('prod').stack).toBeUndefined();
      expect(error.toJSON('prod')).toMatchObject({
        name: 'TestError',
        message: 'Serialized',
        errorCode: ErrorCode.INTERNAL_ERROR,
        severity: 'error',
      });
    });
  });

  describe('subclasses', () => {
    it('default to their domain codes', () => {
      expect(new ConfigError({ message: 'c' }).errorCode).toBe(
        ErrorCode.CONFIG_INVALID
      );
      expect(new SetupError({ message: 's' }).errorCode).toBe(
        ErrorCode.PACKAGE_INSTALL_FAILED
      );
      expect(new OutputError({ message: 'o' }).errorCode).toBe(
        ErrorCode.OUTPUT_WRITE_FAILED
      );
      expect(new InternalError({ message: 'i' }).errorCode).toBe(
        ErrorCode.INTERNAL_ERROR
      );
    });

    it('map to exit codes', () => {
      expect(
        new ConfigError({
          message: 'missing',
          errorCode: ErrorCode.CONFIG_UNREADABLE,
        }).getExitCode()
      ).toBe(50);
      expect(
        new SetupError({
          message: 'no manager',
          errorCode: ErrorCode.PACKAGE_MANAGER_NOT_FOUND,
        }).getExitCode()
      ).toBe(60);
      expect(new OutputError({ message: 'disk full' }).getExitCode()).toBe(70);
    });

    it('ConfigError exposes the offending setting', () => {
      const error = new ConfigError({
        message: 'bad',
        context: { setting: 'cpu.max_prime' },
      });
      expect(error.setting).toBe('cpu.max_prime');
      expect(new ConfigError({ message: 'bad' }).setting).toBeUndefined();
    });
  });

  describe('helpers', () => {
    it('isHostbenchError distinguishes classified errors', () => {
      expect(isHostbenchError(new OutputError({ message: 'x' }))).toBe(true);
      expect(isHostbenchError(new Error('x'))).toBe(false);
      expect(isHostbenchError('x')).toBe(false);
    });

    it('toError wraps non-Error values', () => {
      const original = new Error('kept');
      expect(toError(original)).toBe(original);
      expect(toError('text').message).toBe('text');
      expect(toError(42).message).toBe('42');
    });
  });
});
