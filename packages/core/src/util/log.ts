/**
 * Progress and warning lines for a run, written to stderr so stdout stays
 * reserved for the artifact listing.
 */
export interface RunLogger {
  info(message: string): void;
  warn(message: string): void;
}

const PREFIX = '[hostbench]';

export function createStderrLogger(
  stream: NodeJS.WritableStream = process.stderr
): RunLogger {
  return {
    info(message) {
      stream.write(`${PREFIX} ${message}\n`);
    },
    warn(message) {
      stream.write(`${PREFIX} warning: ${message}\n`);
    },
  };
}

export const silentLogger: RunLogger = {
  info() {},
  warn() {},
};
