import { spawn } from 'node:child_process';

export interface CommandSpec {
  argv: readonly string[];
  timeoutMs: number;
  cwd?: string;
}

export interface CommandOutcome {
  /** Exit code, or null when the process was killed by a signal or never started */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  timedOut: boolean;
  /** Set when the process could not be started (e.g. binary missing) */
  error?: string;
}

/**
 * Runs one external command to completion. Implementations never reject:
 * every failure mode is described by the outcome.
 */
export interface CommandExecutor {
  run(spec: CommandSpec): Promise<CommandOutcome>;
}

export const KILL_GRACE_MS = 5_000;

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function formatCommand(argv: readonly string[]): string {
  return argv
    .map((arg) =>
      /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`
    )
    .join(' ');
}

export function createSpawnExecutor(): CommandExecutor {
  return {
    run(spec) {
      return runWithSpawn(spec);
    },
  };
}

function runWithSpawn(spec: CommandSpec): Promise<CommandOutcome> {
  const [command, ...args] = spec.argv;
  if (command === undefined) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      output: '',
      timedOut: false,
      error: 'Empty command line',
    });
  }

  return new Promise<CommandOutcome>((resolve) => {
    const chunks: string[] = [];
    let timedOut = false;
    let settled = false;
    let forced = false;
    let processError: string | undefined;
    let exited: Pick<CommandOutcome, 'exitCode' | 'signal'> | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    // Own process group, so a timeout reaches every descendant
    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, LC_ALL: 'C' },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    const signalGroup = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch {
        // group already gone; the direct child may still be reapable
        child.kill(signal);
      }
    };

    const finish = (outcome: Omit<CommandOutcome, 'output' | 'timedOut'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      for (const signal of FORWARDED_SIGNALS) {
        process.removeListener(signal, forward);
      }
      resolve({ ...outcome, output: chunks.join(''), timedOut });
    };

    const finishExited = (): void => {
      if (!exited) return;
      finish({
        ...exited,
        ...(processError !== undefined ? { error: processError } : {}),
      });
    };

    // Descendants that left the group can hold the pipes open past SIGKILL
    const forceFinish = (): void => {
      signalGroup('SIGKILL');
      forced = true;
      child.stdout.destroy();
      child.stderr.destroy();
      finishExited();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      signalGroup('SIGTERM');
      killTimer = setTimeout(forceFinish, KILL_GRACE_MS);
    }, spec.timeoutMs);

    // A detached group no longer receives the terminal's signals
    function forward(signal: NodeJS.Signals): void {
      signalGroup('SIGTERM');
      for (const forwarded of FORWARDED_SIGNALS) {
        process.removeListener(forwarded, forward);
      }
      if (process.listenerCount(signal) === 0) {
        process.kill(process.pid, signal);
      }
    }
    for (const signal of FORWARDED_SIGNALS) {
      process.once(signal, forward);
    }

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => chunks.push(chunk));
    child.stderr.on('data', (chunk: string) => chunks.push(chunk));

    child.on('error', (error) => {
      processError = error.message;
      // A process that never started gets no usable 'close'
      if (child.pid === undefined) {
        finish({ exitCode: null, signal: null, error: processError });
      }
    });
    child.on('exit', (code, signal) => {
      exited = { exitCode: code, signal };
      if (forced) finishExited();
    });
    child.on('close', (code, signal) => {
      finish({
        exitCode: code,
        signal,
        ...(processError !== undefined ? { error: processError } : {}),
      });
    });
  });
}
