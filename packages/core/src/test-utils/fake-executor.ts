import type {
  CommandExecutor,
  CommandOutcome,
  CommandSpec,
} from '../exec/executor.js';
import { readFixture } from './fixtures.js';

export type FakeResponse = Partial<CommandOutcome>;
export type Responder = (argv: readonly string[]) => FakeResponse | undefined;

/**
 * In-process CommandExecutor: records every call and answers from a
 * responder. Unanswered commands succeed with empty output.
 */
export class FakeExecutor implements CommandExecutor {
  readonly calls: CommandSpec[] = [];

  constructor(private readonly respond: Responder = () => undefined) {}

  async run(spec: CommandSpec): Promise<CommandOutcome> {
    this.calls.push({ ...spec, argv: [...spec.argv] });
    return {
      exitCode: 0,
      signal: null,
      output: '',
      timedOut: false,
      ...this.respond(spec.argv),
    };
  }

  /** Command lines joined with single spaces, in call order */
  get commandLines(): string[] {
    return this.calls.map((call) => call.argv.join(' '));
  }
}

/**
 * Answers the benchmark tools with the captured fixtures; `overrides` are
 * consulted first.
 */
export function fixtureResponder(overrides?: Responder): Responder {
  return (argv) => {
    const override = overrides?.(argv);
    if (override) return override;

    const [tool, subject] = argv;
    const action = argv[argv.length - 1];
    if (subject === '--version') {
      if (tool === 'sysbench') return { output: readFixture('sysbench-version') };
      if (tool === 'iperf3') return { output: readFixture('iperf3-version') };
    }
    if (tool === 'neofetch') return { output: readFixture('neofetch') };
    if (tool === 'iperf3') return { output: readFixture('iperf3-client') };
    if (tool === 'sysbench' && action === 'run') {
      if (subject === 'cpu') return { output: readFixture('sysbench-cpu') };
      if (subject === 'memory') return { output: readFixture('sysbench-memory') };
      if (subject === 'fileio') return { output: readFixture('sysbench-fileio') };
    }
    return undefined;
  };
}
