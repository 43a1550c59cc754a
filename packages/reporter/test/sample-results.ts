import type { RunResults } from '@hostbench/core';

/** A partially failed run covering success, failure and skipped tests */
export function sampleResults(): RunResults {
  return {
    runId: '20240102_030405',
    startedAt: '2024-01-02T03:04:05.000Z',
    finishedAt: '2024-01-02T03:09:10.000Z',
    configPath: '/etc/hostbench.yaml',
    tools: [{ name: 'sysbench', version: '1.0.20' }],
    system: { OS: 'Debian 12', CPU: 'Example CPU (4)' },
    categories: [
      {
        category: 'cpu',
        status: 'partial',
        steps: [],
        tests: [
          {
            id: 'cpu_single_thread',
            category: 'cpu',
            label: 'CPU single thread (1 thread)',
            status: 'success',
            command:
              'sysbench cpu --events=0 --time=30 --threads=1 --cpu-max-prime=10000 run',
            exitCode: 0,
            metrics: { events_per_second: 1234.56, threads: 1 },
            output: 'events per second: 1234.56\n',
          },
          {
            id: 'cpu_multi_thread',
            category: 'cpu',
            label: 'CPU multi thread (4 threads)',
            status: 'failed',
            command:
              'sysbench cpu --events=0 --time=30 --threads=4 --cpu-max-prime=10000 run',
            exitCode: 1,
            metrics: {},
            output: 'FATAL: boom\n',
            error: 'exit code 1',
          },
        ],
      },
      {
        category: 'fileio',
        status: 'failed',
        steps: [
          {
            id: 'fileio_prepare',
            kind: 'prepare',
            status: 'failed',
            command: 'sysbench fileio --file-total-size=4G --file-num=4 prepare',
            exitCode: 1,
            output: 'FATAL: No space left on device\n',
            error: 'exit code 1',
          },
          {
            id: 'fileio_cleanup',
            kind: 'cleanup',
            status: 'success',
            command: 'sysbench fileio --file-total-size=4G --file-num=4 cleanup',
            exitCode: 0,
            output: '',
          },
        ],
        tests: [
          {
            id: 'fileio_rndrw',
            category: 'fileio',
            label: 'File I/O random read/write',
            status: 'skipped',
            command:
              'sysbench fileio --file-total-size=4G --file-num=4 --threads=4 --time=60 --file-test-mode=rndrw run',
            exitCode: null,
            metrics: {},
            output: '',
            error: 'fileio_prepare failed: exit code 1',
          },
        ],
      },
      {
        category: 'network',
        status: 'success',
        steps: [],
        tests: [
          {
            id: 'network',
            category: 'network',
            label: 'Network upload to 192.0.2.10:5201',
            status: 'success',
            command: 'iperf3 -c 192.0.2.10 -p 5201 -t 30 -P 1 -f m',
            exitCode: 0,
            metrics: { sender_mbps: 937, retransmits: 12, receiver_mbps: 932 },
            output: '',
          },
        ],
      },
    ],
  };
}
