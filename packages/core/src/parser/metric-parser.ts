/**
 * Line-oriented metric extraction from benchmark tool output.
 *
 * A rule matches one trimmed line and turns its capture groups into named
 * numeric metrics. Rules scoped to a section only apply between that
 * section's header line (e.g. `Latency (ms):`) and the next header.
 */

import type { Category } from '../config/types.js';

export type Metrics = Record<string, number>;

export interface MetricCapture {
  /** Metric name, or a function of the match for labels that embed a parameter */
  key: string | ((match: RegExpMatchArray) => string);
  /** Capture group holding the numeric token */
  group: number;
}

export interface MetricRule {
  /** Section header prefix (without the trailing colon) this rule is scoped to */
  section?: string;
  pattern: RegExp;
  captures: MetricCapture[];
}

const NUM = '(-?\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?)';

function rule(
  pattern: string,
  captures: MetricCapture[] | string,
  section?: string
): MetricRule {
  return {
    section,
    pattern: new RegExp(pattern),
    captures:
      typeof captures === 'string' ? [{ key: captures, group: 1 }] : captures,
  };
}

const GENERAL_RULES: MetricRule[] = [
  rule(`^Number of threads:\\s*${NUM}`, 'threads'),
  rule(`^total time:\\s*${NUM}s?`, 'total_time_s'),
  rule(`^total number of events:\\s*${NUM}`, 'total_events'),
];

const LATENCY_RULES: MetricRule[] = [
  rule(`^min:\\s*${NUM}`, 'latency_min_ms', 'Latency'),
  rule(`^avg:\\s*${NUM}`, 'latency_avg_ms', 'Latency'),
  rule(`^max:\\s*${NUM}`, 'latency_max_ms', 'Latency'),
  rule(
    `^(\\d+)th percentile:\\s*${NUM}`,
    [{ key: (match) => `latency_p${match[1] ?? ''}_ms`, group: 2 }],
    'Latency'
  ),
  rule(`^sum:\\s*${NUM}`, 'latency_sum_ms', 'Latency'),
];

export const CPU_RULES: MetricRule[] = [
  rule(`^events per second:\\s*${NUM}`, 'events_per_second'),
  ...GENERAL_RULES,
  ...LATENCY_RULES,
];

export const MEMORY_RULES: MetricRule[] = [
  rule(`^Total operations:\\s*${NUM}\\s*\\(\\s*${NUM} per second\\)`, [
    { key: 'total_operations', group: 1 },
    { key: 'operations_per_second', group: 2 },
  ]),
  rule(`^${NUM} MiB transferred\\s*\\(\\s*${NUM} MiB/sec\\)`, [
    { key: 'transferred_mib', group: 1 },
    { key: 'throughput_mib_per_s', group: 2 },
  ]),
  ...GENERAL_RULES,
  ...LATENCY_RULES,
];

export const FILEIO_RULES: MetricRule[] = [
  rule(`^reads/s:\\s*${NUM}`, 'reads_per_second'),
  rule(`^writes/s:\\s*${NUM}`, 'writes_per_second'),
  rule(`^fsyncs/s:\\s*${NUM}`, 'fsyncs_per_second'),
  rule(`^read, MiB/s:\\s*${NUM}`, 'read_mib_per_s'),
  rule(`^written, MiB/s:\\s*${NUM}`, 'written_mib_per_s'),
  ...GENERAL_RULES,
  ...LATENCY_RULES,
];

// A header is a line that ends with a colon and carries no value
const SECTION_HEADER = /^([A-Za-z][^:]*?)(?:\s*\([^)]*\))?:$/;

/**
 * Apply rules to every line of `output`. The first match of a metric wins;
 * lines no rule recognises are ignored.
 */
export function extractMetrics(output: string, rules: MetricRule[]): Metrics {
  const metrics: Metrics = {};
  let section: string | undefined;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = SECTION_HEADER.exec(line);
    if (header) {
      section = header[1];
      continue;
    }

    for (const current of rules) {
      if (current.section !== undefined && current.section !== section) {
        continue;
      }
      const match = line.match(current.pattern);
      if (!match) continue;
      for (const capture of current.captures) {
        const key =
          typeof capture.key === 'string' ? capture.key : capture.key(match);
        const value = Number.parseFloat(match[capture.group] ?? '');
        if (Number.isFinite(value) && !(key in metrics)) {
          metrics[key] = value;
        }
      }
    }
  }

  return metrics;
}

const BITRATE_SCALE_TO_MBPS: Record<string, number> = {
  '': 1e-6,
  K: 1e-3,
  M: 1,
  G: 1e3,
  T: 1e6,
};

// [  5]   0.00-10.00  sec  1.10 GBytes   943 Mbits/sec    0             sender
const IPERF_SUMMARY =
  /^\[\s*(SUM|\d+)\]\s+[\d.]+-[\d.]+\s+sec\s+[\d.]+\s+\S*Bytes\s+([\d.]+)\s+([KMGT]?)bits\/sec(?:\s+(\d+))?.*\b(sender|receiver)$/;

/**
 * Extract sender/receiver throughput (Mbit/s) and retransmits from iperf3
 * client output. `[SUM]` lines take precedence over per-stream lines.
 */
export function parseIperfOutput(output: string): Metrics {
  const fromSum: Metrics = {};
  const fromStream: Metrics = {};

  for (const rawLine of output.split(/\r?\n/)) {
    const match = IPERF_SUMMARY.exec(rawLine.trim());
    if (!match) continue;
    const [, stream, rate, unit, retransmits, role] = match;
    const target = stream === 'SUM' ? fromSum : fromStream;
    const scale = BITRATE_SCALE_TO_MBPS[unit ?? ''] ?? 1;
    const mbps = Number.parseFloat(rate ?? '') * scale;
    if (!Number.isFinite(mbps)) continue;

    if (role === 'sender') {
      target.sender_mbps = roundTo(mbps, 3);
      if (retransmits !== undefined) {
        target.retransmits = Number.parseInt(retransmits, 10);
      }
    } else {
      target.receiver_mbps = roundTo(mbps, 3);
    }
  }

  return { ...fromStream, ...fromSum };
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

const CATEGORY_RULES: Record<Exclude<Category, 'network'>, MetricRule[]> = {
  cpu: CPU_RULES,
  memory: MEMORY_RULES,
  fileio: FILEIO_RULES,
};

/**
 * Parse one test's captured output into metrics for its category.
 * Unrecognised output yields an empty mapping.
 */
export function parseCategoryOutput(category: Category, output: string): Metrics {
  if (category === 'network') {
    return parseIperfOutput(output);
  }
  return extractMetrics(output, CATEGORY_RULES[category]);
}
