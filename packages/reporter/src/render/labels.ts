import type {
  Category,
  RunResults,
  StepResult,
  TestResult,
} from '@hostbench/core';

export const CATEGORY_TITLES: Record<Category, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  fileio: 'File I/O',
  network: 'Network',
};

export function formatTools(results: RunResults): string {
  if (!results.tools.length) {
    return 'none';
  }
  return results.tools
    .map((tool) => `${tool.name} ${tool.version ?? '(version unknown)'}`)
    .join(', ');
}

/** `FAILED (exit code 1)`, `TIMEOUT (timed out after 90s)`, ... */
export function formatFailure(entry: TestResult | StepResult): string {
  const marker = entry.status.toUpperCase();
  return entry.error ? `${marker} (${entry.error})` : marker;
}
