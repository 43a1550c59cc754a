import type { CategoryResult, RunResults, TestResult } from '@hostbench/core';

import { CATEGORY_TITLES, formatFailure, formatTools } from './labels.js';

function cell(value: unknown): string {
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function renderMetricsTable(test: TestResult): string[] {
  const entries = Object.entries(test.metrics);
  if (!entries.length) {
    return ['No metrics recognised.'];
  }
  const rows = entries.map(([name, value]) => `| ${cell(name)} | ${value} |`);
  return ['| Metric | Value |', '|---|---|', ...rows];
}

function renderTest(test: TestResult): string[] {
  const lines = [`### ${test.label} – ${test.status}`, ''];
  lines.push(`- Command: \`${test.command}\``);
  if (test.status !== 'success') {
    lines.push(`- Result: ${formatFailure(test)}`);
    return lines;
  }
  lines.push('', ...renderMetricsTable(test));
  return lines;
}

function renderCategory(category: CategoryResult): string[] {
  const lines = [
    `## ${CATEGORY_TITLES[category.category]} (${category.status})`,
    '',
  ];
  const failedSteps = category.steps.filter((step) => step.status !== 'success');
  failedSteps.forEach((step) => {
    lines.push(`- ${step.id}: ${formatFailure(step)}`);
  });
  if (failedSteps.length) {
    lines.push('');
  }
  if (!category.tests.length) {
    lines.push('No tests enabled.', '');
  }
  category.tests.forEach((test) => {
    lines.push(...renderTest(test), '');
  });
  return lines;
}

export function renderMarkdownReport(results: RunResults): string {
  const lines: string[] = [];

  lines.push(`# hostbench report – ${results.runId}`, '');
  lines.push(`- Started: ${results.startedAt}`);
  lines.push(`- Finished: ${results.finishedAt}`);
  lines.push(`- Config: \`${results.configPath}\``);
  lines.push(`- Tools: ${formatTools(results)}`, '');

  if (results.system) {
    lines.push('## System', '', '| Key | Value |', '|---|---|');
    Object.entries(results.system).forEach(([key, value]) => {
      lines.push(`| ${cell(key)} | ${cell(value)} |`);
    });
    lines.push('');
  }

  results.categories.forEach((category) => {
    lines.push(...renderCategory(category));
  });

  return `${lines.join('\n').trimEnd()}\n`;
}
