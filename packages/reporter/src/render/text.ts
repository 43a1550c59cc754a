import type { CategoryResult, RunResults, TestResult } from '@hostbench/core';

import { CATEGORY_TITLES, formatFailure, formatTools } from './labels.js';

function heading(title: string, underline: string): string[] {
  return [title, underline.repeat(title.length)];
}

function renderTest(test: TestResult): string[] {
  if (test.status !== 'success') {
    return [`  ${test.label}: ${formatFailure(test)}`];
  }
  const lines = [`  ${test.label}: ok`];
  const entries = Object.entries(test.metrics);
  if (!entries.length) {
    lines.push('    (no metrics recognised)');
  }
  for (const [name, value] of entries) {
    lines.push(`    ${name}: ${value}`);
  }
  return lines;
}

function renderCategory(category: CategoryResult): string[] {
  const lines = [
    '',
    ...heading(CATEGORY_TITLES[category.category], '-'),
    `Status: ${category.status}`,
  ];
  for (const step of category.steps) {
    if (step.status !== 'success') {
      lines.push(`  ${step.id}: ${formatFailure(step)}`);
    }
  }
  if (!category.tests.length) {
    lines.push('  (no tests enabled)');
  }
  for (const test of category.tests) {
    lines.push(...renderTest(test));
  }
  return lines;
}

/**
 * Plain-text summary written as report.txt: run metadata, system info and
 * one section per executed category.
 */
export function renderTextReport(results: RunResults): string {
  const lines = [
    ...heading('hostbench report', '='),
    `Run:      ${results.runId}`,
    `Started:  ${results.startedAt}`,
    `Finished: ${results.finishedAt}`,
    `Config:   ${results.configPath}`,
    `Tools:    ${formatTools(results)}`,
  ];

  if (results.system) {
    lines.push('', ...heading('System', '-'));
    for (const [key, value] of Object.entries(results.system)) {
      lines.push(`${key}: ${value}`);
    }
  }

  if (!results.categories.length) {
    lines.push('', 'No benchmark categories were enabled.');
  }
  for (const category of results.categories) {
    lines.push(...renderCategory(category));
  }

  return `${lines.join('\n')}\n`;
}
