/* eslint-disable max-lines-per-function */
import type { Category, CategoryResult, RunResults } from '@hostbench/core';

import { CATEGORY_TITLES } from '../render/labels.js';

export interface ChartFile {
  category: Category;
  fileName: string;
  content: string;
}

/**
 * Turns run results into chart files. Optional: a run without a renderer
 * still writes its raw results and reports.
 */
export interface ChartRenderer {
  readonly name: string;
  render(results: RunResults): ChartFile[];
}

interface HeadlineMetric {
  key: string;
  label: string;
}

export const HEADLINE_METRICS: Record<Category, readonly HeadlineMetric[]> = {
  cpu: [{ key: 'events_per_second', label: 'events/s' }],
  memory: [{ key: 'throughput_mib_per_s', label: 'MiB/s' }],
  fileio: [
    { key: 'read_mib_per_s', label: 'read MiB/s' },
    { key: 'written_mib_per_s', label: 'written MiB/s' },
  ],
  network: [
    { key: 'sender_mbps', label: 'sender Mbit/s' },
    { key: 'receiver_mbps', label: 'receiver Mbit/s' },
  ],
};

const SERIES_COLORS = ['#2563eb', '#f59e0b'];

const WIDTH = 640;
const HEIGHT = 360;
const MARGIN = { top: 56, right: 24, bottom: 64, left: 80 };
const PLOT_WIDTH = WIDTH - MARGIN.left - MARGIN.right;
const PLOT_HEIGHT = HEIGHT - MARGIN.top - MARGIN.bottom;
const TICKS = 4;

export interface ChartGroup {
  label: string;
  values: Array<number | undefined>;
}

function escapeXml(value: unknown): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function coord(value: number): string {
  return String(Number(value.toFixed(2)));
}

/** Smallest 1, 2 or 5 × 10^n at or above `value` */
export function niceCeiling(value: number): number {
  if (!(value > 0)) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(value));
  const fraction = value / magnitude;
  const step = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
  return step * magnitude;
}

/** Successful tests with at least one headline metric, in run order */
export function buildChartGroups(category: CategoryResult): ChartGroup[] {
  const metrics = HEADLINE_METRICS[category.category];
  return category.tests
    .filter((test) => test.status === 'success')
    .map((test) => ({
      label: test.label,
      values: metrics.map((metric) => test.metrics[metric.key]),
    }))
    .filter((group) => group.values.some((value) => value !== undefined));
}

export function renderBarChart(
  title: string,
  series: readonly HeadlineMetric[],
  groups: ChartGroup[]
): string {
  const maxValue = Math.max(
    0,
    ...groups.flatMap((group) =>
      group.values.filter((value): value is number => value !== undefined)
    )
  );
  const scaleMax = niceCeiling(maxValue);
  const baseline = MARGIN.top + PLOT_HEIGHT;
  const groupWidth = PLOT_WIDTH / Math.max(groups.length, 1);
  const barWidth = (groupWidth * 0.7) / Math.max(series.length, 1);

  const parts: string[] = [];

  for (let tick = 0; tick <= TICKS; tick += 1) {
    const y = baseline - (PLOT_HEIGHT * tick) / TICKS;
    const value = (scaleMax * tick) / TICKS;
    parts.push(
      `<line class="grid" x1="${MARGIN.left}" y1="${coord(y)}" x2="${WIDTH - MARGIN.right}" y2="${coord(y)}" stroke="#e5e7eb"/>`,
      `<text class="tick" x="${MARGIN.left - 8}" y="${coord(y + 4)}" text-anchor="end">${coord(value)}</text>`
    );
  }

  groups.forEach((group, groupIndex) => {
    const groupX = MARGIN.left + groupIndex * groupWidth;
    group.values.forEach((value, seriesIndex) => {
      if (value === undefined) return;
      const height = (Math.max(value, 0) / scaleMax) * PLOT_HEIGHT;
      const x = groupX + groupWidth * 0.15 + seriesIndex * barWidth;
      const color = SERIES_COLORS[seriesIndex % SERIES_COLORS.length] ?? '#2563eb';
      parts.push(
        `<rect class="bar" x="${coord(x)}" y="${coord(baseline - height)}" width="${coord(barWidth)}" height="${coord(height)}" fill="${color}"><title>${escapeXml(
          `${group.label}: ${value} ${series[seriesIndex]?.label ?? ''}`.trim()
        )}</title></rect>`
      );
    });
    parts.push(
      `<text class="group" x="${coord(groupX + groupWidth / 2)}" y="${baseline + 20}" text-anchor="middle">${escapeXml(group.label)}</text>`
    );
  });

  series.forEach((metric, index) => {
    const y = 24 + index * 16;
    const color = SERIES_COLORS[index % SERIES_COLORS.length] ?? '#2563eb';
    parts.push(
      `<rect class="legend" x="${WIDTH - 180}" y="${y - 10}" width="10" height="10" fill="${color}"/>`,
      `<text x="${WIDTH - 164}" y="${y}">${escapeXml(metric.label)}</text>`
    );
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="system-ui,sans-serif" font-size="12">
<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>
<text class="title" x="${MARGIN.left}" y="28" font-size="16" font-weight="600">${escapeXml(title)}</text>
${parts.join('\n')}
<line class="axis" x1="${MARGIN.left}" y1="${baseline}" x2="${WIDTH - MARGIN.right}" y2="${baseline}" stroke="#111827"/>
</svg>
`;
}

/** One grouped bar chart per category that produced headline metrics */
export function renderCategoryCharts(results: RunResults): ChartFile[] {
  const files: ChartFile[] = [];
  for (const category of results.categories) {
    const groups = buildChartGroups(category);
    if (!groups.length) continue;
    files.push({
      category: category.category,
      fileName: `${category.category}.svg`,
      content: renderBarChart(
        CATEGORY_TITLES[category.category],
        HEADLINE_METRICS[category.category],
        groups
      ),
    });
  }
  return files;
}

export const svgChartRenderer: ChartRenderer = {
  name: 'svg',
  render: renderCategoryCharts,
};
