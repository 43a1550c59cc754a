import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  OutputError,
  type ReportFormat,
  type RunLogger,
  type RunResults,
  silentLogger,
  toError,
} from '@hostbench/core';

import type { ChartFile, ChartRenderer } from './charts/svg.js';
import { renderMarkdownReport } from './render/markdown.js';
import { renderTextReport } from './render/text.js';

export const RAW_RESULTS_FILE = 'raw_results.json';
export const TEXT_REPORT_FILE = 'report.txt';
export const MARKDOWN_REPORT_FILE = 'report.md';
export const CHARTS_DIR = 'charts';

export interface ArtifactOptions {
  outputDir: string;
  reportFormats: readonly ReportFormat[];
  charts: boolean;
  /** null or absent: charts are skipped with a warning */
  chartRenderer?: ChartRenderer | null;
  logger?: RunLogger;
}

export interface RunArtifacts {
  runDir: string;
  rawResults: string;
  reports: string[];
  charts: string[];
}

export function runDirectoryName(results: RunResults): string {
  return `results_${results.runId}`;
}

async function createDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new OutputError({
      message: `Cannot create output directory: ${dir}`,
      context: {
        path: dir,
        suggestion: 'Check that global.output_dir is writable',
      },
      cause: toError(error),
    });
  }
}

async function writeArtifact(file: string, content: string): Promise<string> {
  try {
    await writeFile(file, content, 'utf8');
  } catch (error) {
    throw new OutputError({
      message: `Cannot write ${path.basename(file)}`,
      context: { path: file },
      cause: toError(error),
    });
  }
  return file;
}

function renderCharts(
  results: RunResults,
  options: ArtifactOptions,
  logger: RunLogger
): ChartFile[] {
  if (!options.charts) {
    return [];
  }
  if (!options.chartRenderer) {
    logger.warn('chart renderer unavailable, skipping charts');
    return [];
  }
  try {
    return options.chartRenderer.render(results);
  } catch (error) {
    logger.warn(
      `${options.chartRenderer.name} chart rendering failed: ${toError(error).message}`
    );
    return [];
  }
}

/**
 * Write the run directory `<outputDir>/results_<runId>/`: raw results,
 * the text report, the markdown report when requested and charts when a
 * renderer is available. Filesystem failures raise OutputError.
 */
export async function writeRunArtifacts(
  results: RunResults,
  options: ArtifactOptions
): Promise<RunArtifacts> {
  const logger = options.logger ?? silentLogger;
  const runDir = path.resolve(options.outputDir, runDirectoryName(results));
  await createDirectory(runDir);

  const rawResults = await writeArtifact(
    path.join(runDir, RAW_RESULTS_FILE),
    `${JSON.stringify(results, null, 2)}\n`
  );

  const reports = [
    await writeArtifact(
      path.join(runDir, TEXT_REPORT_FILE),
      renderTextReport(results)
    ),
  ];
  if (options.reportFormats.includes('markdown')) {
    reports.push(
      await writeArtifact(
        path.join(runDir, MARKDOWN_REPORT_FILE),
        renderMarkdownReport(results)
      )
    );
  }

  const chartFiles = renderCharts(results, options, logger);
  const charts: string[] = [];
  if (chartFiles.length) {
    const chartsDir = path.join(runDir, CHARTS_DIR);
    await createDirectory(chartsDir);
    for (const chart of chartFiles) {
      charts.push(
        await writeArtifact(path.join(chartsDir, chart.fileName), chart.content)
      );
    }
  } else if (options.charts && options.chartRenderer) {
    logger.info('no chartable metrics, skipping charts');
  }

  return { runDir, rawResults, reports, charts };
}
