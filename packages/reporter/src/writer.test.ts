import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { ErrorCode, OutputError } from '@hostbench/core';
import { createRecordingLogger } from '@hostbench/core/test-utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { sampleResults } from '../test/sample-results.js';
import type { ChartRenderer } from './charts/svg.js';
import { svgChartRenderer } from './charts/svg.js';
import { renderTextReport } from './render/text.js';
import { writeRunArtifacts } from './writer.js';

async function exists(target: string): Promise<boolean> {
  return stat(target).then(
    () => true,
    () => false
  );
}

describe('writeRunArtifacts', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(tmpdir(), 'hostbench-out-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('writes raw results, the text report and charts into the run directory', async () => {
    const results = sampleResults();
    const artifacts = await writeRunArtifacts(results, {
      outputDir,
      reportFormats: ['text'],
      charts: true,
      chartRenderer: svgChartRenderer,
    });

    const runDir = path.join(outputDir, 'results_20240102_030405');
    expect(artifacts.runDir).toBe(runDir);
    expect(artifacts.rawResults).toBe(path.join(runDir, 'raw_results.json'));
    expect(artifacts.reports).toEqual([path.join(runDir, 'report.txt')]);
    expect(artifacts.charts).toEqual([
      path.join(runDir, 'charts', 'cpu.svg'),
      path.join(runDir, 'charts', 'network.svg'),
    ]);

    expect((await readdir(runDir)).sort()).toEqual([
      'charts',
      'raw_results.json',
      'report.txt',
    ]);
    expect(await readFile(artifacts.rawResults, 'utf8')).toBe(
      `${JSON.stringify(results, null, 2)}\n`
    );
    expect(await readFile(path.join(runDir, 'report.txt'), 'utf8')).toBe(
      renderTextReport(results)
    );
  });

  it('adds the markdown report when requested', async () => {
    const artifacts = await writeRunArtifacts(sampleResults(), {
      outputDir,
      reportFormats: ['text', 'markdown'],
      charts: false,
    });
    expect(artifacts.reports.map((file) => path.basename(file))).toEqual([
      'report.txt',
      'report.md',
    ]);
    const markdown = await readFile(
      path.join(artifacts.runDir, 'report.md'),
      'utf8'
    );
    expect(markdown.startsWith('# hostbench report – 20240102_030405\n')).toBe(true);
  });

  it('skips charts with a warning when no renderer is available', async () => {
    const logger = createRecordingLogger();
    const artifacts = await writeRunArtifacts(sampleResults(), {
      outputDir,
      reportFormats: ['text'],
      charts: true,
      chartRenderer: null,
      logger,
    });

    expect(artifacts.charts).toEqual([]);
    expect(await exists(path.join(artifacts.runDir, 'charts'))).toBe(false);
    expect(await exists(artifacts.rawResults)).toBe(true);
    expect(await exists(path.join(artifacts.runDir, 'report.txt'))).toBe(true);
    expect(logger.warnings).toEqual([
      'chart renderer unavailable, skipping charts',
    ]);
  });

  it('creates no charts directory when charts are disabled', async () => {
    const logger = createRecordingLogger();
    const artifacts = await writeRunArtifacts(sampleResults(), {
      outputDir,
      reportFormats: ['text'],
      charts: false,
      chartRenderer: svgChartRenderer,
      logger,
    });
    expect(await exists(path.join(artifacts.runDir, 'charts'))).toBe(false);
    expect(logger.warnings).toEqual([]);
  });

  it('treats a failing renderer like a missing one', async () => {
    const logger = createRecordingLogger();
    const broken: ChartRenderer = {
      name: 'broken',
      render: () => {
        throw new Error('no canvas');
      },
    };
    const artifacts = await writeRunArtifacts(sampleResults(), {
      outputDir,
      reportFormats: ['text'],
      charts: true,
      chartRenderer: broken,
      logger,
    });

    expect(await exists(path.join(artifacts.runDir, 'charts'))).toBe(false);
    expect(logger.warnings).toEqual(['broken chart rendering failed: no canvas']);
  });

  it('raises OutputError when the run directory cannot be created', async () => {
    const blocker = path.join(outputDir, 'not-a-dir');
    await writeFile(blocker, 'x', 'utf8');

    const error = await writeRunArtifacts(sampleResults(), {
      outputDir: blocker,
      reportFormats: ['text'],
      charts: false,
    }).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(OutputError);
    if (!(error instanceof OutputError)) return;
    expect(error.errorCode).toBe(ErrorCode.OUTPUT_WRITE_FAILED);
    expect(error.getExitCode()).toBe(70);
    expect(error.context?.path).toBe(
      path.join(blocker, 'results_20240102_030405')
    );
  });
});
