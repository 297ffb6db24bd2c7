import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadConformanceFixtures } from '../../src/testkit/conformance.js';
import {
  executeConformanceFixture,
  executeConformanceFixtures,
  formatInstanceLabel,
  writeConformanceReportArtifacts
} from '../../src/testkit/conformance-execution.js';
import { formatConformanceReportMarkdown } from '../../src/testkit/conformance-report.js';

const FIXTURE_ROOT = path.resolve('fixtures/conformance');

describe('conformance execution baseline', () => {
  it('runs every active fixture through parse and presentation planning', async () => {
    const fixtures = await loadConformanceFixtures(FIXTURE_ROOT);
    const report = await executeConformanceFixtures(fixtures);

    expect(report.fixtureCount).toBe(11);
    expect(report.results.filter((result) => !result.success).map((result) => result.failureReasons)).toEqual([]);
    expect(report.failCount).toBe(0);

    expect(report.parseDiagnosticCodeHistogram.UNRESOLVED_REFERENCE).toBe(1);
    expect(report.parseDiagnosticCodeHistogram.DUPLICATE_PART).toBe(1);
    expect(report.parseDiagnosticCodeHistogram.DUPLICATE_METADATA).toBe(1);
    expect(report.parseDiagnosticCodeHistogram.REPEAT_IGNORED_BY_ORDER).toBe(1);
    expect(report.planDiagnosticCodeHistogram).toEqual({});

    expect(report.categoryRollups.plain?.fixtureCount).toBe(3);
    expect(report.categoryRollups.chordpro?.fixtureCount).toBe(2);
    expect(report.categoryRollups.classic?.fixtureCount).toBe(1);
    expect(report.categoryRollups.references?.fixtureCount).toBe(4);
    expect(report.categoryRollups.strict?.diagnosticSeverityHistogram).toEqual({ error: 1 });

    const markdown = formatConformanceReportMarkdown(report);
    expect(markdown).toContain('| classic-hymn | classic | lenient | yes | ok |');
    expect(markdown).toContain('| strict-duplicate-metadata | plain | strict | yes | ok |');

    const outDir = process.env.CONFORMANCE_REPORT_OUT_DIR;
    if (outDir) {
      const paths = await writeConformanceReportArtifacts(report, path.resolve(outDir));
      expect(paths.jsonPath.endsWith('conformance-report.json')).toBe(true);
    }
  });

  it('reports every mismatched expectation', async () => {
    const fixtures = await loadConformanceFixtures(FIXTURE_ROOT);
    const fixture = fixtures.find((candidate) => candidate.meta.id === 'plain-unused-part');
    expect(fixture).toBeDefined();
    if (!fixture) {
      return;
    }

    const result = await executeConformanceFixture({
      ...fixture,
      meta: {
        ...fixture.meta,
        expect: { ...fixture.meta.expect, diagnostics: [], dialect: 'chordpro' }
      }
    });

    expect(result.success).toBe(false);
    expect(result.failureReasons).toEqual([
      'diagnostics: expected [] but observed [UNUSED_PART]',
      "dialect: expected 'chordpro' but detected 'plain'"
    ]);
  });

  it('writes json and markdown artifacts', async () => {
    const fixtures = await loadConformanceFixtures(FIXTURE_ROOT);
    const report = await executeConformanceFixtures(
      fixtures.filter((fixture) => fixture.meta.category === 'classic')
    );

    const outDir = await mkdtemp(path.join(os.tmpdir(), 'songplan-report-'));
    const paths = await writeConformanceReportArtifacts(report, outDir);

    const json: unknown = JSON.parse(await readFile(paths.jsonPath, 'utf8'));
    expect(json).toMatchObject({ fixtureCount: 1, passCount: 1, failCount: 0 });
    const markdown = await readFile(paths.markdownPath, 'utf8');
    expect(markdown.startsWith('# Conformance Execution Report\n')).toBe(true);
    expect(markdown).toContain('### Plan Diagnostic Codes\n\n- none');
  });

  it('labels repeated order entries with their count', () => {
    expect(formatInstanceLabel({ name: 'Chorus', repeat: 2 })).toBe('Chorus x2');
    expect(formatInstanceLabel({ name: 'Verse 1' })).toBe('Verse 1');
  });
});
