import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../core/diagnostics.js';
import type { PartInstance } from '../core/song.js';
import { parseSongBytes, planPresentation } from '../public/api.js';
import type { ConformanceFixtureRecord } from './conformance.js';
import {
  buildCategoryRollups,
  buildCategoryHistogram,
  buildCodeHistogram,
  buildSeverityHistogram,
  formatConformanceReportJson,
  formatConformanceReportMarkdown
} from './conformance-report.js';
import type {
  ConformanceExecutionArtifactPaths,
  ConformanceExecutionReport,
  ConformanceFixtureExecutionResult,
  ConformanceFixtureObservation
} from './conformance-types.js';

/** Order entry as written in fixture expectations, e.g. `Chorus x2`. */
export function formatInstanceLabel(instance: PartInstance): string {
  return instance.repeat !== undefined && instance.repeat > 1 ? `${instance.name} x${instance.repeat}` : instance.name;
}

/** Execute one fixture through parse and presentation planning and compare with its expectations. */
export async function executeConformanceFixture(
  fixture: ConformanceFixtureRecord
): Promise<ConformanceFixtureExecutionResult> {
  const bytes = await readFile(fixture.songPath);
  const parseMode = fixture.meta.parse_mode ?? 'lenient';
  const parsed = parseSongBytes(new Uint8Array(bytes), {
    dialect: fixture.meta.dialect ?? 'auto',
    sourceName: path.basename(fixture.songPath),
    mode: parseMode
  });

  const observation: ConformanceFixtureObservation = {
    dialect: parsed.song.source?.dialect ?? 'plain',
    diagnostics: parsed.diagnostics.map((diagnostic) => diagnostic.code),
    definitions: parsed.song.definitions.map((definition) => definition.name),
    order: parsed.song.order.map(formatInstanceLabel)
  };

  let planDiagnostics: Diagnostic[] = [];
  const presentation = fixture.meta.presentation;
  if (presentation || fixture.meta.expect.slides !== undefined) {
    const planned = planPresentation(parsed.song, {
      maxLinesPerSlide: presentation?.max_lines_per_slide,
      keepPartTogether: presentation?.keep_part_together,
      expandRepeats: presentation?.expand_repeats
    });
    planDiagnostics = planned.diagnostics;
    if (planned.plan) {
      observation.slides = planned.plan.slides.length;
    }
  }

  const failureReasons = compareObservation(fixture, observation);
  return {
    fixtureId: fixture.meta.id,
    category: fixture.meta.category,
    metaPath: fixture.metaPath,
    songPath: fixture.songPath,
    status: fixture.meta.status,
    parseMode,
    parseDiagnostics: parsed.diagnostics,
    planDiagnostics,
    observation,
    success: failureReasons.length === 0,
    failureReasons
  };
}

/** List every mismatch between a fixture's expectations and what was observed. */
function compareObservation(fixture: ConformanceFixtureRecord, observation: ConformanceFixtureObservation): string[] {
  const expect = fixture.meta.expect;
  const reasons: string[] = [];

  const compareList = (label: string, expected: readonly string[], observed: readonly string[]): void => {
    if (expected.length !== observed.length || expected.some((item, index) => item !== observed[index])) {
      reasons.push(`${label}: expected [${expected.join(', ')}] but observed [${observed.join(', ')}]`);
    }
  };

  compareList('diagnostics', expect.diagnostics, observation.diagnostics);
  compareList('definitions', expect.definitions, observation.definitions);
  compareList('order', expect.order, observation.order);

  if (expect.dialect !== undefined && expect.dialect !== observation.dialect) {
    reasons.push(`dialect: expected '${expect.dialect}' but detected '${observation.dialect}'`);
  }
  if (expect.slides !== undefined && expect.slides !== observation.slides) {
    reasons.push(`slides: expected ${expect.slides} but observed ${observation.slides ?? 'no plan'}`);
  }
  return reasons;
}

/** Execute all active fixtures and collect a timestamped aggregate report. */
export async function executeConformanceFixtures(
  fixtures: ConformanceFixtureRecord[]
): Promise<ConformanceExecutionReport> {
  const results: ConformanceFixtureExecutionResult[] = [];
  for (const fixture of fixtures) {
    if (fixture.meta.status !== 'active') {
      continue;
    }
    results.push(await executeConformanceFixture(fixture));
  }

  const passCount = results.filter((result) => result.success).length;
  const parseDiagnostics = results.flatMap((result) => result.parseDiagnostics);
  const planDiagnostics = results.flatMap((result) => result.planDiagnostics);
  const allDiagnostics = [...parseDiagnostics, ...planDiagnostics];

  return {
    generatedAt: new Date().toISOString(),
    fixtureCount: results.length,
    passCount,
    failCount: results.length - passCount,
    parseDiagnosticCodeHistogram: buildCodeHistogram(parseDiagnostics),
    planDiagnosticCodeHistogram: buildCodeHistogram(planDiagnostics),
    diagnosticSeverityHistogram: buildSeverityHistogram(allDiagnostics),
    diagnosticCategoryHistogram: buildCategoryHistogram(allDiagnostics),
    categoryRollups: buildCategoryRollups(results),
    results
  };
}

/** Write JSON and Markdown report artifacts to `outDir`. */
export async function writeConformanceReportArtifacts(
  report: ConformanceExecutionReport,
  outDir: string
): Promise<ConformanceExecutionArtifactPaths> {
  await mkdir(outDir, { recursive: true });

  const jsonPath = path.join(outDir, 'conformance-report.json');
  const markdownPath = path.join(outDir, 'conformance-report.md');

  await writeFile(jsonPath, formatConformanceReportJson(report), 'utf8');
  await writeFile(markdownPath, formatConformanceReportMarkdown(report), 'utf8');

  return { jsonPath, markdownPath };
}
