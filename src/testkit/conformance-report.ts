import type { Diagnostic } from '../core/diagnostics.js';
import type {
  ConformanceCategoryRollup,
  ConformanceExecutionReport,
  ConformanceFixtureExecutionResult,
  ConformanceHistogram
} from './conformance-types.js';

/** Format a compact markdown summary useful for quick run triage. */
export function formatConformanceReportMarkdown(report: ConformanceExecutionReport): string {
  const lines: string[] = [
    '# Conformance Execution Report',
    '',
    `Generated at: ${report.generatedAt}`,
    `Fixtures executed: ${report.fixtureCount}`,
    `Passed: ${report.passCount}`,
    `Failed: ${report.failCount}`,
    '',
    '| Fixture | Dialect | Parse Mode | Match | Notes |',
    '|---|---|---|---|---|'
  ];

  for (const result of report.results) {
    const notes = result.failureReasons.length > 0 ? result.failureReasons.join('; ') : 'ok';
    lines.push(
      `| ${result.fixtureId} | ${result.observation.dialect} | ${result.parseMode} | ${
        result.success ? 'yes' : 'no'
      } | ${escapeMarkdownTable(notes)} |`
    );
  }

  lines.push('');
  lines.push('## Diagnostic Histograms');
  lines.push('');
  appendHistogramSection(lines, 'Parse Diagnostic Codes', report.parseDiagnosticCodeHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Plan Diagnostic Codes', report.planDiagnosticCodeHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Severities', report.diagnosticSeverityHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Categories', report.diagnosticCategoryHistogram);
  lines.push('');
  lines.push('## Category Rollups');
  lines.push('');
  appendCategoryRollupSection(lines, report.categoryRollups);

  return `${lines.join('\n')}\n`;
}

/** Serialize report content to deterministic JSON text for artifacts. */
export function formatConformanceReportJson(report: ConformanceExecutionReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Build a diagnostic code histogram from a list of diagnostics. */
export function buildCodeHistogram(diagnostics: readonly Diagnostic[]): ConformanceHistogram {
  return countBy(diagnostics, (diagnostic) => diagnostic.code);
}

/** Build a severity histogram from a list of diagnostics. */
export function buildSeverityHistogram(diagnostics: readonly Diagnostic[]): ConformanceHistogram {
  return countBy(diagnostics, (diagnostic) => diagnostic.severity);
}

/** Build a diagnostic category histogram from a list of diagnostics. */
export function buildCategoryHistogram(diagnostics: readonly Diagnostic[]): ConformanceHistogram {
  return countBy(diagnostics, (diagnostic) => diagnostic.category);
}

/** Build per-category pass/fail and diagnostic histogram aggregates. */
export function buildCategoryRollups(
  results: readonly ConformanceFixtureExecutionResult[]
): Record<string, ConformanceCategoryRollup> {
  const rollups: Record<string, ConformanceCategoryRollup> = {};

  for (const result of results) {
    const rollup = (rollups[result.category] ??= {
      fixtureCount: 0,
      passCount: 0,
      failCount: 0,
      diagnosticCodeHistogram: {},
      diagnosticSeverityHistogram: {}
    });

    rollup.fixtureCount += 1;
    if (result.success) {
      rollup.passCount += 1;
    } else {
      rollup.failCount += 1;
    }

    const diagnostics = [...result.parseDiagnostics, ...result.planDiagnostics];
    mergeHistogram(rollup.diagnosticCodeHistogram, buildCodeHistogram(diagnostics));
    mergeHistogram(rollup.diagnosticSeverityHistogram, buildSeverityHistogram(diagnostics));
  }

  return rollups;
}

function countBy(diagnostics: readonly Diagnostic[], keyOf: (diagnostic: Diagnostic) => string): ConformanceHistogram {
  const histogram: ConformanceHistogram = {};
  for (const diagnostic of diagnostics) {
    const key = keyOf(diagnostic);
    histogram[key] = (histogram[key] ?? 0) + 1;
  }
  return histogram;
}

/** Escape markdown table delimiters in free-form diagnostic text. */
function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|');
}

/** Append a markdown histogram section sorted by descending count then key name. */
function appendHistogramSection(lines: string[], title: string, histogram: ConformanceHistogram): void {
  lines.push(`### ${title}`);
  lines.push('');

  const entries = Object.entries(histogram).sort((left, right) => {
    if (right[1] !== left[1]) {
      return right[1] - left[1];
    }
    return left[0].localeCompare(right[0]);
  });

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push('| Key | Count |');
  lines.push('|---|---|');
  for (const [key, count] of entries) {
    lines.push(`| ${escapeMarkdownTable(key)} | ${count} |`);
  }
}

/** Merge histogram counts from `source` into `target`. */
function mergeHistogram(target: ConformanceHistogram, source: ConformanceHistogram): void {
  for (const [key, count] of Object.entries(source)) {
    target[key] = (target[key] ?? 0) + count;
  }
}

/** Append markdown rollup rows sorted by category key. */
function appendCategoryRollupSection(
  lines: string[],
  categoryRollups: Record<string, ConformanceCategoryRollup>
): void {
  const entries = Object.entries(categoryRollups).sort((left, right) => left[0].localeCompare(right[0]));

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push('| Category | Fixtures | Passed | Failed |');
  lines.push('|---|---|---|---|');
  for (const [category, rollup] of entries) {
    lines.push(`| ${escapeMarkdownTable(category)} | ${rollup.fixtureCount} | ${rollup.passCount} | ${rollup.failCount} |`);
  }
}
