import type { Diagnostic } from '../core/diagnostics.js';
import type { DialectId } from '../core/song.js';

/** String-keyed histogram helper used by conformance aggregate summaries. */
export type ConformanceHistogram = Record<string, number>;

/** What one fixture run actually produced. */
export interface ConformanceFixtureObservation {
  dialect: DialectId;
  diagnostics: string[];
  definitions: string[];
  order: string[];
  slides?: number;
}

/** One fixture execution result captured for conformance triage and artifact reporting. */
export interface ConformanceFixtureExecutionResult {
  fixtureId: string;
  category: string;
  metaPath: string;
  songPath: string;
  status: 'active' | 'skip';
  parseMode: 'strict' | 'lenient';
  parseDiagnostics: Diagnostic[];
  planDiagnostics: Diagnostic[];
  observation: ConformanceFixtureObservation;
  success: boolean;
  failureReasons: string[];
}

/** Category-level aggregate for conformance triage slicing. */
export interface ConformanceCategoryRollup {
  fixtureCount: number;
  passCount: number;
  failCount: number;
  diagnosticCodeHistogram: ConformanceHistogram;
  diagnosticSeverityHistogram: ConformanceHistogram;
}

/** Aggregated execution report for all processed fixtures. */
export interface ConformanceExecutionReport {
  generatedAt: string;
  fixtureCount: number;
  passCount: number;
  failCount: number;
  parseDiagnosticCodeHistogram: ConformanceHistogram;
  planDiagnosticCodeHistogram: ConformanceHistogram;
  diagnosticSeverityHistogram: ConformanceHistogram;
  diagnosticCategoryHistogram: ConformanceHistogram;
  categoryRollups: Record<string, ConformanceCategoryRollup>;
  results: ConformanceFixtureExecutionResult[];
}

/** Optional output paths produced when writing report artifacts to disk. */
export interface ConformanceExecutionArtifactPaths {
  jsonPath: string;
  markdownPath: string;
}
