/** Severity classes used by parser and planner diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning';

/**
 * Coarse taxonomy of diagnostics.
 * Tokenizer anomalies and structural warnings are always recoverable; structural errors are
 * recoverable through a documented fallback; planner-config errors fail only the plan call.
 */
export type DiagnosticCategory = 'tokenize-anomaly' | 'structural-warning' | 'structural-error' | 'planner-config';

/** Source location attached to a diagnostic record (both 1-based). */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  message: string;
  source?: DiagnosticSource;
}

/** True when at least one diagnostic has `error` severity. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
