import type { Diagnostic, DiagnosticCategory, DiagnosticSeverity } from '../core/diagnostics.js';
import type { DialectRules } from './dialects.js';

/** Supported parser strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** Mutable parser state shared by the parse passes of one invocation. */
export interface ParseContext {
  mode: ParserMode;
  sourceName?: string;
  dialect: DialectRules;
  tabWidth: number;
  chordAlignmentTolerance: number;
  diagnostics: Diagnostic[];
}

/** Create a parser context for one parse invocation. */
export function createParseContext(
  dialect: DialectRules,
  options: { mode: ParserMode; sourceName?: string; tabWidth: number; chordAlignmentTolerance: number }
): ParseContext {
  return {
    mode: options.mode,
    sourceName: options.sourceName,
    dialect,
    tabWidth: options.tabWidth,
    chordAlignmentTolerance: options.chordAlignmentTolerance,
    diagnostics: []
  };
}

/** Location of the source text a diagnostic points at. */
export interface SourcePosition {
  line: number;
  column?: number;
}

/** Record a diagnostic entry, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: ParseContext,
  code: string,
  severity: DiagnosticSeverity,
  category: DiagnosticCategory,
  message: string,
  position?: SourcePosition
): void {
  const actualSeverity = ctx.mode === 'strict' && severity === 'warning' ? 'error' : severity;

  ctx.diagnostics.push({
    code,
    severity: actualSeverity,
    category,
    message,
    source: position
      ? { name: ctx.sourceName, line: position.line, column: position.column ?? 1 }
      : undefined
  });
}
