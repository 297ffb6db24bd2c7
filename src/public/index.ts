export {
  detectDialect,
  formatSheetText,
  parseSong,
  parseSongBytes,
  parseTokens,
  planPresentation,
  planSheet,
  tokenize,
  type ParseOptions,
  type ParseResult
} from './api.js';
export { hasErrors, type Diagnostic, type DiagnosticCategory, type DiagnosticSeverity } from '../core/diagnostics.js';
export {
  getPartDefinition,
  lineAnchors,
  lineText,
  PART_KINDS,
  type AnchorSegment,
  type AnnotationSegment,
  type ChordSegment,
  type DialectId,
  type LyricLine,
  type PartDefinition,
  type PartInstance,
  type PartKind,
  type Segment,
  type Song,
  type SongMetadata,
  type SongSource,
  type TextSegment
} from '../core/song.js';
export { createSong, SongModelError } from '../core/song-model.js';
export type { TokenizeOptions } from '../parser/tokenize.js';
export type { Token } from '../parser/tokens.js';
export {
  PlannerConfigError,
  type PlanResult,
  type PresentationOptions,
  type SheetOptions
} from '../planner/planner-config.js';
export type { ContentSlide, BlankSlide, Slide, SlidePlan, TitleSlide } from '../planner/presentation.js';
export type { CrossReference, SheetBlock, SheetPage, SheetPlan, SheetRow } from '../planner/sheet.js';
