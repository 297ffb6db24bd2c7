import type { Diagnostic } from '../core/diagnostics.js';
import { DEFAULT_TAB_WIDTH } from '../parser/parse-constants.js';

/** Thrown when planner options are out of range or of the wrong type. */
export class PlannerConfigError extends Error {
  readonly option: string;
  readonly value: unknown;

  constructor(option: string, value: unknown, expectation: string) {
    const shown = typeof value === 'string' ? JSON.stringify(value) : String(value);
    super(`Invalid planner option '${option}': expected ${expectation}, got ${shown}.`);
    this.name = 'PlannerConfigError';
    this.option = option;
    this.value = value;
  }
}

/** Planner return envelope: a plan, or the configuration error that prevented one. */
export interface PlanResult<TPlan> {
  plan?: TPlan;
  diagnostics: Diagnostic[];
  error?: PlannerConfigError;
}

/** Presentation (slide) planner options. */
export interface PresentationOptions {
  maxLinesPerSlide?: number;
  /** Never split a part; a long part may then exceed `maxLinesPerSlide`. */
  keepPartTogether?: boolean;
  expandRepeats?: boolean;
  titleSlide?: boolean;
  blankLastSlide?: boolean;
  /** Preview the first line of the next content slide. */
  spoiler?: boolean;
  /** `{{key}}` template over the title and metadata; empty disables meta text. */
  metaTemplate?: string;
  metaOnFirstSlide?: boolean;
  metaOnLastSlide?: boolean;
}

export type ResolvedPresentationOptions = Required<PresentationOptions>;

/** Sheet (print) planner options. */
export interface SheetOptions {
  tabWidth?: number;
  showChords?: boolean;
  showCrossReferences?: boolean;
  rowsPerPage?: number;
}

export type ResolvedSheetOptions = Required<SheetOptions>;

export const DEFAULT_PRESENTATION_OPTIONS: ResolvedPresentationOptions = {
  maxLinesPerSlide: 4,
  keepPartTogether: false,
  expandRepeats: true,
  titleSlide: false,
  blankLastSlide: false,
  spoiler: false,
  metaTemplate: '',
  metaOnFirstSlide: true,
  metaOnLastSlide: true
};

export const DEFAULT_SHEET_OPTIONS: ResolvedSheetOptions = {
  tabWidth: DEFAULT_TAB_WIDTH,
  showChords: true,
  showCrossReferences: true,
  rowsPerPage: 60
};

/** Apply defaults and validate presentation options; throws `PlannerConfigError`. */
export function resolvePresentationOptions(options: PresentationOptions = {}): ResolvedPresentationOptions {
  const defaults = DEFAULT_PRESENTATION_OPTIONS;
  return {
    maxLinesPerSlide: positiveInteger('maxLinesPerSlide', options.maxLinesPerSlide, defaults.maxLinesPerSlide),
    keepPartTogether: flag('keepPartTogether', options.keepPartTogether, defaults.keepPartTogether),
    expandRepeats: flag('expandRepeats', options.expandRepeats, defaults.expandRepeats),
    titleSlide: flag('titleSlide', options.titleSlide, defaults.titleSlide),
    blankLastSlide: flag('blankLastSlide', options.blankLastSlide, defaults.blankLastSlide),
    spoiler: flag('spoiler', options.spoiler, defaults.spoiler),
    metaTemplate: text('metaTemplate', options.metaTemplate, defaults.metaTemplate),
    metaOnFirstSlide: flag('metaOnFirstSlide', options.metaOnFirstSlide, defaults.metaOnFirstSlide),
    metaOnLastSlide: flag('metaOnLastSlide', options.metaOnLastSlide, defaults.metaOnLastSlide)
  };
}

/** Apply defaults and validate sheet options; throws `PlannerConfigError`. */
export function resolveSheetOptions(options: SheetOptions = {}): ResolvedSheetOptions {
  const defaults = DEFAULT_SHEET_OPTIONS;
  return {
    tabWidth: positiveInteger('tabWidth', options.tabWidth, defaults.tabWidth),
    showChords: flag('showChords', options.showChords, defaults.showChords),
    showCrossReferences: flag('showCrossReferences', options.showCrossReferences, defaults.showCrossReferences),
    rowsPerPage: positiveInteger('rowsPerPage', options.rowsPerPage, defaults.rowsPerPage)
  };
}

/**
 * Run a planner body with validated options, turning a configuration error into a result.
 * Other exceptions are programmer errors and propagate.
 */
export function runPlanner<TOptions, TPlan>(
  resolve: () => TOptions,
  plan: (options: TOptions) => TPlan
): PlanResult<TPlan> {
  let options: TOptions;
  try {
    options = resolve();
  } catch (error) {
    if (error instanceof PlannerConfigError) {
      return {
        diagnostics: [
          { code: 'PLANNER_CONFIG_INVALID', severity: 'error', category: 'planner-config', message: error.message }
        ],
        error
      };
    }
    throw error;
  }
  return { plan: plan(options), diagnostics: [] };
}

function positiveInteger(option: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new PlannerConfigError(option, value, 'an integer greater than 0');
  }
  return value;
}

function flag(option: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new PlannerConfigError(option, value, 'a boolean');
  }
  return value;
}

function text(option: string, value: unknown, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new PlannerConfigError(option, value, 'a string');
  }
  return value;
}
