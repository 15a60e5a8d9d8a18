/**
 * Language-neutral outline of one source file.
 *
 * Both the pattern extractor and the issue detector read outlines instead of
 * syntax trees, so a language only needs an analyzer to take part in
 * naming, import, error-handling and functional analysis.
 */

import { SourceParseError } from '../../errors';
import { ImportCategory } from '../../types';
import { OutlineLanguage } from '../LanguageDetector';

export interface CallSite {
  /** Rightmost identifier of the receiver (`logger` for `this.logger.info()`), or 'this' */
  object?: string;
  name: string;
}

export interface ImportRecord {
  category: ImportCategory;
  /** Full module path or specifier as written */
  module: string;
}

export interface FunctionOutline {
  name: string;
  params: string[];
  bodyStatementCount: number;
  /** Calls anywhere inside the function, nested functions included */
  calls: CallSite[];
}

export interface ErrorHandlingOutline {
  tryBlocks: number;
  /** Plain type names tested or caught by exception handlers */
  handledTypes: string[];
}

export interface SourceOutline {
  language: OutlineLanguage;
  assignments: string[];
  functions: FunctionOutline[];
  classes: string[];
  imports: ImportRecord[];
  errorHandling: ErrorHandlingOutline;
  calls: CallSite[];
}

/**
 * Per-language vocabulary the heuristics are phrased in.
 */
export interface LanguageConventions {
  /** Counter key for try blocks ('try_except' or 'try_catch') */
  tryConstruct: string;
  /** How exception handling blocks are referred to in messages */
  tryBlockLabel: string;
  loggingLevels: ReadonlySet<string>;
  /** How console output is referred to in messages */
  consoleOutputLabel: string;
  testFunctionPrefix: string;
  isConsoleOutput(call: CallSite): boolean;
  /** Counter key of an assertion call, or null when the call asserts nothing */
  assertionKey(call: CallSite): string | null;
}

/** Counter key under which console output is tallied */
export const CONSOLE_OUTPUT_KEY = 'print';

export function emptyOutline(language: OutlineLanguage): SourceOutline {
  return {
    language,
    assignments: [],
    functions: [],
    classes: [],
    imports: [],
    errorHandling: { tryBlocks: 0, handledTypes: [] },
    calls: [],
  };
}

/**
 * Structured logging key (`logger.info`) of a call, or null.
 */
export function loggingKey(call: CallSite, conventions: LanguageConventions): string | null {
  if (!call.object || conventions.isConsoleOutput(call)) {
    return null;
  }
  return conventions.loggingLevels.has(call.name) ? `${call.object}.${call.name}` : null;
}

export function assertRepresentable(content: string, filePath: string): void {
  if (content.includes('\u0000')) {
    throw new SourceParseError(`${filePath} contains NUL characters`, filePath);
  }
}
