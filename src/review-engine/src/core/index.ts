/**
 * Core source analysis shared by learning and review.
 */

export { LanguageDetector, SupportedLanguage, OutlineLanguage } from './LanguageDetector';
export {
  detectNamingConvention,
  matchesConvention,
  assignmentCategory,
} from './NamingConventions';
export { detectIndentation, measureLineLengths, percentile } from './TextMetrics';
export {
  CallSite,
  ImportRecord,
  FunctionOutline,
  ErrorHandlingOutline,
  SourceOutline,
  LanguageConventions,
  CONSOLE_OUTPUT_KEY,
  loggingKey,
} from './analyzers/SourceOutline';
export { TypeScriptAnalyzer, TYPESCRIPT_CONVENTIONS } from './analyzers/TypeScriptAnalyzer';
export { PythonAnalyzer, PYTHON_CONVENTIONS } from './analyzers/PythonAnalyzer';
export { SourceAnalyzer, LanguageAnalyzer, AnalyzedSource } from './analyzers/SourceAnalyzer';
export { importRoot } from './ImportRoots';
