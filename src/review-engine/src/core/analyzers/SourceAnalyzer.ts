/**
 * SourceAnalyzer - Routes a file to the analyzer for its language.
 */

import { LanguageDetector, OutlineLanguage } from '../LanguageDetector';
import { PythonAnalyzer } from './PythonAnalyzer';
import { LanguageConventions, SourceOutline } from './SourceOutline';
import { TypeScriptAnalyzer } from './TypeScriptAnalyzer';

export interface LanguageAnalyzer {
  readonly conventions: LanguageConventions;
  analyze(content: string, filePath: string): SourceOutline;
}

export interface AnalyzedSource {
  outline: SourceOutline;
  conventions: LanguageConventions;
}

export class SourceAnalyzer {
  private languageDetector = new LanguageDetector();
  private analyzers: Record<OutlineLanguage, LanguageAnalyzer>;

  constructor() {
    const typescript = new TypeScriptAnalyzer();
    this.analyzers = {
      python: new PythonAnalyzer(),
      typescript,
      javascript: typescript,
    };
  }

  /**
   * Whether files at this path get a structural outline.
   */
  supports(filePath: string): boolean {
    return this.languageDetector.outlineLanguage(filePath) !== null;
  }

  /**
   * Outline a file, or null for languages analyzed on text alone.
   * Throws SourceParseError when the file cannot be parsed.
   */
  analyze(content: string, filePath: string): AnalyzedSource | null {
    const language = this.languageDetector.outlineLanguage(filePath);
    if (language === null) {
      return null;
    }
    const analyzer = this.analyzers[language];
    return { outline: analyzer.analyze(content, filePath), conventions: analyzer.conventions };
  }
}
