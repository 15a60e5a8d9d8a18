/**
 * IssueDetector - Compares one candidate file against learned patterns.
 *
 * Three independent passes (style, architecture, functionality). Every check
 * reads only the pattern keys it needs and is skipped when they are absent.
 * `detect` is a pure function of (code, path, patterns); `analyze` adds the
 * similar-code context from the knowledge store.
 */

import {
  AnalyzedSource,
  CONSOLE_OUTPUT_KEY,
  SourceAnalyzer,
  detectIndentation,
  detectNamingConvention,
  importRoot,
  loggingKey,
  matchesConvention,
} from '../core';
import { KnowledgeUnavailableError, errorMessage } from '../errors';
import { Logger } from '../logging';
import {
  CodeAnalysis,
  ImportCategory,
  Issue,
  IssuesByCategory,
  NamingConvention,
  SimilarCodeResult,
  StoredPatterns,
} from '../types';

/** Functions with more body statements than this should handle errors */
export const NON_TRIVIAL_BODY_STATEMENTS = 5;

/** The slice of the knowledge store the detector reads */
export interface PatternSource {
  getPatterns(): Readonly<StoredPatterns> | null;
  retrieveSimilar(snippet: string, k: number): Promise<SimilarCodeResult[]>;
}

export interface IssueDetectorOptions {
  similarResults: number;
  logger: Logger;
}

interface ImportRule {
  subtype: string;
  label: string;
  severity: Issue['severity'];
}

const IMPORT_RULES: Record<ImportCategory, ImportRule> = {
  direct: { subtype: 'uncommon_import', label: 'Uncommon imports detected', severity: 'medium' },
  from: { subtype: 'uncommon_from_import', label: 'Uncommon from imports detected', severity: 'low' },
  js_imports: { subtype: 'uncommon_js_import', label: 'Uncommon imports detected', severity: 'low' },
};

const IMPORT_CATEGORIES: readonly ImportCategory[] = ['direct', 'from', 'js_imports'];

function summarizeLines(lines: number[]): string {
  if (lines.length <= 3) {
    return lines.join(', ');
  }
  return `${lines[0]}, ${lines[1]}, ... and ${lines.length - 2} more`;
}

export class IssueDetector {
  private logger: Logger;

  constructor(
    private store: PatternSource,
    private options: IssueDetectorOptions,
    private analyzer: SourceAnalyzer = new SourceAnalyzer()
  ) {
    this.logger = options.logger.child('detector');
  }

  /**
   * Detect issues and gather similar code. Throws KnowledgeUnavailableError
   * when no patterns are loaded.
   */
  async analyze(code: string, filePath: string, diff?: string): Promise<CodeAnalysis> {
    const patterns = this.store.getPatterns();
    if (!patterns) {
      throw new KnowledgeUnavailableError();
    }

    const issues = this.detect(code, filePath, patterns);
    const similarCode = await this.retrieveContext(code);
    return diff === undefined ? { issues, similarCode } : { issues, similarCode, diff };
  }

  detect(code: string, filePath: string, patterns: Readonly<StoredPatterns>): IssuesByCategory {
    this.logger.info(`Analyzing ${filePath}`);
    const source = this.outline(code, filePath);
    return {
      style: this.detectStyle(code, source, patterns),
      architecture: this.detectArchitecture(source, patterns),
      functionality: this.detectFunctionality(filePath, source, patterns),
    };
  }

  private outline(code: string, filePath: string): AnalyzedSource | null {
    try {
      return this.analyzer.analyze(code, filePath);
    } catch (error) {
      this.logger.debug(`Structural checks skipped for ${filePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async retrieveContext(code: string): Promise<SimilarCodeResult[]> {
    try {
      return await this.store.retrieveSimilar(code, this.options.similarResults);
    } catch (error) {
      this.logger.warn(`Similar code retrieval failed: ${errorMessage(error)}`);
      return [];
    }
  }

  // ==========================================================================
  // STYLE
  // ==========================================================================

  private detectStyle(code: string, source: AnalyzedSource | null, patterns: Readonly<StoredPatterns>): Issue[] {
    const issues: Issue[] = [];
    const style = patterns.style;
    if (!style) {
      return issues;
    }

    const preferredIndentation = style.indentation;
    const indentation = detectIndentation(code);
    if (preferredIndentation && indentation && indentation !== preferredIndentation) {
      issues.push({
        type: 'style',
        subtype: 'indentation',
        message: `Indentation uses ${indentation}, but project standard is ${preferredIndentation}`,
        severity: 'low',
      });
    }

    const maxLength = style.line_length?.preferred_max;
    if (maxLength !== undefined) {
      const longLines: number[] = [];
      code.split('\n').forEach((line, i) => {
        if (line.trimEnd().length > maxLength) longLines.push(i + 1);
      });
      if (longLines.length > 0) {
        issues.push({
          type: 'style',
          subtype: 'line_length',
          message: `Lines exceed maximum length of ${maxLength} characters: ${summarizeLines(longLines)}`,
          severity: 'low',
        });
      }
    }

    const naming = style.naming_conventions;
    if (source && naming) {
      const check = (name: string, preferred: NamingConvention | null | undefined, entity: string): void => {
        if (!preferred || preferred === 'unknown' || matchesConvention(name, preferred)) {
          return;
        }
        issues.push({
          type: 'style',
          subtype: 'naming_convention',
          message: `${entity} name '${name}' uses ${detectNamingConvention(name)} convention, but project standard is ${preferred}`,
          severity: 'low',
        });
      };
      const { outline } = source;
      for (const name of outline.assignments) check(name, naming.variables, 'Variable');
      for (const fn of outline.functions) check(fn.name, naming.functions, 'Function');
      for (const name of outline.classes) check(name, naming.classes, 'Class');
    }

    return issues;
  }

  // ==========================================================================
  // ARCHITECTURE
  // ==========================================================================

  private detectArchitecture(source: AnalyzedSource | null, patterns: Readonly<StoredPatterns>): Issue[] {
    const issues: Issue[] = [];
    const architecture = patterns.architecture;
    if (!source || !architecture) {
      return issues;
    }
    const { outline, conventions } = source;

    const commonImports = architecture.common_imports;
    if (commonImports) {
      for (const category of IMPORT_CATEGORIES) {
        const common = commonImports[category];
        if (!common) continue;
        const uncommon = outline.imports
          .filter(record => record.category === category && !common.includes(importRoot(record)))
          .map(record => record.module);
        if (uncommon.length > 0) {
          const rule = IMPORT_RULES[category];
          issues.push({
            type: 'architecture',
            subtype: rule.subtype,
            message: `${rule.label}: ${uncommon.join(', ')}`,
            severity: rule.severity,
          });
        }
      }
    }

    if (architecture.error_handling && outline.errorHandling.tryBlocks === 0) {
      const nonTrivial = outline.functions.some(fn => fn.bodyStatementCount > NON_TRIVIAL_BODY_STATEMENTS);
      if (nonTrivial) {
        issues.push({
          type: 'architecture',
          subtype: 'error_handling',
          message: `Function lacks error handling. Consider adding ${conventions.tryBlockLabel} blocks based on project patterns.`,
          severity: 'medium',
        });
      }
    }

    return issues;
  }

  // ==========================================================================
  // FUNCTIONALITY
  // ==========================================================================

  private detectFunctionality(
    filePath: string,
    source: AnalyzedSource | null,
    patterns: Readonly<StoredPatterns>
  ): Issue[] {
    const issues: Issue[] = [];
    const functional = patterns.functional;
    if (!source || !functional) {
      return issues;
    }
    const { outline, conventions } = source;

    const learnedLogging = functional.logging_patterns;
    if (learnedLogging) {
      const usesConsole = outline.calls.some(call => conventions.isConsoleOutput(call));
      const usesLogging = outline.calls.some(call => loggingKey(call, conventions) !== null);
      const loggingIsNorm = Object.keys(learnedLogging).length > 0 && !(CONSOLE_OUTPUT_KEY in learnedLogging);
      if (usesConsole && !usesLogging && loggingIsNorm) {
        issues.push({
          type: 'functionality',
          subtype: 'logging',
          message: `Using ${conventions.consoleOutputLabel} for output, but project uses a logging framework. Consider using the appropriate logging methods.`,
          severity: 'medium',
        });
      }
    }

    if (filePath.toLowerCase().includes('test')) {
      const hasAssertions = outline.calls.some(call => conventions.assertionKey(call) !== null);
      if (!hasAssertions) {
        issues.push({
          type: 'functionality',
          subtype: 'testing',
          message: 'Test file lacks assertions. Consider adding appropriate test assertions.',
          severity: 'high',
        });
      }
    }

    return issues;
  }
}
