/**
 * PatternExtractor - Derives the three pattern families from an indexed file set.
 *
 * Style works on raw text for every file; naming, imports, error handling and
 * the functional counters need an outline, so files in other languages (or
 * files that fail to parse) simply contribute nothing to those.
 */

import * as path from 'path';
import {
  AnalyzedSource,
  CONSOLE_OUTPUT_KEY,
  SourceAnalyzer,
  assignmentCategory,
  detectIndentation,
  detectNamingConvention,
  importRoot,
  loggingKey,
  measureLineLengths,
  percentile,
} from '../core';
import { errorMessage } from '../errors';
import { Logger } from '../logging';
import {
  ArchitecturePatterns,
  FileRecord,
  FunctionalPatterns,
  ImportCategory,
  IndentationStyle,
  IndexWarning,
  NamingCategory,
  NamingConvention,
  RepositoryPatterns,
  StylePatterns,
} from '../types';
import { Counter } from './Counter';

export const DEFAULT_INDENTATION: IndentationStyle = 'spaces:4';
export const DEFAULT_PREFERRED_MAX = 100;
export const DEFAULT_AVERAGE_LINE_LENGTH = 80;

const TOP_IMPORTS = 10;
const TOP_FUNCTIONS = 20;
const TOP_ARGS = 20;
const IMPORT_CATEGORIES: readonly ImportCategory[] = ['direct', 'from', 'js_imports'];
const NAMING_CATEGORIES: readonly NamingCategory[] = ['variables', 'functions', 'classes', 'constants'];

export interface PatternExtraction {
  patterns: RepositoryPatterns;
  /** Files left out of structural analysis because they did not parse */
  warnings: IndexWarning[];
}

interface OutlinedFile {
  file: FileRecord;
  source: AnalyzedSource;
}

export class PatternExtractor {
  private logger: Logger;

  constructor(
    logger: Logger,
    private analyzer: SourceAnalyzer = new SourceAnalyzer()
  ) {
    this.logger = logger.child('extractor');
  }

  extract(files: readonly FileRecord[]): PatternExtraction {
    const sorted = [...files].sort((a, b) =>
      a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0
    );
    const warnings: IndexWarning[] = [];
    const outlined = this.outline(sorted, warnings);

    this.logger.info(`Extracting patterns from ${sorted.length} files (${outlined.length} outlined)`);
    return {
      patterns: {
        style: this.extractStyle(sorted, outlined),
        architecture: this.extractArchitecture(sorted, outlined),
        functional: this.extractFunctional(outlined),
      },
      warnings,
    };
  }

  private outline(files: FileRecord[], warnings: IndexWarning[]): OutlinedFile[] {
    const outlined: OutlinedFile[] = [];
    for (const file of files) {
      try {
        const source = this.analyzer.analyze(file.content, file.relativePath);
        if (source) outlined.push({ file, source });
      } catch (error) {
        const message = `not analyzed: ${errorMessage(error)}`;
        this.logger.warn(`${file.relativePath}: ${message}`);
        warnings.push({ path: file.relativePath, message });
      }
    }
    return outlined;
  }

  // ==========================================================================
  // STYLE
  // ==========================================================================

  private extractStyle(files: FileRecord[], outlined: OutlinedFile[]): StylePatterns {
    const indentation = new Counter<IndentationStyle>();
    const lengths: number[] = [];

    for (const file of files) {
      const style = detectIndentation(file.content);
      if (style) indentation.add(style);
      lengths.push(...measureLineLengths(file.content));
    }

    const naming: Record<NamingCategory, Counter<NamingConvention>> = {
      variables: new Counter<NamingConvention>(),
      functions: new Counter<NamingConvention>(),
      classes: new Counter<NamingConvention>(),
      constants: new Counter<NamingConvention>(),
    };
    for (const { source } of outlined) {
      for (const name of source.outline.assignments) {
        naming[assignmentCategory(name)].add(detectNamingConvention(name));
      }
      for (const fn of source.outline.functions) {
        naming.functions.add(detectNamingConvention(fn.name));
      }
      for (const name of source.outline.classes) {
        naming.classes.add(detectNamingConvention(name));
      }
    }

    const namingConventions: Record<NamingCategory, NamingConvention | null> = {
      variables: null,
      functions: null,
      classes: null,
      constants: null,
    };
    for (const category of NAMING_CATEGORIES) {
      namingConventions[category] = naming[category].mode() ?? null;
    }

    return {
      indentation: indentation.mode() ?? DEFAULT_INDENTATION,
      line_length: lengths.length === 0
        ? { average: DEFAULT_AVERAGE_LINE_LENGTH, preferred_max: DEFAULT_PREFERRED_MAX }
        : {
            average: Math.floor(lengths.reduce((sum, n) => sum + n, 0) / lengths.length),
            preferred_max: Math.round(percentile(lengths, 95)),
          },
      naming_conventions: namingConventions,
    };
  }

  // ==========================================================================
  // ARCHITECTURE
  // ==========================================================================

  private extractArchitecture(files: FileRecord[], outlined: OutlinedFile[]): ArchitecturePatterns {
    const imports: Record<ImportCategory, Counter> = {
      direct: new Counter(),
      from: new Counter(),
      js_imports: new Counter(),
    };
    const errorHandling = new Counter();

    for (const { source } of outlined) {
      for (const record of source.outline.imports) {
        imports[record.category].add(importRoot(record));
      }
      const { tryBlocks, handledTypes } = source.outline.errorHandling;
      if (tryBlocks > 0) {
        errorHandling.add(source.conventions.tryConstruct, tryBlocks);
      }
      for (const type of handledTypes) {
        errorHandling.add(`except_${type}`);
      }
    }

    const commonImports: Partial<Record<ImportCategory, string[]>> = {};
    for (const category of IMPORT_CATEGORIES) {
      commonImports[category] = imports[category].mostCommon(TOP_IMPORTS).map(([root]) => root);
    }

    const byDirectory = new Map<string, string[]>();
    for (const file of files) {
      const dir = path.posix.dirname(file.relativePath);
      const names = byDirectory.get(dir) ?? [];
      names.push(path.posix.basename(file.relativePath));
      byDirectory.set(dir, names);
    }

    return {
      common_imports: commonImports,
      directory_structure: Object.fromEntries([...byDirectory].filter(([, names]) => names.length > 1)),
      error_handling: errorHandling.toRecord(),
    };
  }

  // ==========================================================================
  // FUNCTIONAL
  // ==========================================================================

  private extractFunctional(outlined: OutlinedFile[]): FunctionalPatterns {
    const functions = new Counter();
    const args = new Counter();
    const logging = new Counter();
    const tests = new Counter();

    for (const { file, source } of outlined) {
      const { outline, conventions } = source;

      for (const fn of outline.functions) {
        functions.add(fn.name);
        args.addAll(fn.params);
      }

      for (const call of outline.calls) {
        if (conventions.isConsoleOutput(call)) {
          logging.add(CONSOLE_OUTPUT_KEY);
          continue;
        }
        const key = loggingKey(call, conventions);
        if (key) logging.add(key);
      }

      const testCalls = file.relativePath.toLowerCase().includes('test')
        ? outline.calls
        : outline.functions
            .filter(fn => fn.name.startsWith(conventions.testFunctionPrefix))
            .flatMap(fn => fn.calls);
      for (const call of testCalls) {
        const key = conventions.assertionKey(call);
        if (key) tests.add(key);
      }
    }

    return {
      common_functions: functions.toRecord(TOP_FUNCTIONS),
      common_args: args.toRecord(TOP_ARGS),
      logging_patterns: logging.toRecord(),
      test_patterns: tests.toRecord(),
    };
  }
}
