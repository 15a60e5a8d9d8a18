/**
 * PatternDocument - The persisted, diffable form of learned patterns.
 *
 * Written as YAML in extraction order, so count records stay most-frequent
 * first. Reading validates family by family and field by field: anything
 * that does not validate is dropped with a warning and the remaining
 * patterns still load.
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import { IndentationStyle, RepositoryPatterns, StoredPatterns } from '../types';

export const PATTERN_DOCUMENT_VERSION = 1;

export interface ParsedPatternDocument {
  patterns: StoredPatterns;
  warnings: string[];
}

export function serializePatterns(patterns: RepositoryPatterns): string {
  return yaml.dump(
    { version: PATTERN_DOCUMENT_VERSION, patterns },
    { lineWidth: -1, noRefs: true }
  );
}

const indentationSchema = z.custom<IndentationStyle>(
  value => typeof value === 'string' && /^(?:tabs|spaces:\d+)$/.test(value),
  { message: "expected 'tabs' or 'spaces:<n>'" }
);

const conventionSchema = z
  .enum(['snake_case', 'camelCase', 'PascalCase', 'UPPER_SNAKE_CASE', 'kebab-case', 'unknown'])
  .nullable();

const countsSchema = z.record(z.number());

// Parsed objects take the schema's field order, which must match the
// extractor's output order for a reload to reproduce learned patterns exactly.
function buildSchema(warnings: string[]) {
  // Invalid values become undefined and are reported instead of failing the document
  const lenient = <T extends z.ZodTypeAny>(schema: T, label: string) =>
    schema.optional().catch(ctx => {
      warnings.push(`Dropped ${label}: ${ctx.error.issues[0]?.message ?? 'invalid value'}`);
      return undefined;
    });

  const style = z.object({
    indentation: lenient(indentationSchema, 'style.indentation'),
    line_length: lenient(
      z.object({
        average: lenient(z.number(), 'style.line_length.average'),
        preferred_max: lenient(z.number(), 'style.line_length.preferred_max'),
      }),
      'style.line_length'
    ),
    naming_conventions: lenient(
      z.object({
        variables: lenient(conventionSchema, 'style.naming_conventions.variables'),
        functions: lenient(conventionSchema, 'style.naming_conventions.functions'),
        classes: lenient(conventionSchema, 'style.naming_conventions.classes'),
        constants: lenient(conventionSchema, 'style.naming_conventions.constants'),
      }),
      'style.naming_conventions'
    ),
  });

  const architecture = z.object({
    common_imports: lenient(
      z.object({
        direct: lenient(z.array(z.string()), 'architecture.common_imports.direct'),
        from: lenient(z.array(z.string()), 'architecture.common_imports.from'),
        js_imports: lenient(z.array(z.string()), 'architecture.common_imports.js_imports'),
      }),
      'architecture.common_imports'
    ),
    directory_structure: lenient(z.record(z.array(z.string())), 'architecture.directory_structure'),
    error_handling: lenient(countsSchema, 'architecture.error_handling'),
  });

  const functional = z.object({
    common_functions: lenient(countsSchema, 'functional.common_functions'),
    common_args: lenient(countsSchema, 'functional.common_args'),
    logging_patterns: lenient(countsSchema, 'functional.logging_patterns'),
    test_patterns: lenient(countsSchema, 'functional.test_patterns'),
  });

  return z.object({
    version: z.literal(PATTERN_DOCUMENT_VERSION),
    patterns: z.object({
      style: lenient(style, 'style'),
      architecture: lenient(architecture, 'architecture'),
      functional: lenient(functional, 'functional'),
    }),
  });
}

/**
 * Parse and validate pattern document text. Throws when the text is not
 * YAML, not a mapping, or carries no `patterns` mapping of a known version.
 */
export function parsePatternDocument(text: string): ParsedPatternDocument {
  const warnings: string[] = [];
  const parsed = buildSchema(warnings).safeParse(yaml.load(text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid pattern document at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`
    );
  }
  return { patterns: parsed.data.patterns, warnings };
}
