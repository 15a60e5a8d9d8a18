/**
 * Naming convention classification.
 *
 * Conventions are tried in a fixed precedence and the first match wins, so
 * an all-caps word such as `FOO` classifies as PascalCase, not
 * UPPER_SNAKE_CASE.
 */

import { NamingCategory, NamingConvention } from '../types';

const CONVENTION_PATTERNS: ReadonlyArray<[Exclude<NamingConvention, 'unknown'>, RegExp]> = [
  ['snake_case', /^[a-z][a-z0-9_]*$/],
  ['camelCase', /^[a-z][a-zA-Z0-9]*$/],
  ['PascalCase', /^[A-Z][a-zA-Z0-9]*$/],
  ['UPPER_SNAKE_CASE', /^[A-Z][A-Z0-9_]*$/],
  ['kebab-case', /^[a-z][a-z0-9-]*$/],
];

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

export function detectNamingConvention(name: string): NamingConvention {
  for (const [convention, pattern] of CONVENTION_PATTERNS) {
    if (pattern.test(name)) {
      return convention;
    }
  }
  return 'unknown';
}

/**
 * Whether a name fits a convention on its own terms, regardless of
 * precedence (`x` fits both snake_case and camelCase). Always false for
 * 'unknown'.
 */
export function matchesConvention(name: string, convention: NamingConvention): boolean {
  const entry = CONVENTION_PATTERNS.find(([candidate]) => candidate === convention);
  return entry !== undefined && entry[1].test(name);
}

/**
 * Category an assignment target is tallied under when learning.
 */
export function assignmentCategory(name: string): Extract<NamingCategory, 'variables' | 'constants'> {
  return CONSTANT_NAME.test(name) ? 'constants' : 'variables';
}
