/**
 * Text-level style measurements shared by learning and review.
 * These work on any language; no parsing involved.
 */

import { IndentationStyle } from '../types';

const FIRST_INDENT = /^([ \t]+)(?=\S)/m;

/**
 * Classify the first indented non-blank line, or null when nothing is indented.
 */
export function detectIndentation(content: string): IndentationStyle | null {
  const match = FIRST_INDENT.exec(content);
  if (!match) {
    return null;
  }
  const indent = match[1] ?? '';
  return indent.includes('\t') ? 'tabs' : `spaces:${indent.length}`;
}

/**
 * Lengths of the non-blank, non-comment lines of a file.
 */
export function measureLineLengths(content: string): number[] {
  const lengths: number[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      continue;
    }
    lengths.push(line.length);
  }
  return lengths;
}

/**
 * Linear-interpolation percentile (same definition as numpy's default).
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const low = sorted[lower] ?? 0;
  const high = sorted[upper] ?? low;
  return low + (high - low) * (rank - lower);
}
