/**
 * RecommendationSynthesizer - Turns detected issues into a ranked recommendation list.
 *
 * Deterministic issues get a suggestion from a fixed table. When a generation
 * backend is available and the analysis carries a diff, one extra request
 * asks for free-form recommendations; its answer is untrusted and validated
 * entry by entry. The merged list is stably sorted high, medium, low, then
 * everything else.
 */

import { z } from 'zod';
import { GenerationBackend } from '../ai';
import { AIValidationError, errorMessage } from '../errors';
import { Logger } from '../logging';
import { CodeAnalysis, IssueType, Recommendation, ReviewResult, SEVERITIES, Severity } from '../types';
import { REVIEW_SYSTEM_PROMPT, buildReviewPrompt } from './prompts';
import { suggestionFor } from './suggestions';

const SEVERITY_RANK: Partial<Record<Severity, number>> = { high: 0, medium: 1, low: 2 };
const UNRANKED = 3;

const ISSUE_TYPES: readonly IssueType[] = ['style', 'architecture', 'functionality'];

const nonEmpty = z.string().trim().min(1);

const generatedRecommendationSchema = z.object({
  type: nonEmpty,
  subtype: nonEmpty,
  message: nonEmpty,
  explanation: nonEmpty,
  suggestion: nonEmpty,
  severity: z.enum(['critical', 'high', 'medium', 'low', 'info']),
});

export interface GeneratedRecommendations {
  recommendations: Recommendation[];
  warnings: string[];
}

export function severityRank(severity: string): number {
  return SEVERITY_RANK[SEVERITIES.find(s => s === severity) ?? 'info'] ?? UNRANKED;
}

/**
 * Stable sort by severity: high, medium, low, then critical and info in
 * their original order.
 */
export function sortBySeverity(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort((a, b) => severityRank(a.severity) - severityRank(b.severity));
}

/**
 * Pull a JSON payload out of a completion that may wrap it in a code fence.
 */
function unwrapFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  return (fenced?.[1] ?? text).trim();
}

/**
 * Parse a generation response into recommendations. Throws AIValidationError
 * when the payload is not a JSON array; invalid entries are dropped.
 */
export function parseGeneratedRecommendations(text: string): GeneratedRecommendations {
  let payload: unknown;
  try {
    payload = JSON.parse(unwrapFence(text));
  } catch (error) {
    throw new AIValidationError(`Response is not JSON: ${errorMessage(error)}`, text);
  }
  if (!Array.isArray(payload)) {
    throw new AIValidationError('Response is not a JSON array', text);
  }

  const recommendations: Recommendation[] = [];
  const warnings: string[] = [];
  payload.forEach((entry: unknown, i) => {
    const parsed = generatedRecommendationSchema.safeParse(entry);
    if (parsed.success) {
      recommendations.push(parsed.data);
    } else {
      const issue = parsed.error.issues[0];
      warnings.push(`Dropped generated recommendation ${i}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
    }
  });
  return { recommendations, warnings };
}

export class RecommendationSynthesizer {
  private logger: Logger;

  constructor(
    private generation: GenerationBackend,
    logger: Logger
  ) {
    this.logger = logger.child('synthesizer');
  }

  async synthesize(filePath: string, analysis: CodeAnalysis): Promise<ReviewResult> {
    const recommendations: Recommendation[] = [];

    for (const type of ISSUE_TYPES) {
      for (const issue of analysis.issues[type]) {
        recommendations.push({
          type: issue.type,
          subtype: issue.subtype,
          message: issue.message,
          suggestion: suggestionFor(issue.type, issue.subtype),
          severity: issue.severity,
        });
      }
    }

    if (this.generation.available && analysis.diff) {
      recommendations.push(...(await this.generate(filePath, analysis)));
    }

    return { file: filePath, recommendations: sortBySeverity(recommendations) };
  }

  private async generate(filePath: string, analysis: CodeAnalysis): Promise<Recommendation[]> {
    this.logger.info(`Requesting generated recommendations for ${filePath}`);
    try {
      const text = await this.generation.complete(
        REVIEW_SYSTEM_PROMPT,
        buildReviewPrompt(filePath, analysis.diff ?? '', analysis.similarCode)
      );
      const { recommendations, warnings } = parseGeneratedRecommendations(text);
      for (const warning of warnings) {
        this.logger.warn(warning);
      }
      return recommendations;
    } catch (error) {
      this.logger.warn(`Generated recommendations discarded: ${errorMessage(error)}`);
      return [];
    }
  }
}
