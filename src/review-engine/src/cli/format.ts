/**
 * Plain-text rendering of review results for the console.
 */

import { LearnResult, ReviewBatch } from '../reviewer';
import { ReviewResponse, isReviewError } from '../types';

const SECTION_TITLE = 'RECOMMENDATIONS';

export function formatReview(review: ReviewResponse): string {
  if (isReviewError(review)) {
    return `${review.file}: ${review.error} [${review.code}]`;
  }

  const lines = [review.file, SECTION_TITLE, '-'.repeat(SECTION_TITLE.length)];
  if (review.recommendations.length === 0) {
    lines.push('No recommendations.');
    return lines.join('\n');
  }

  review.recommendations.forEach((rec, i) => {
    lines.push(`${i + 1}. Type: ${rec.type} (${rec.subtype})`);
    lines.push(`   Message    : ${rec.message}`);
    lines.push(`   Suggestion : ${rec.suggestion}`);
    lines.push(`   Severity   : ${rec.severity}`);
    if (rec.explanation !== undefined) {
      lines.push(`   Explanation: ${rec.explanation}`);
    }
  });
  return lines.join('\n');
}

export function formatReviewBatch(reviews: ReviewBatch): string {
  return Object.values(reviews).map(formatReview).join('\n\n');
}

export function formatLearnResult(result: LearnResult, storagePath: string): string {
  if (!result.success) {
    return `Failed to learn repository: ${result.diagnostic ?? 'patterns could not be stored'}`;
  }
  const index = result.indexStored ? `${result.chunksIndexed} chunks indexed` : 'no similarity index';
  return `Repository learned: ${result.filesIndexed} files, ${index}. Knowledge stored at ${storagePath}`;
}
