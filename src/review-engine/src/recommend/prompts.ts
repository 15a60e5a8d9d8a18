import { SimilarCodeResult } from '../types';

/** Similar-code excerpts included in a generation request */
export const MAX_PROMPT_EXAMPLES = 3;

export const REVIEW_SYSTEM_PROMPT =
  'You are a senior software engineer performing a detailed code review. ' +
  'Your reviews are specific, educational and actionable. Respond with JSON only.';

export function buildReviewPrompt(filePath: string, diff: string, similarCode: readonly SimilarCodeResult[]): string {
  const examples = similarCode
    .slice(0, MAX_PROMPT_EXAMPLES)
    .map((code, i) => `Example ${i + 1} from ${code.file}:\n\`\`\`\n${code.content}\n\`\`\``)
    .join('\n\n');

  return `Review the following change to ${filePath}:

\`\`\`diff
${diff}
\`\`\`

${examples ? `Similar code in the repository:\n\n${examples}\n\n` : ''}Look for readability, performance, security, bug risks and maintainability problems.
For each problem, point at the lines involved, explain why it matters and propose a concrete fix.

Answer with a JSON array only, one object per recommendation:
[
  {
    "type": "llm",
    "subtype": "short_category",
    "message": "What is wrong, with line numbers",
    "explanation": "Why it matters",
    "suggestion": "How to fix it",
    "severity": "high" | "medium" | "low"
  }
]`;
}
