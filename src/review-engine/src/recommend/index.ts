export {
  RecommendationSynthesizer,
  GeneratedRecommendations,
  parseGeneratedRecommendations,
  sortBySeverity,
  severityRank,
} from './RecommendationSynthesizer';
export { suggestionFor, FALLBACK_SUGGESTION } from './suggestions';
export { buildReviewPrompt, REVIEW_SYSTEM_PROMPT, MAX_PROMPT_EXAMPLES } from './prompts';
