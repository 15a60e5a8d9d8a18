export {
  CodeReviewer,
  CodeReviewerDependencies,
  LearnResult,
  ReviewBatch,
  ReviewDirectoryOptions,
  DIFF_CONTEXT_LINES,
} from './CodeReviewer';
