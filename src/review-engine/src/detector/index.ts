export { IssueDetector, IssueDetectorOptions, PatternSource, NON_TRIVIAL_BODY_STATEMENTS } from './IssueDetector';
