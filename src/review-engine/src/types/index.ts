/**
 * Core types for the review engine.
 *
 * The engine learns repository conventions in three pattern families
 * (style, architecture, functional), persists them next to a similarity
 * index over code chunks, and reviews candidate code against both:
 *   - learn:  resolve -> index -> extract -> store
 *   - review: load -> detect -> synthesize -> ranked recommendations
 */

// ============================================================================
// INDEXED FILES
// ============================================================================

/** One source file read during indexing. Never persisted individually. */
export interface FileRecord {
  /** Path relative to the repository root, always with forward slashes */
  readonly relativePath: string;
  readonly content: string;
  /** Lower-cased extension including the dot (e.g. '.py') */
  readonly extension: string;
}

export interface IndexWarning {
  path: string;
  message: string;
}

export interface IndexResult {
  /** Indexed files ordered by relative path */
  files: FileRecord[];
  /** Files that could not be read or were skipped */
  warnings: IndexWarning[];
  /** Set when no file matched, explains the active filters */
  diagnostic?: string;
}

// ============================================================================
// PATTERN FAMILIES
// ============================================================================

export type NamingConvention =
  | 'snake_case'
  | 'camelCase'
  | 'PascalCase'
  | 'UPPER_SNAKE_CASE'
  | 'kebab-case'
  | 'unknown';

export type NamingCategory = 'variables' | 'functions' | 'classes' | 'constants';

/** 'tabs' or 'spaces:<count>' */
export type IndentationStyle = 'tabs' | `spaces:${number}`;

export interface LineLengthPatterns {
  average: number;
  preferred_max: number;
}

export interface StylePatterns {
  indentation: IndentationStyle;
  line_length: LineLengthPatterns;
  naming_conventions: Record<NamingCategory, NamingConvention | null>;
}

/** direct: `import a.b`, from: `from a.b import c`, js_imports: ES module / require specifiers */
export type ImportCategory = 'direct' | 'from' | 'js_imports';

export interface ArchitecturePatterns {
  /** Top 10 root identifiers per category, most frequent first */
  common_imports: Partial<Record<ImportCategory, string[]>>;
  /** Parent directory -> file names, only for directories holding more than one file */
  directory_structure: Record<string, string[]>;
  /** Construct name (try_except, try_catch, except_<Type>) -> count */
  error_handling: Record<string, number>;
}

export interface FunctionalPatterns {
  common_functions: Record<string, number>;
  common_args: Record<string, number>;
  logging_patterns: Record<string, number>;
  test_patterns: Record<string, number>;
}

/** Freshly extracted patterns: every family and every field present */
export interface RepositoryPatterns {
  style: StylePatterns;
  architecture: ArchitecturePatterns;
  functional: FunctionalPatterns;
}

/**
 * Patterns as the detector sees them. A loaded document may be missing whole
 * families or individual fields; every check skips what is absent.
 */
export interface StoredPatterns {
  style?: Partial<Pick<StylePatterns, 'indentation'>> & {
    line_length?: Partial<LineLengthPatterns>;
    naming_conventions?: Partial<Record<NamingCategory, NamingConvention | null>>;
  };
  architecture?: Partial<ArchitecturePatterns>;
  functional?: Partial<FunctionalPatterns>;
}

// ============================================================================
// ISSUES AND RECOMMENDATIONS
// ============================================================================

export type IssueType = 'style' | 'architecture' | 'functionality';

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

export interface Issue {
  type: IssueType;
  subtype: string;
  message: string;
  severity: Severity;
}

export interface IssuesByCategory {
  style: Issue[];
  architecture: Issue[];
  functionality: Issue[];
}

export interface SimilarCodeResult {
  content: string;
  file: string;
  chunk: number;
  similarity: number;
}

/** Output of one detector run over one candidate file */
export interface CodeAnalysis {
  issues: IssuesByCategory;
  similarCode: SimilarCodeResult[];
  /** Unified diff, present only on the diff-review path */
  diff?: string;
}

/**
 * Deterministic recommendations carry an IssueType; generated ones carry
 * whatever category the backend chose (usually 'llm').
 */
export interface Recommendation {
  type: string;
  subtype: string;
  message: string;
  suggestion: string;
  severity: Severity;
  /** Only present on generated recommendations */
  explanation?: string;
}

/** The review result document consumed by reporting and comment-posting integrations */
export interface ReviewResult {
  file: string;
  recommendations: Recommendation[];
}

export type ReviewErrorCode = 'KNOWLEDGE_UNAVAILABLE' | 'FILE_UNREADABLE';

export interface ReviewError {
  file: string;
  error: string;
  code: ReviewErrorCode;
}

export type ReviewResponse = ReviewResult | ReviewError;

export function isReviewError(response: ReviewResponse): response is ReviewError {
  return 'error' in response;
}
