/**
 * Error taxonomy for the review engine.
 *
 * Only configuration and resolution errors reach callers as exceptions.
 * Parse errors are caught per file, backend errors degrade to reduced
 * functionality, and missing knowledge becomes a structured review result.
 */

export type ReviewEngineErrorCode =
  | 'CONFIGURATION'
  | 'SOURCE_RESOLUTION'
  | 'SOURCE_PARSE'
  | 'KNOWLEDGE_UNAVAILABLE'
  | 'AI_VALIDATION';

export class ReviewEngineError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewEngineErrorCode
  ) {
    super(message);
    this.name = 'ReviewEngineError';
  }
}

export class ConfigurationError extends ReviewEngineError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class SourceResolutionError extends ReviewEngineError {
  constructor(
    message: string,
    public readonly locator: string
  ) {
    super(message, 'SOURCE_RESOLUTION');
    this.name = 'SourceResolutionError';
  }
}

/**
 * A single file could not be turned into a syntax tree or outline.
 */
export class SourceParseError extends ReviewEngineError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message, 'SOURCE_PARSE');
    this.name = 'SourceParseError';
  }
}

export class KnowledgeUnavailableError extends ReviewEngineError {
  constructor(message: string = 'Knowledge not loaded') {
    super(message, 'KNOWLEDGE_UNAVAILABLE');
    this.name = 'KnowledgeUnavailableError';
  }
}

/**
 * A generation backend answered, but the payload could not be parsed.
 */
export class AIValidationError extends ReviewEngineError {
  constructor(
    message: string,
    public readonly rawResponse: string
  ) {
    super(message, 'AI_VALIDATION');
    this.name = 'AIValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
