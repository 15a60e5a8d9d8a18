/**
 * @codebase-review/engine
 *
 * Learns the conventions of a codebase and reviews new code against them.
 *
 * learn:  resolve -> index -> extract patterns -> store (patterns + similarity index)
 * review: detect issues -> synthesize ranked recommendations (optionally generative)
 */

// Core types
export * from './types';
export * from './errors';

// Configuration and logging
export * from './config';
export * from './logging';

// Pipeline stages
export * from './core';
export * from './resolver';
export * from './indexer';
export * from './extractors';
export * from './store';
export * from './detector';
export * from './recommend';

// Backends
export * from './ai';

// Facade
export * from './reviewer';
export { formatReview, formatReviewBatch, formatLearnResult } from './cli/format';
