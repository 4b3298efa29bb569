/**
 * @lexigram/types - Type definitions for the Lexigram n-gram toolkit
 */

// Logging
export * from './logging.js';

// N-gram tables and analysis result
export * from './ngrams.js';

// Report shapes and formats
export * from './reports.js';

// Dataset importers
export * from './datasets.js';
