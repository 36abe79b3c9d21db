/**
 * Core pipeline: traversal, content filtering, reporting, archiving, cleanup
 * and token frequency counting.
 */

export * from './types';
export * from './errors';
export * from './paths';
export * from './PathSetBuilder';
export * from './ContentFilter';
export * from './Reporter';
export * from './Archiver';
export * from './Cleaner';
export * from './TokenCounter';
