/**
 * @studycache/migrations - Versioned migration system
 *
 * Provides migration definition, version tracking, and execution.
 */

export * from './define';
export * from './runner';
export * from './tracking';
export * from './types';
