/**
 * @studycache/core - Shared types and utilities for the local cache
 *
 * This package contains:
 * - Record schemas (Zod) and their JSON codec
 * - SRS stage rules
 * - Remote gateway and subject catalogue interfaces
 * - Remote error types
 * - Weighted progress reporting
 * - Logging and telemetry
 * - The SQLite database factory
 */

export * from './codec';
export * from './database';
export * from './errors';
export * from './logger';
export * from './progress';
export * from './schemas/records';
export * from './srs';
export * from './telemetry';
export * from './types';
export * from './utils';
