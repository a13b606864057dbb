/**
 * @studycache/client - Offline-first local cache for a spaced-repetition client
 */

export * from '@studycache/core';

export * from './aggregates';
export * from './cached';
export * from './client';
export * from './config';
export * from './error-log';
export * from './errors';
export * from './events';
export * from './fetch';
export * from './migrate';
export * from './pending-progress';
export * from './pending-study-materials';
export * from './queries';
export * from './schema';
