/**
 * @studycache/client - Failure classification
 */

import {
  isRecord,
  RemoteConnectionError,
  RemoteDecodeError,
  RemoteRequestError,
} from '@studycache/core';
import { isUnprocessableError } from './pending-progress';

const CONNECTIVITY_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

const CONNECTIVITY_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

/**
 * A row for the error log. Every column is optional.
 */
export interface ErrorLogEntryInput {
  stack?: string | null;
  code?: number | null;
  description?: string | null;
  requestUrl?: string | null;
  responseUrl?: string | null;
  requestData?: string | null;
  requestHeaders?: string | null;
  responseHeaders?: string | null;
  responseData?: string | null;
}

export type CacheFailure =
  /** Session expired; the host has to sign in again */
  | { kind: 'unauthorized'; error: RemoteRequestError }
  /** The remote service will never accept this request */
  | { kind: 'unprocessable'; error: RemoteRequestError }
  /** Offline, timed out or aborted; nothing worth keeping */
  | { kind: 'connectivity'; error: unknown }
  | { kind: 'remote'; error: RemoteRequestError; entry: ErrorLogEntryInput }
  | { kind: 'decode'; error: RemoteDecodeError; entry: ErrorLogEntryInput }
  | { kind: 'unknown'; error: unknown; entry: ErrorLogEntryInput };

function isConnectivityShape(error: unknown): boolean {
  if (error instanceof RemoteConnectionError) return true;
  if (!isRecord(error)) return false;
  if (typeof error.name === 'string' && CONNECTIVITY_ERROR_NAMES.has(error.name)) {
    return true;
  }
  return typeof error.code === 'string' && CONNECTIVITY_ERROR_CODES.has(error.code);
}

export function isConnectivityError(error: unknown): boolean {
  if (isConnectivityShape(error)) return true;
  return error instanceof Error && isConnectivityShape(error.cause);
}

function formatHeaders(headers: Record<string, string> | undefined): string | null {
  return headers ? JSON.stringify(headers) : null;
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

export function classifyCacheFailure(error: unknown): CacheFailure {
  if (error instanceof RemoteRequestError) {
    if (error.status === 401) return { kind: 'unauthorized', error };
    if (isUnprocessableError(error)) return { kind: 'unprocessable', error };
    return {
      kind: 'remote',
      error,
      entry: {
        stack: error.stack ?? null,
        code: error.status,
        description: describe(error),
        requestUrl: error.request?.url ?? null,
        responseUrl: error.response?.url ?? null,
        requestData: error.request?.body ?? null,
        requestHeaders: formatHeaders(error.request?.headers),
        responseHeaders: formatHeaders(error.response?.headers),
      },
    };
  }

  if (isConnectivityError(error)) {
    return { kind: 'connectivity', error };
  }

  if (error instanceof RemoteDecodeError) {
    return {
      kind: 'decode',
      error,
      entry: {
        stack: error.stack ?? null,
        code: error.response?.status ?? null,
        description: describe(error),
        requestUrl: error.request?.url ?? null,
        responseUrl: error.response?.url ?? null,
        requestData: error.request?.body ?? null,
        requestHeaders: formatHeaders(error.request?.headers),
        responseHeaders: formatHeaders(error.response?.headers),
        responseData: error.body ?? null,
      },
    };
  }

  return {
    kind: 'unknown',
    error,
    entry: {
      stack: error instanceof Error ? (error.stack ?? null) : null,
      description: describe(error),
    },
  };
}
