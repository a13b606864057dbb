/**
 * @studycache/core - Error types raised across the remote boundary
 *
 * Remote gateways throw these so the cache can tell an expired session from a
 * dropped connection from a malformed response.
 */

/**
 * What was sent, as far as the gateway chose to report it.
 */
export interface RemoteRequestInfo {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string | null;
}

/**
 * What came back, without the body.
 */
export interface RemoteResponseInfo {
  url: string;
  status: number;
  headers?: Record<string, string>;
}

/**
 * The remote service answered with a non-success status code.
 */
export class RemoteRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly request?: RemoteRequestInfo,
    public readonly response?: RemoteResponseInfo
  ) {
    super(message);
    this.name = 'RemoteRequestError';
  }
}

/**
 * The remote service answered, but the body could not be decoded.
 */
export class RemoteDecodeError extends Error {
  constructor(
    message: string,
    public readonly request?: RemoteRequestInfo,
    public readonly response?: RemoteResponseInfo,
    public readonly body?: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteDecodeError';
  }
}

export type RemoteConnectionFailure = 'offline' | 'timeout' | 'aborted';

/**
 * The request never completed: no network, a timeout, or an aborted
 * connection.
 */
export class RemoteConnectionError extends Error {
  constructor(
    message: string,
    public readonly reason: RemoteConnectionFailure,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteConnectionError';
  }
}

/**
 * A stored row did not parse back into its record type.
 */
export class RecordDecodeError extends Error {
  constructor(
    message: string,
    public readonly table: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecordDecodeError';
  }
}
