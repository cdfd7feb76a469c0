import type { ApiErrorData } from './schemas/error.js';
import type { Session } from './session.js';
import type { TransportOptions } from './transport.js';

export type { ApiErrorData };

export type ConnectErrorCode = 'NO_SESSION_CONFIGURED' | 'INVALID_CONFIG' | 'API_ERROR';

// Base class for every error this library raises itself. Transport failures from got are not wrapped.
export class ConnectError extends Error {
  readonly code: ConnectErrorCode;
  constructor(code: ConnectErrorCode, message: string) {
    super(message);
    this.name = 'ConnectError';
    this.code = code;
  }
}

// Thrown before any network activity when no session was passed and none was registered
export class NoSessionConfiguredError extends ConnectError {
  constructor() {
    super(
      'NO_SESSION_CONFIGURED',
      'No session has been supplied. Call createSession() or pass a Session explicitly.',
    );
    this.name = 'NoSessionConfiguredError';
  }
}

// Thrown when environment configuration is missing or malformed
export class ConfigError extends ConnectError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid Connect configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * ApiError — any non-2xx response from the Connect API.
 *
 * `data` carries the decoded `error` object of the response body, or null when
 * the body had no usable `error` field.
 */
export class ApiError extends ConnectError {
  readonly statusCode: number;
  readonly data: ApiErrorData | null;
  constructor(statusCode: number, data: ApiErrorData | null) {
    const summary = data?.title ?? data?.detail ?? 'no error details';
    super('API_ERROR', `Connect API responded with ${statusCode}: ${summary}`);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.data = data;
  }
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type DecodeMode = 'json' | 'bytes' | 'response';

// A query value may nest arbitrarily deep; nested keys are rendered in bracket notation
export type QueryValue = string | number | boolean | null | undefined | QueryMapping;

export type QueryMapping =
  | { readonly [key: string]: QueryValue }
  | ReadonlyMap<string, QueryValue>;

export type Query = string | QueryMapping;

// Options accepted by every resource call
export interface CallOptions {
  // Falls back to the registered default session when omitted
  session?: Session;
  // Extra got options forwarded verbatim (signal, timeout, headers, hooks, ...)
  transport?: TransportOptions;
}

// Options accepted by every mutating resource call
export interface MutationOptions extends CallOptions {
  idempotencyToken?: string;
}

export interface RequestOptions<M extends DecodeMode = DecodeMode> extends MutationOptions {
  query?: Query;
  // Request body, serialized as JSON
  json?: unknown;
  // API version segment; defaults to the session's version
  version?: string;
  decodeAs?: M;
}
