/**
 * session.ts — Authenticated sessions and the process-wide default.
 *
 * A Session carries the API key header, the host and API version, the
 * transport and the logger. Callers may thread one explicitly through every
 * call, or register one as the default with createSession().
 *
 * The default is a single module-level reference: registration replaces it
 * outright, last writer wins. Nothing is merged and nothing is torn down.
 */

import { silentLogger, type Logger } from '../logger.js';
import { GotTransport, type Transport } from './transport.js';
import { NoSessionConfiguredError } from './types.js';

export const BASE_URL = 'https://connect-api.cloudresearch.com';
export const DEFAULT_API_VERSION = 'v1';

export interface SessionOptions {
  baseUrl?: string;
  apiVersion?: string;
  // Request timeout for the default got transport; ignored when `transport` is given
  timeoutMs?: number;
  transport?: Transport;
  logger?: Logger;
}

export interface CreateSessionOptions extends SessionOptions {
  setAsDefault?: boolean;
}

export class Session {
  readonly headers: Readonly<Record<string, string>>;
  readonly baseUrl: string;
  readonly apiVersion: string;
  readonly transport: Transport;
  readonly logger: Logger;

  constructor(apiKey: string, options: SessionOptions = {}) {
    this.headers = Object.freeze({ 'X-API-KEY': apiKey });
    this.baseUrl = (options.baseUrl ?? BASE_URL).replace(/\/+$/, '');
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.transport = options.transport ?? new GotTransport({ timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? silentLogger;
  }
}

let currentSession: Session | null = null;

/**
 * createSession — builds a session for an API key and, unless told otherwise,
 * makes it the default used by calls that do not pass one.
 */
export function createSession(apiKey: string, options: CreateSessionOptions = {}): Session {
  const { setAsDefault = true, ...sessionOptions } = options;
  const session = new Session(apiKey, sessionOptions);
  if (setAsDefault) {
    currentSession = session;
  }
  return session;
}

export function getDefaultSession(): Session | null {
  return currentSession;
}

export function clearDefaultSession(): void {
  currentSession = null;
}

export function resolveSession(explicit?: Session): Session {
  const session = explicit ?? currentSession;
  if (!session) {
    throw new NoSessionConfiguredError();
  }
  return session;
}
