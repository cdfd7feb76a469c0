import got, { type Got, type OptionsInit } from 'got';
import type { HttpMethod } from './types.js';

// Keys the request executor owns; everything else in got's options passes through untouched
type ExecutorOwnedOption =
  | 'method'
  | 'url'
  | 'prefixUrl'
  | 'searchParams'
  | 'isStream'
  | 'resolveBodyOnly'
  | 'responseType'
  | 'throwHttpErrors';

export type TransportOptions = Omit<OptionsInit, ExecutorOwnedOption>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string | string[] | undefined>;
  options: TransportOptions;
}

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Buffer;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface GotTransportOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * GotTransport — the default transport, one got instance per session.
 *
 * HTTP status codes never throw here (throwHttpErrors: false): classifying a
 * response as success or API error is the executor's job. Connection-level
 * failures (RequestError, TimeoutError) are left to propagate as got raises them.
 * Retries are disabled; a failed call is reported once.
 */
export class GotTransport implements Transport {
  private readonly instance: Got;

  constructor(options: GotTransportOptions = {}) {
    this.instance = got.extend({
      headers: {
        'Accept': 'application/json',
        'User-Agent': options.userAgent ?? 'connect-api-client (Node.js)',
      },
      timeout: { request: options.timeoutMs ?? 30_000 },
      retry: { limit: 0 },
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    // got's Response<Buffer> satisfies TransportResponse and is handed back as-is
    return this.instance(request.url, {
      ...request.options,
      method: request.method,
      headers: request.headers,
      isStream: false,
      resolveBodyOnly: false,
      responseType: 'buffer',
      throwHttpErrors: false,
    });
  }
}
