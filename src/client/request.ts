/**
 * request.ts — Request executor and HTTP verb helpers.
 *
 * Every call resolves a session, builds the endpoint URL, sends exactly one
 * request through the session's transport and then either decodes the body or
 * throws ApiError. NoSessionConfiguredError is raised before anything is sent;
 * transport failures propagate unchanged.
 *
 * decodeAs selects the result:
 *   'json'     (default) parsed body; an empty body yields null
 *   'bytes'    the body as a Buffer
 *   'response' the transport response itself
 */

import { ApiErrorBodySchema } from './schemas/error.js';
import { endpointUrl } from './query.js';
import { resolveSession } from './session.js';
import type { TransportResponse } from './transport.js';
import {
  ApiError,
  type ApiErrorData,
  type DecodeMode,
  type HttpMethod,
  type RequestOptions,
} from './types.js';

type Outcome =
  | { kind: 'success'; response: TransportResponse }
  | { kind: 'failure'; statusCode: number; data: ApiErrorData | null };

function parseJson(body: Buffer): unknown {
  return JSON.parse(body.toString('utf8'));
}

// Lenient: a body that is not JSON, or has no object under `error`, gives null
function decodeErrorData(body: Buffer): ApiErrorData | null {
  let parsed: unknown;
  try {
    parsed = parseJson(body);
  } catch {
    return null;
  }
  const result = ApiErrorBodySchema.safeParse(parsed);
  return result.success ? result.data.error : null;
}

function classify(response: TransportResponse): Outcome {
  if (response.statusCode >= 200 && response.statusCode < 300) {
    return { kind: 'success', response };
  }
  return { kind: 'failure', statusCode: response.statusCode, data: decodeErrorData(response.body) };
}

function decode(response: TransportResponse, mode: DecodeMode): unknown {
  switch (mode) {
    case 'response':
      return response;
    case 'bytes':
      return response.body;
    case 'json':
      return response.body.length === 0 ? null : parseJson(response.body);
  }
}

export function request<T = unknown>(method: HttpMethod, path: string, options?: RequestOptions<'json'>): Promise<T>;
export function request(method: HttpMethod, path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function request(method: HttpMethod, path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
export async function request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
  const session = resolveSession(options.session);
  const url = endpointUrl(path, {
    version: options.version ?? session.apiVersion,
    query: options.query,
    baseUrl: session.baseUrl,
  });

  const transportOptions = { ...options.transport };
  if (options.json !== undefined) {
    transportOptions.json = options.json;
  }

  const headers = {
    ...options.transport?.headers,
    ...session.headers,
    ...(options.idempotencyToken !== undefined ? { 'IDEMPOTENCY-TOKEN': options.idempotencyToken } : {}),
  };

  session.logger.debug('connect.request', { method, url });
  const response = await session.transport.send({ method, url, headers, options: transportOptions });
  const outcome = classify(response);

  switch (outcome.kind) {
    case 'success':
      return decode(outcome.response, options.decodeAs ?? 'json');
    case 'failure':
      session.logger.warn('connect.api_error', {
        method,
        url,
        statusCode: outcome.statusCode,
        title: outcome.data?.title ?? null,
      });
      throw new ApiError(outcome.statusCode, outcome.data);
  }
}

export function get<T = unknown>(path: string, options?: RequestOptions<'json'>): Promise<T>;
export function get(path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function get(path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function get(path: string, options?: RequestOptions): Promise<unknown> {
  return request('GET', path, options);
}

export function post<T = unknown>(path: string, options?: RequestOptions<'json'>): Promise<T>;
export function post(path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function post(path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function post(path: string, options?: RequestOptions): Promise<unknown> {
  return request('POST', path, options);
}

export function put<T = unknown>(path: string, options?: RequestOptions<'json'>): Promise<T>;
export function put(path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function put(path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function put(path: string, options?: RequestOptions): Promise<unknown> {
  return request('PUT', path, options);
}

export function patch<T = unknown>(path: string, options?: RequestOptions<'json'>): Promise<T>;
export function patch(path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function patch(path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function patch(path: string, options?: RequestOptions): Promise<unknown> {
  return request('PATCH', path, options);
}

// `delete` is a reserved word
export function del<T = unknown>(path: string, options?: RequestOptions<'json'>): Promise<T>;
export function del(path: string, options: RequestOptions<'bytes'> & { decodeAs: 'bytes' }): Promise<Buffer>;
export function del(path: string, options: RequestOptions<'response'> & { decodeAs: 'response' }): Promise<TransportResponse>;
export function del(path: string, options?: RequestOptions): Promise<unknown> {
  return request('DELETE', path, options);
}
