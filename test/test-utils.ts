import { vi, type Mock } from 'vitest';
import type { Transport, TransportRequest, TransportResponse } from '../src/client/transport.js';

export const API_ROOT = 'https://connect-api.cloudresearch.com/api/v1';

export function jsonResponse(body: unknown, statusCode = 200): TransportResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json' },
    body: Buffer.from(JSON.stringify(body), 'utf8'),
  };
}

export function textResponse(text: string, statusCode: number): TransportResponse {
  return {
    statusCode,
    headers: { 'content-type': 'text/plain' },
    body: Buffer.from(text, 'utf8'),
  };
}

export function emptyResponse(statusCode = 204): TransportResponse {
  return { statusCode, headers: {}, body: Buffer.alloc(0) };
}

export interface FakeTransport extends Transport {
  send: Mock<(request: TransportRequest) => Promise<TransportResponse>>;
  requests(): TransportRequest[];
}

/** In-process transport that answers with the given responses, in order. */
export function createFakeTransport(...responses: TransportResponse[]): FakeTransport {
  const send = vi.fn<(request: TransportRequest) => Promise<TransportResponse>>();
  for (const response of responses) {
    send.mockResolvedValueOnce(response);
  }
  return {
    send,
    requests: () => send.mock.calls.map(([request]) => request),
  };
}
