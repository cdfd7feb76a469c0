/**
 * Typed client for the CloudResearch Connect API.
 *
 *   import { createSession, account, project } from 'connect-api-client';
 *
 *   createSession(process.env.CONNECT_API_KEY ?? '');
 *   const { accountBalance } = await account.getInfo();
 *   for await (const p of project.listAll({ Status: 'Live' })) console.log(p.name);
 */

export {
  Session,
  createSession,
  resolveSession,
  getDefaultSession,
  clearDefaultSession,
  BASE_URL,
  DEFAULT_API_VERSION,
} from './client/session.js';
export type { SessionOptions, CreateSessionOptions } from './client/session.js';

export { request, get, post, put, patch, del } from './client/request.js';
export { Paginator, NEXT_TOKEN_PARAM } from './client/paginate.js';
export type { PageBody, PaginatorOptions } from './client/paginate.js';
export { toQueryString, parseQueryString, endpointUrl } from './client/query.js';
export type { EndpointUrlOptions } from './client/query.js';
export { GotTransport } from './client/transport.js';
export type {
  Transport,
  TransportOptions,
  TransportRequest,
  TransportResponse,
  GotTransportOptions,
} from './client/transport.js';

export {
  ConnectError,
  NoSessionConfiguredError,
  ConfigError,
  ApiError,
} from './client/types.js';
export type {
  ConnectErrorCode,
  HttpMethod,
  DecodeMode,
  Query,
  QueryMapping,
  QueryValue,
  CallOptions,
  MutationOptions,
  RequestOptions,
} from './client/types.js';

export { loadConfig, createSessionFromEnv } from './config.js';
export type { ConnectConfig, SessionFromEnvOptions } from './config.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';

export * from './client/schemas/index.js';

export * as account from './resources/account.js';
export * as assignments from './resources/assignments.js';
export * as demographics from './resources/demographics.js';
export * as project from './resources/project.js';
