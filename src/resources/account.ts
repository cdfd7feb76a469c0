import { get } from '../client/request.js';
import type { AccountInfo } from '../client/schemas/index.js';
import type { CallOptions } from '../client/types.js';

/**
 * getInfo — returns the account's available balance.
 *
 * Throws ApiError (400 bad request, 401 invalid API key).
 */
export function getInfo(options: CallOptions = {}): Promise<AccountInfo> {
  return get<AccountInfo>('/account', options);
}
