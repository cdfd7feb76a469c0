import { get, post } from '../client/request.js';
import type {
  DemographicsResponse,
  FeasibilityRequest,
  FeasibilityResponse,
} from '../client/schemas/index.js';
import type { CallOptions, MutationOptions } from '../client/types.js';

// Demographics available as targeting criteria
export function listAll(options: CallOptions = {}): Promise<DemographicsResponse> {
  return get<DemographicsResponse>('/demographics/list', options);
}

export function calcFeasibility(
  data: FeasibilityRequest,
  options: MutationOptions = {},
): Promise<FeasibilityResponse> {
  return post<FeasibilityResponse>('/demographics/feasibility', { ...options, json: data });
}
