/**
 * project.ts — Project lifecycle calls.
 *
 * Projects are created Unpublished. Moving one to Live requires available
 * funds; otherwise the server answers with an insufficient-funds ApiError.
 *
 * Project IDs are URI-encoded into the path.
 */

import { Paginator } from '../client/paginate.js';
import { get, post } from '../client/request.js';
import type {
  FilterQuery,
  ProjectData,
  ProjectResponse,
  ProjectResponseData,
  ProjectStatistics,
  ProjectStatus,
} from '../client/schemas/index.js';
import type { CallOptions, MutationOptions } from '../client/types.js';

function projectPath(projectId: string): string {
  return `/project/${encodeURIComponent(projectId)}`;
}

export function create(data: ProjectData, options: MutationOptions = {}): Promise<ProjectResponse> {
  return post<ProjectResponse>('/project', { ...options, json: data });
}

/**
 * listAll — iterates every project of the account, newest first.
 *
 * Nothing is requested until the paginator is first advanced. Pages are
 * fetched one at a time as iteration reaches them:
 *
 *   for await (const p of project.listAll({ Status: 'Live', Size: 50 })) { ... }
 */
export function listAll(
  query?: FilterQuery | string,
  options: CallOptions = {},
): Paginator<ProjectResponseData> {
  return new Paginator<ProjectResponseData>('/project', {
    ...options,
    query,
    itemsKey: 'projects',
  });
}

export function retrieve(projectId: string, options: CallOptions = {}): Promise<ProjectResponse> {
  return get<ProjectResponse>(projectPath(projectId), options);
}

/**
 * edit — replaces a project's settings.
 *
 * Unpublished projects can be changed freely; Live and Paused projects only
 * accept name, projectUrl, participants (increase only), summary and instructions.
 */
export function edit(
  projectId: string,
  data: ProjectData,
  options: MutationOptions = {},
): Promise<ProjectResponse> {
  return post<ProjectResponse>(projectPath(projectId), { ...options, json: data });
}

export async function updateStatus(
  projectId: string,
  status: ProjectStatus,
  options: MutationOptions = {},
): Promise<void> {
  await post(`${projectPath(projectId)}/update-status`, {
    ...options,
    json: { status },
    decodeAs: 'bytes',
  });
}

export function retrieveStatistics(
  projectId: string,
  options: CallOptions = {},
): Promise<ProjectStatistics> {
  return get<ProjectStatistics>(`${projectPath(projectId)}/statistics`, options);
}
