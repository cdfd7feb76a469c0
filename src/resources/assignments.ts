/**
 * assignments.ts — Assignment review for a project.
 *
 * Rejecting an assignment credits the account with the payment plus the
 * associated fees. Bonuses need enough balance for the total plus fees;
 * with insufficient funds no bonus in the batch is paid.
 *
 * The mutating calls answer with an empty body, so they read the response as
 * bytes and resolve to void.
 *
 * Project IDs are URI-encoded into the path.
 */

import { get, post } from '../client/request.js';
import type { AssignmentResponse, BonusPayment, Participant } from '../client/schemas/index.js';
import type { CallOptions, MutationOptions } from '../client/types.js';

function assignmentsPath(projectId: string): string {
  return `/assignments/${encodeURIComponent(projectId)}`;
}

export function listAll(projectId: string, options: CallOptions = {}): Promise<AssignmentResponse> {
  return get<AssignmentResponse>(assignmentsPath(projectId), options);
}

export async function approve(
  projectId: string,
  participants: Participant[],
  options: MutationOptions = {},
): Promise<void> {
  await post(`${assignmentsPath(projectId)}/approve`, {
    ...options,
    json: { participants },
    decodeAs: 'bytes',
  });
}

/** approveAll — approves every pending assignment; `message` defaults to an empty string. */
export async function approveAll(
  projectId: string,
  message?: string,
  options: MutationOptions = {},
): Promise<void> {
  await post(`${assignmentsPath(projectId)}/approve-all`, {
    ...options,
    json: { message: message ?? '' },
    decodeAs: 'bytes',
  });
}

/** reject — every participant entry should carry a message explaining the rejection. */
export async function reject(
  projectId: string,
  participants: Participant[],
  options: MutationOptions = {},
): Promise<void> {
  await post(`${assignmentsPath(projectId)}/reject`, {
    ...options,
    json: { participants },
    decodeAs: 'bytes',
  });
}

export async function bonus(
  projectId: string,
  bonusPayments: BonusPayment[],
  options: MutationOptions = {},
): Promise<void> {
  await post(`${assignmentsPath(projectId)}/bonus`, {
    ...options,
    json: { bonusPayment: bonusPayments },
    decodeAs: 'bytes',
  });
}

/**
 * reverseRejections — approves previously rejected assignments.
 *
 * The account must hold enough balance to pay the participants.
 */
export async function reverseRejections(
  projectId: string,
  participants: Participant[],
  options: MutationOptions = {},
): Promise<void> {
  await post(`${assignmentsPath(projectId)}/reverse-reject`, {
    ...options,
    json: { participants },
    decodeAs: 'bytes',
  });
}
