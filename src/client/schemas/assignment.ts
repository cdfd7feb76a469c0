/**
 * assignment.ts — Zod schemas for assignments and the approve/reject/bonus payloads.
 *
 * A completed assignment starts out Pending. Pending work can be approved or
 * rejected; a rejected assignment can still be approved later, but an approved
 * one can no longer be rejected. Pending assignments are approved by the
 * server automatically 14 days after completion.
 */

import { z } from 'zod';

export const SubmissionTypeSchema = z.enum(['CompletionCode', 'Redirect']);
export type SubmissionType = z.infer<typeof SubmissionTypeSchema>;

export const AssignmentStatusSchema = z.enum(['Pending', 'Approved', 'Rejected']);
export type AssignmentStatus = z.infer<typeof AssignmentStatusSchema>;

export const CompletionInfoSchema = z.object({
  // Null when the participant completed through the redirect link
  completionCode: z.string().nullish(),
  submissionType: SubmissionTypeSchema,
});

export type CompletionInfo = z.infer<typeof CompletionInfoSchema>;

export const AssignmentSchema = z.object({
  participantId: z.string().nullish(),
  assignmentId: z.string().nullish(),
  startTime: z.string(),
  completionTime: z.string().nullish(),
  status: AssignmentStatusSchema,
  payment: z.number(),
  bonus: z.number(),
  completion: CompletionInfoSchema,
});

export type Assignment = z.infer<typeof AssignmentSchema>;

export const AssignmentResponseSchema = z.object({
  assignments: z.array(AssignmentSchema).nullish(),
});

export type AssignmentResponse = z.infer<typeof AssignmentResponseSchema>;

export const ParticipantSchema = z.object({
  // Participant id or assignment id
  id: z.string().nullish(),
  // Shown to the participant; required by the server when rejecting
  message: z.string().nullish(),
});

export type Participant = z.infer<typeof ParticipantSchema>;

export const BonusPaymentSchema = z.object({
  id: z.string().nullish(),
  message: z.string().nullish(),
  amount: z.number().optional(),
});

export type BonusPayment = z.infer<typeof BonusPaymentSchema>;
