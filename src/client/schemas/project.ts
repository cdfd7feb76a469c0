/**
 * project.ts — Zod schemas for Connect projects.
 *
 * Status transitions enforced by the server:
 *   Unpublished → Live | Archived
 *   Live        → Paused
 *   Paused      → Live | Closed
 *   Completed is set automatically once every spot is filled.
 *
 * Once a project is Live or Paused only name, projectUrl, participants
 * (increase only), summary and instructions can be edited.
 */

import { z } from 'zod';
import { DemographicTargetingSchema } from './demographics.js';

export const SystemRequirementSchema = z.enum([
  'Audio',
  'Camera',
  'Microphone',
  'DownloadSoftware',
  'Writing',
]);
export type SystemRequirement = z.infer<typeof SystemRequirementSchema>;

export const DeviceTypeSchema = z.enum(['Desktop', 'Tablet', 'Mobile']);
export type DeviceType = z.infer<typeof DeviceTypeSchema>;

export const ProjectCompletionTypeSchema = z.enum(['RedirectUrl', 'CompletionCode', 'Template']);
export type ProjectCompletionType = z.infer<typeof ProjectCompletionTypeSchema>;

export const CompletionSettingsSchema = z.object({
  value: z.string().nullish(),
  projectCompletionType: ProjectCompletionTypeSchema.optional(),
});

export type CompletionSettings = z.infer<typeof CompletionSettingsSchema>;

export const PlatformTargetingSchema = z.object({
  participants: z
    .object({
      includedParticipants: z.array(z.string()).optional(),
      excludedParticipants: z.array(z.string()).optional(),
    })
    .nullish(),
  projects: z
    .object({
      includedProjects: z.array(z.string()).optional(),
      excludedProjects: z.array(z.string()).optional(),
    })
    .nullish(),
});

export type PlatformTargeting = z.infer<typeof PlatformTargetingSchema>;

export const TaskTemplateTypeSchema = z.enum(['DataLabeling', 'CustomHtml']);
export type TaskTemplateType = z.infer<typeof TaskTemplateTypeSchema>;

export const DataLabelingResponseMethodSchema = z.enum(['TypedResponse', 'SelectOne', 'SelectAll']);
export type DataLabelingResponseMethod = z.infer<typeof DataLabelingResponseMethodSchema>;

export const DataLabelingSettingsSchema = z.object({
  // 1-500 characters
  prompt: z.string(),
  dataLabelingResponseMethod: DataLabelingResponseMethodSchema,
  // Only valid for SelectOne and SelectAll
  dataLabelingSelectOptions: z.array(z.object({ text: z.string().nullish() })),
});

export type DataLabelingSettings = z.infer<typeof DataLabelingSettingsSchema>;

export const TaskTemplateSchema = z.object({
  taskTemplateType: TaskTemplateTypeSchema,
  // Unique, one per cell in each data row
  headers: z.array(z.string()),
  data: z.array(
    z.object({
      cells: z.array(z.object({ value: z.string().nullish() })).nullish(),
    }),
  ),
  settings: z.object({
    // CustomHtml templates only
    htmlTemplateMarkup: z.string().nullish(),
    // DataLabeling templates only
    dataLabelingSettings: DataLabelingSettingsSchema.nullish(),
  }),
});

export type TaskTemplate = z.infer<typeof TaskTemplateSchema>;

export const ProjectDataSchema = z.object({
  name: z.string(),
  projectUrl: z.string().nullish(),
  payment: z.number(),
  estimatedTimeInMinutes: z.number().int(),
  participants: z.number().int(),
  summary: z.string().nullish(),
  // HTML shown before the project starts
  instructions: z.string().nullish(),
  // Never shown to participants
  internalName: z.string().nullish(),
  systemRequirements: z.array(SystemRequirementSchema).nullish(),
  hasSensitiveContent: z.boolean().optional(),
  // Empty allows every device
  deviceRequirements: z.array(DeviceTypeSchema).nullish(),
  completionSettings: CompletionSettingsSchema.optional(),
  // Must exceed estimatedTimeInMinutes; null lets the server pick
  maxTimeInMinutes: z.number().int().nullish(),
  demographicTargeting: DemographicTargetingSchema.nullish(),
  platformTargeting: PlatformTargetingSchema.nullish(),
  taskTemplate: TaskTemplateSchema.nullish(),
});

export type ProjectData = z.infer<typeof ProjectDataSchema>;

export const ProjectResponseDataSchema = ProjectDataSchema.extend({
  projectId: z.string().nullish(),
  // Includes Connect fees
  totalCost: z.number(),
  // UTC
  createdAt: z.string(),
});

export type ProjectResponseData = z.infer<typeof ProjectResponseDataSchema>;

export const ProjectResponseSchema = z.object({
  project: ProjectResponseDataSchema.nullish(),
});

export type ProjectResponse = z.infer<typeof ProjectResponseSchema>;

export const ProjectStatusSchema = z.enum([
  'Unpublished',
  'Paused',
  'Live',
  'Closed',
  'Completed',
  'Archived',
]);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

export const FilterQuerySchema = z.object({
  Status: ProjectStatusSchema.optional(),
  // Default 10, max 100
  Size: z.number().int().min(1).max(100).optional(),
  // Tokens expire after an hour
  NextToken: z.string().optional(),
});

export type FilterQuery = z.infer<typeof FilterQuerySchema>;

export const ProjectResponsePageSchema = z.object({
  projects: z.array(ProjectResponseDataSchema).nullish(),
  nextToken: z.string().nullish(),
});

export type ProjectResponsePage = z.infer<typeof ProjectResponsePageSchema>;

export const ProjectStatisticsSchema = z.object({
  projectId: z.string().nullish(),
  // Not yet approved or rejected
  pendingAssignments: z.number().int(),
  // Approved or rejected
  completedAssignments: z.number().int(),
  inProgress: z.number().int(),
  approvedAssignments: z.number().int(),
  completionRate: z.number(),
  bounceRate: z.number(),
  // Minutes
  averageDuration: z.number(),
  medianDuration: z.number(),
});

export type ProjectStatistics = z.infer<typeof ProjectStatisticsSchema>;
