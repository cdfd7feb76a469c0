/**
 * schemas/index.ts — Re-exports all Connect schemas and TypeScript types.
 */

export { ApiErrorDataSchema, ApiErrorBodySchema } from './error.js';
export type { ApiErrorData, ApiErrorBody } from './error.js';

export { AccountInfoSchema } from './account.js';
export type { AccountInfo } from './account.js';

export {
  SubmissionTypeSchema,
  AssignmentStatusSchema,
  CompletionInfoSchema,
  AssignmentSchema,
  AssignmentResponseSchema,
  ParticipantSchema,
  BonusPaymentSchema,
} from './assignment.js';
export type {
  SubmissionType,
  AssignmentStatus,
  CompletionInfo,
  Assignment,
  AssignmentResponse,
  Participant,
  BonusPayment,
} from './assignment.js';

export {
  RangeSchema,
  DemographicQuotaSchema,
  TargetOptionSchema,
  DemographicRequirementsSchema,
  DemographicTargetingSchema,
  DemographicOptionSchema,
  DemographicsDataSchema,
  DemographicsResponseSchema,
  FeasibilityRequestSchema,
  PlatformSchema,
  FeasibilityResponseSchema,
} from './demographics.js';
export type {
  Range,
  DemographicQuota,
  TargetOption,
  DemographicRequirements,
  DemographicTargeting,
  DemographicOption,
  DemographicsData,
  DemographicsResponse,
  FeasibilityRequest,
  Platform,
  FeasibilityResponse,
} from './demographics.js';

export {
  SystemRequirementSchema,
  DeviceTypeSchema,
  ProjectCompletionTypeSchema,
  CompletionSettingsSchema,
  PlatformTargetingSchema,
  TaskTemplateTypeSchema,
  DataLabelingResponseMethodSchema,
  DataLabelingSettingsSchema,
  TaskTemplateSchema,
  ProjectDataSchema,
  ProjectResponseDataSchema,
  ProjectResponseSchema,
  ProjectStatusSchema,
  FilterQuerySchema,
  ProjectResponsePageSchema,
  ProjectStatisticsSchema,
} from './project.js';
export type {
  SystemRequirement,
  DeviceType,
  ProjectCompletionType,
  CompletionSettings,
  PlatformTargeting,
  TaskTemplateType,
  DataLabelingResponseMethod,
  DataLabelingSettings,
  TaskTemplate,
  ProjectData,
  ProjectResponseData,
  ProjectResponse,
  ProjectStatus,
  FilterQuery,
  ProjectResponsePage,
  ProjectStatistics,
} from './project.js';
