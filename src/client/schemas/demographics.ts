/**
 * demographics.ts — Zod schemas for demographic targeting and feasibility.
 *
 * `locations` and `languages` take the codes listed in the Connect API's
 * supported-locations and supported-languages tables (e.g. "us", "en").
 */

import { z } from 'zod';

export const RangeSchema = z.object({
  lower: z.number().int(),
  // Inclusive
  upper: z.number().int(),
});

export type Range = z.infer<typeof RangeSchema>;

export const DemographicQuotaSchema = z.object({
  demographicId: z.string().nullish(),
  // Required for single and multiple choice questions
  demographicOptionIds: z.array(z.string()).nullish(),
  rangeRequirements: RangeSchema.nullish(),
  target: z.number().int().optional(),
});

export type DemographicQuota = z.infer<typeof DemographicQuotaSchema>;

export const TargetOptionSchema = z.enum(['GenPop', 'GenderSplit', 'CensusMatched', 'Custom']);
export type TargetOption = z.infer<typeof TargetOptionSchema>;

export const DemographicRequirementsSchema = z.object({
  quotas: z.array(DemographicQuotaSchema).nullish(),
});

export type DemographicRequirements = z.infer<typeof DemographicRequirementsSchema>;

export const DemographicTargetingSchema = z.object({
  targetOption: TargetOptionSchema.optional(),
  locations: z.array(z.string()).nullish(),
  languages: z.array(z.string()).nullish(),
  demographicRequirements: DemographicRequirementsSchema.nullish(),
});

export type DemographicTargeting = z.infer<typeof DemographicTargetingSchema>;

export const DemographicOptionSchema = z.object({
  demographicOptionId: z.string().nullish(),
  value: z.string().nullish(),
});

export type DemographicOption = z.infer<typeof DemographicOptionSchema>;

export const DemographicsDataSchema = z.object({
  demographicId: z.string().nullish(),
  question: z.string().nullish(),
  category: z.string().nullish(),
  options: z.array(DemographicOptionSchema).nullish(),
  rangeRequirements: RangeSchema.nullish(),
});

export type DemographicsData = z.infer<typeof DemographicsDataSchema>;

export const DemographicsResponseSchema = z.object({
  demographics: z.array(DemographicsDataSchema).nullish(),
});

export type DemographicsResponse = z.infer<typeof DemographicsResponseSchema>;

export const FeasibilityRequestSchema = z.object({
  estimatedTimeInMinutes: z.number().int().optional(),
  participants: z.number().int().optional(),
  payment: z.number().optional(),
  targetingCriteria: DemographicTargetingSchema.nullish(),
});

export type FeasibilityRequest = z.infer<typeof FeasibilityRequestSchema>;

export const PlatformSchema = z.enum(['Connect', 'ManagedResearch']);
export type Platform = z.infer<typeof PlatformSchema>;

export const FeasibilityResponseSchema = z.object({
  // Null when the project is not feasible
  totalProjectCost: z.number().nullable(),
  availablePlatforms: z.array(PlatformSchema).nullish(),
});

export type FeasibilityResponse = z.infer<typeof FeasibilityResponseSchema>;
