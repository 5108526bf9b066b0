/**
 * Validation schemas using Zod
 * One request schema per tool; defaults live here so every entry point applies the same ones.
 */

import { z } from 'zod';
import { GRAPH_API_HOST } from '../config/settings.js';

export const DEFAULT_LIST_LIMIT = 25;
export const DEFAULT_DATE_PRESET = 'last_30d';
export const DEFAULT_REPORT_LIMIT = 100;
export const DEFAULT_SUMMARY_LIMIT = 50;

// Date string pattern (YYYY-MM-DD)
const DateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

// Explicit reporting window; wins over date_preset when both are given
export const TimeRangeSchema = z.object({
  since: DateString,
  until: DateString
});

export type TimeRange = z.infer<typeof TimeRangeSchema>;

// Named window such as last_7d, last_30d, lifetime. null sends no preset at all.
const DatePreset = z.string().min(1).nullable().default(DEFAULT_DATE_PRESET);

const Identifier = z.string().min(1);

// Hosts send null for optional arguments they leave unset
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform(value => value ?? undefined);
}

const FieldList = optional(z.array(z.string().min(1)));

const Limit = (fallback: number) =>
  z
    .number()
    .int()
    .positive()
    .nullish()
    .transform(value => value ?? fallback);

const FilterValue = z.union([z.string(), z.number()]);

// Graph API filtering clause, e.g. {"field":"effective_status","operator":"IN","value":["ACTIVE"]}
export const FilterSchema = z.object({
  field: z.string().min(1),
  operator: z.string().min(1),
  value: z.union([FilterValue, z.array(FilterValue)])
});

export type Filter = z.infer<typeof FilterSchema>;

export interface DateWindow {
  date_preset: string | null;
  time_range?: TimeRange;
}

// ========================================
// Tool Request Schemas
// ========================================

export const GetAdAccountDetailsRequest = z.object({
  act_id: Identifier,
  fields: FieldList
});

export type GetAdAccountDetailsRequest = z.infer<typeof GetAdAccountDetailsRequest>;

export const GetCampaignsByAccountRequest = z.object({
  act_id: Identifier,
  fields: FieldList,
  limit: Limit(DEFAULT_LIST_LIMIT),
  filtering: optional(z.array(FilterSchema))
});

export type GetCampaignsByAccountRequest = z.infer<typeof GetCampaignsByAccountRequest>;

export const GetCampaignByIdRequest = z.object({
  campaign_id: Identifier,
  fields: FieldList
});

export type GetCampaignByIdRequest = z.infer<typeof GetCampaignByIdRequest>;

export const GetAdsetsByCampaignRequest = z.object({
  campaign_id: Identifier,
  fields: FieldList,
  limit: Limit(DEFAULT_LIST_LIMIT)
});

export type GetAdsetsByCampaignRequest = z.infer<typeof GetAdsetsByCampaignRequest>;

export const GetAdsetByIdRequest = z.object({
  adset_id: Identifier,
  fields: FieldList
});

export type GetAdsetByIdRequest = z.infer<typeof GetAdsetByIdRequest>;

export const GetAdsByAdsetRequest = z.object({
  adset_id: Identifier,
  fields: FieldList,
  limit: Limit(DEFAULT_LIST_LIMIT)
});

export type GetAdsByAdsetRequest = z.infer<typeof GetAdsByAdsetRequest>;

export const GetAdByIdRequest = z.object({
  ad_id: Identifier,
  fields: FieldList
});

export type GetAdByIdRequest = z.infer<typeof GetAdByIdRequest>;

export const GetCampaignInsightsRequest = z.object({
  campaign_id: Identifier,
  fields: FieldList,
  date_preset: DatePreset,
  time_range: optional(TimeRangeSchema)
});

export type GetCampaignInsightsRequest = z.infer<typeof GetCampaignInsightsRequest>;

export const GetAdsetInsightsRequest = z.object({
  adset_id: Identifier,
  fields: FieldList,
  date_preset: DatePreset,
  time_range: optional(TimeRangeSchema)
});

export type GetAdsetInsightsRequest = z.infer<typeof GetAdsetInsightsRequest>;

export const GetAdInsightsRequest = z.object({
  ad_id: Identifier,
  fields: FieldList,
  date_preset: DatePreset,
  time_range: optional(TimeRangeSchema)
});

export type GetAdInsightsRequest = z.infer<typeof GetAdInsightsRequest>;

export const GetComprehensiveAdReportRequest = z.object({
  act_id: Identifier,
  date_preset: DatePreset,
  time_range: optional(TimeRangeSchema),
  campaign_id: optional(Identifier),
  limit: Limit(DEFAULT_REPORT_LIMIT),
  min_spend: z
    .number()
    .nullish()
    .transform(value => value ?? 0)
});

export type GetComprehensiveAdReportRequest = z.infer<typeof GetComprehensiveAdReportRequest>;

export const GetSummaryReportRequest = z.object({
  act_id: Identifier,
  date_preset: DatePreset,
  time_range: optional(TimeRangeSchema),
  limit: Limit(DEFAULT_SUMMARY_LIMIT)
});

export type GetSummaryReportRequest = z.infer<typeof GetSummaryReportRequest>;

// Paging links handed back by the Graph API; other hosts are never fetched
function isGraphApiUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' && url.hostname === GRAPH_API_HOST;
  } catch {
    return false;
  }
}

export const FetchPaginationUrlRequest = z.object({
  url: z
    .string()
    .url()
    .refine(isGraphApiUrl, `url must be a pagination URL on https://${GRAPH_API_HOST}`)
});

export type FetchPaginationUrlRequest = z.infer<typeof FetchPaginationUrlRequest>;

// ========================================
// Error Schema
// ========================================

export const ErrorType = z.enum([
  'CONFIGURATION',
  'VALIDATION',
  'API',
  'TIMEOUT',
  'NETWORK',
  'UNKNOWN'
]);

export type ErrorType = z.infer<typeof ErrorType>;

export const ErrorResponseSchema = z.object({
  error: z.object({
    type: ErrorType,
    message: z.string(),
    upstream_code: z.string().optional().nullable()
  })
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ========================================
// Helper Functions
// ========================================

/**
 * Create standardized error response
 */
export function createErrorResponse(
  type: ErrorType,
  message: string,
  upstreamCode?: string | null
): ErrorResponse {
  return {
    error: {
      type,
      message,
      upstream_code: upstreamCode ?? null
    }
  };
}

/**
 * Query parameters for a reporting window.
 * An explicit time_range always replaces the preset.
 */
export function dateWindowParams(window: DateWindow): Record<string, string> {
  if (window.time_range) {
    return { time_range: JSON.stringify(window.time_range) };
  }

  if (window.date_preset) {
    return { date_preset: window.date_preset };
  }

  return {};
}

/**
 * Comma-join a caller field list, falling back when it is absent or empty.
 * Without a fallback the parameter is left out and the API picks its own defaults.
 */
export function fieldsParam(fields: string[] | undefined, fallback?: readonly string[]): string | undefined {
  if (fields && fields.length > 0) {
    return fields.join(',');
  }

  return fallback ? fallback.join(',') : undefined;
}
