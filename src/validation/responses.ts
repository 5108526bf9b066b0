/**
 * Shapes of the Graph API responses the report tools read.
 * Unknown keys are kept; only the fields the reports touch are checked.
 */

import { z } from 'zod';
import { ApiError } from '../api/errors.js';

const Scalar = z.union([z.string(), z.number()]);

export const ActionEntrySchema = z
  .object({
    action_type: z.string().optional(),
    value: Scalar.optional()
  })
  .passthrough();

export type ActionEntry = z.infer<typeof ActionEntrySchema>;

const ActionList = z.array(ActionEntrySchema).optional();

const NamedRef = z
  .object({
    id: z.string().optional(),
    name: z.string().optional()
  })
  .passthrough();

export const CreativeSchema = z
  .object({
    id: z.string().optional(),
    thumbnail_url: z.string().optional(),
    image_url: z.string().optional(),
    video_id: z.string().optional(),
    object_story_spec: z
      .object({
        video_data: z
          .object({ video_id: z.string().optional() })
          .passthrough()
          .optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type Creative = z.infer<typeof CreativeSchema>;

export const AdRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    status: z.string().optional(),
    effective_status: z.string().optional(),
    campaign_id: z.string().optional(),
    campaign: NamedRef.optional(),
    adset_id: z.string().optional(),
    adset: NamedRef.optional(),
    creative: CreativeSchema.optional()
  })
  .passthrough();

export type AdRecord = z.infer<typeof AdRecordSchema>;

export const InsightRecordSchema = z
  .object({
    ad_id: z.string().optional(),
    ad_name: z.string().optional(),
    campaign_id: z.string().optional(),
    campaign_name: z.string().optional(),
    adset_id: z.string().optional(),
    adset_name: z.string().optional(),
    reach: Scalar.optional(),
    impressions: Scalar.optional(),
    frequency: Scalar.optional(),
    spend: Scalar.optional(),
    clicks: Scalar.optional(),
    unique_clicks: Scalar.optional(),
    ctr: Scalar.optional(),
    unique_ctr: Scalar.optional(),
    cpc: Scalar.optional(),
    cpm: Scalar.optional(),
    actions: ActionList,
    action_values: ActionList,
    cost_per_action_type: ActionList,
    video_play_actions: ActionList,
    video_thruplay_watched_actions: ActionList,
    video_p25_watched_actions: ActionList,
    video_p50_watched_actions: ActionList,
    video_p75_watched_actions: ActionList,
    video_p100_watched_actions: ActionList,
    video_continuous_2_sec_watched_actions: ActionList
  })
  .passthrough();

export type InsightRecord = z.infer<typeof InsightRecordSchema>;

export const AdsResponseSchema = z
  .object({ data: z.array(AdRecordSchema).default([]) })
  .passthrough();

export const InsightsResponseSchema = z
  .object({ data: z.array(InsightRecordSchema).default([]) })
  .passthrough();

/**
 * Validate a decoded Graph payload, reporting a mismatch as an API error.
 */
export function parseGraphResponse<T extends z.ZodTypeAny>(schema: T, payload: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ApiError(
      `Unexpected ${what} response from Facebook API${where}: ${issue?.message ?? 'invalid shape'}`,
      null
    );
  }
  return result.data;
}
