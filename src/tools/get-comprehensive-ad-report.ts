/**
 * get_comprehensive_ad_report tool
 *
 * Joins ad metadata (ads edge) with ad-level insights (account insights edge) and
 * flattens action lists into one row per ad. Ads without a matching insight record
 * are dropped: the spend filter is applied by the API to the insights call only,
 * so an ad with no spend in the window simply has nothing to join against.
 */

import type { GraphApi } from '../api/graph-api-client.js';
import { mapToAggregatedRow, type AggregatedRow } from '../normalization/ad-report-mapper.js';
import {
  AdsResponseSchema,
  InsightsResponseSchema,
  parseGraphResponse,
  type AdRecord,
  type InsightRecord
} from '../validation/responses.js';
import {
  dateWindowParams,
  type GetComprehensiveAdReportRequest,
  type TimeRange
} from '../validation/schemas.js';

export const REPORT_AD_FIELDS = [
  'id',
  'name',
  'status',
  'effective_status',
  'campaign_id',
  'campaign{id,name}',
  'adset_id',
  'adset{id,name}',
  'creative{id,asset_feed_spec,image_url,video_id,thumbnail_url,object_story_spec}'
] as const;

export const REPORT_INSIGHT_FIELDS = [
  'reach',
  'impressions',
  'frequency',
  'spend',
  'clicks',
  'unique_clicks',
  'ctr',
  'unique_ctr',
  'cpc',
  'cpm',
  'video_play_actions',
  'video_thruplay_watched_actions',
  'video_p25_watched_actions',
  'video_p50_watched_actions',
  'video_p75_watched_actions',
  'video_p100_watched_actions',
  'video_continuous_2_sec_watched_actions',
  'actions',
  'action_values',
  'cost_per_action_type'
] as const;

export interface ComprehensiveAdReport {
  data: AggregatedRow[];
  summary: {
    total_ads: number;
    date_preset: string | null;
    time_range: TimeRange | null;
    account_id: string;
    campaign_id: string | null;
    min_spend_filter: number;
  };
}

/**
 * Server-side filter keeping rows whose spend is strictly above `minSpend`
 */
export function spendFilter(minSpend: number): string {
  return JSON.stringify([{ field: 'spend', operator: 'GREATER_THAN', value: minSpend }]);
}

async function fetchAds(api: GraphApi, request: GetComprehensiveAdReportRequest): Promise<Map<string, AdRecord>> {
  const parent = request.campaign_id ?? request.act_id;
  const response = parseGraphResponse(
    AdsResponseSchema,
    await api.call(`${parent}/ads`, {
      fields: REPORT_AD_FIELDS.join(','),
      limit: request.limit
    }),
    'ads'
  );

  return new Map(response.data.map(ad => [ad.id, ad]));
}

async function fetchInsightsByAd(
  api: GraphApi,
  request: GetComprehensiveAdReportRequest
): Promise<Map<string, InsightRecord>> {
  const response = parseGraphResponse(
    InsightsResponseSchema,
    await api.call(`${request.act_id}/insights`, {
      level: 'ad',
      fields: REPORT_INSIGHT_FIELDS.join(','),
      limit: request.limit,
      filtering: spendFilter(request.min_spend),
      ...dateWindowParams(request)
    }),
    'insights'
  );

  const byAd = new Map<string, InsightRecord>();
  for (const insight of response.data) {
    if (insight.ad_id !== undefined) {
      byAd.set(insight.ad_id, insight);
    }
  }
  return byAd;
}

export async function getComprehensiveAdReport(
  api: GraphApi,
  request: GetComprehensiveAdReportRequest
): Promise<ComprehensiveAdReport> {
  const ads = await fetchAds(api, request);
  const insightsByAd = await fetchInsightsByAd(api, request);

  const rows: AggregatedRow[] = [];
  for (const [adId, ad] of ads) {
    const insight = insightsByAd.get(adId);
    if (!insight || Object.keys(insight).length === 0) {
      continue;
    }
    rows.push(mapToAggregatedRow(ad, insight));
  }

  return {
    data: rows,
    summary: {
      total_ads: rows.length,
      date_preset: request.date_preset,
      time_range: request.time_range ?? null,
      account_id: request.act_id,
      campaign_id: request.campaign_id ?? null,
      min_spend_filter: request.min_spend
    }
  };
}
