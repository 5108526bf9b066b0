/**
 * get_summary_report tool
 * Lightweight per-ad overview (spend, delivery, purchases and CPA) with account totals.
 *
 * Unlike every other tool this one does not raise when the insights fetch fails:
 * it answers with { error, date_range } so callers always get an object back.
 */

import type { GraphApi } from '../api/graph-api-client.js';
import { findActionValue } from '../normalization/actions.js';
import { calculateCPA, roundMetric, toCount, toNumber } from '../normalization/metrics.js';
import { InsightsResponseSchema, parseGraphResponse, type InsightRecord } from '../validation/responses.js';
import { dateWindowParams, type GetSummaryReportRequest, type TimeRange } from '../validation/schemas.js';
import { spendFilter } from './get-comprehensive-ad-report.js';

export const SUMMARY_INSIGHT_FIELDS = [
  'ad_id',
  'ad_name',
  'campaign_id',
  'campaign_name',
  'adset_id',
  'adset_name',
  'spend',
  'impressions',
  'clicks',
  'ctr',
  'cpc',
  'cpm',
  'actions',
  'cost_per_action_type'
] as const;

const CONVERSION_ACTION_TYPE = 'purchase';

export interface SummaryRow {
  ad_id: string | null;
  ad_name: string | null;
  campaign_id: string | null;
  campaign_name: string | null;
  adset_id: string | null;
  adset_name: string | null;
  spend: number;
  impressions: number;
  clicks: number;
  ctr: number;
  cpc: number;
  cpm: number;
  conversions: number;
  cpa: number | null;
}

export interface SummaryReport {
  data: SummaryRow[];
  summary: {
    total_ads: number;
    total_spend: number;
    total_conversions: number;
    average_cpa: number;
    date_preset: string | null;
    time_range: TimeRange | null;
    account_id: string;
  };
}

export interface SummaryReportError {
  error: string;
  date_range: string | TimeRange | null;
}

export type SummaryReportResult = SummaryReport | SummaryReportError;

export function isSummaryReportError(result: SummaryReportResult): result is SummaryReportError {
  return 'error' in result;
}

/**
 * Map one insight row; zero or missing cost-per-purchase is reported as null
 */
export function mapToSummaryRow(insight: InsightRecord): SummaryRow {
  const conversions = toCount(findActionValue(insight.actions, CONVERSION_ACTION_TYPE));
  const cpaValue = findActionValue(insight.cost_per_action_type, CONVERSION_ACTION_TYPE);
  const cpa = cpaValue === null ? 0 : toNumber(cpaValue);

  return {
    ad_id: insight.ad_id ?? null,
    ad_name: insight.ad_name ?? null,
    campaign_id: insight.campaign_id ?? null,
    campaign_name: insight.campaign_name ?? null,
    adset_id: insight.adset_id ?? null,
    adset_name: insight.adset_name ?? null,
    spend: roundMetric(toNumber(insight.spend), 2),
    impressions: toCount(insight.impressions),
    clicks: toCount(insight.clicks),
    ctr: toNumber(insight.ctr),
    cpc: toNumber(insight.cpc),
    cpm: toNumber(insight.cpm),
    conversions,
    cpa: cpa ? roundMetric(cpa, 2) : null
  };
}

export async function getSummaryReport(
  api: GraphApi,
  request: GetSummaryReportRequest
): Promise<SummaryReportResult> {
  let insights: InsightRecord[];

  try {
    const response = parseGraphResponse(
      InsightsResponseSchema,
      await api.call(`${request.act_id}/insights`, {
        level: 'ad',
        fields: SUMMARY_INSIGHT_FIELDS.join(','),
        limit: request.limit,
        filtering: spendFilter(0),
        ...dateWindowParams(request)
      }),
      'insights'
    );
    insights = response.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      error: `Failed to fetch insights: ${message}`,
      date_range: request.time_range ?? request.date_preset
    };
  }

  const rows: SummaryRow[] = [];
  let totalSpend = 0;
  let totalConversions = 0;

  for (const insight of insights) {
    // Totals use the unrounded spend
    totalSpend += toNumber(insight.spend);
    const row = mapToSummaryRow(insight);
    totalConversions += row.conversions;
    rows.push(row);
  }

  return {
    data: rows,
    summary: {
      total_ads: rows.length,
      total_spend: roundMetric(totalSpend, 2),
      total_conversions: totalConversions,
      average_cpa: roundMetric(calculateCPA(totalSpend, totalConversions), 2),
      date_preset: request.date_preset,
      time_range: request.time_range ?? null,
      account_id: request.act_id
    }
  };
}
