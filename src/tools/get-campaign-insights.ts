/**
 * get_campaign_insights tool
 * Performance metrics for one campaign over a preset or explicit window
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { dateWindowParams, fieldsParam, type GetCampaignInsightsRequest } from '../validation/schemas.js';

export const CAMPAIGN_INSIGHT_DEFAULT_FIELDS = ['impressions', 'clicks', 'spend', 'cpc', 'cpm', 'ctr', 'reach'] as const;

export async function getCampaignInsights(
  api: GraphApi,
  request: GetCampaignInsightsRequest
): Promise<JsonValue> {
  return api.call(`${request.campaign_id}/insights`, {
    fields: fieldsParam(request.fields, CAMPAIGN_INSIGHT_DEFAULT_FIELDS),
    ...dateWindowParams(request)
  });
}
