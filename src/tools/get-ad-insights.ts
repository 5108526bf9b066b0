/**
 * get_ad_insights tool
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { dateWindowParams, fieldsParam, type GetAdInsightsRequest } from '../validation/schemas.js';

export const AD_INSIGHT_DEFAULT_FIELDS = ['impressions', 'clicks', 'spend', 'cpc', 'ctr'] as const;

export async function getAdInsights(api: GraphApi, request: GetAdInsightsRequest): Promise<JsonValue> {
  return api.call(`${request.ad_id}/insights`, {
    fields: fieldsParam(request.fields, AD_INSIGHT_DEFAULT_FIELDS),
    ...dateWindowParams(request)
  });
}
