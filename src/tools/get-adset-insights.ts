/**
 * get_adset_insights tool
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { dateWindowParams, fieldsParam, type GetAdsetInsightsRequest } from '../validation/schemas.js';

export const ADSET_INSIGHT_DEFAULT_FIELDS = ['impressions', 'clicks', 'spend', 'cpc', 'ctr'] as const;

export async function getAdsetInsights(api: GraphApi, request: GetAdsetInsightsRequest): Promise<JsonValue> {
  return api.call(`${request.adset_id}/insights`, {
    fields: fieldsParam(request.fields, ADSET_INSIGHT_DEFAULT_FIELDS),
    ...dateWindowParams(request)
  });
}
