/**
 * get_adsets_by_campaign tool
 * Lists the ad sets of a campaign
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetAdsetsByCampaignRequest } from '../validation/schemas.js';

export const ADSET_DEFAULT_FIELDS = [
  'name',
  'effective_status',
  'daily_budget',
  'lifetime_budget',
  'targeting'
] as const;

export async function getAdsetsByCampaign(
  api: GraphApi,
  request: GetAdsetsByCampaignRequest
): Promise<JsonValue> {
  return api.call(`${request.campaign_id}/adsets`, {
    limit: request.limit,
    fields: fieldsParam(request.fields, ADSET_DEFAULT_FIELDS)
  });
}
