/**
 * get_campaigns_by_adaccount tool
 * Lists campaigns of an ad account, optionally filtered server-side
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetCampaignsByAccountRequest } from '../validation/schemas.js';

export const CAMPAIGN_DEFAULT_FIELDS = [
  'name',
  'objective',
  'status',
  'effective_status',
  'daily_budget',
  'lifetime_budget'
] as const;

export async function getCampaignsByAccount(
  api: GraphApi,
  request: GetCampaignsByAccountRequest
): Promise<JsonValue> {
  return api.call(`${request.act_id}/campaigns`, {
    limit: request.limit,
    fields: fieldsParam(request.fields, CAMPAIGN_DEFAULT_FIELDS),
    filtering: request.filtering?.length ? JSON.stringify(request.filtering) : undefined
  });
}
