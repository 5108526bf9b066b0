/**
 * get_campaign_by_id tool
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetCampaignByIdRequest } from '../validation/schemas.js';

export async function getCampaignById(api: GraphApi, request: GetCampaignByIdRequest): Promise<JsonValue> {
  return api.call(request.campaign_id, { fields: fieldsParam(request.fields) });
}
