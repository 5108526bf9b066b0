/**
 * get_ads_by_adset tool
 * Lists the ads of an ad set
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetAdsByAdsetRequest } from '../validation/schemas.js';

export const AD_DEFAULT_FIELDS = ['name', 'effective_status', 'creative'] as const;

export async function getAdsByAdset(api: GraphApi, request: GetAdsByAdsetRequest): Promise<JsonValue> {
  return api.call(`${request.adset_id}/ads`, {
    limit: request.limit,
    fields: fieldsParam(request.fields, AD_DEFAULT_FIELDS)
  });
}
