/**
 * get_ad_by_id tool
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetAdByIdRequest } from '../validation/schemas.js';

export async function getAdById(api: GraphApi, request: GetAdByIdRequest): Promise<JsonValue> {
  return api.call(request.ad_id, { fields: fieldsParam(request.fields) });
}
