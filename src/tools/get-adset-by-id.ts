/**
 * get_adset_by_id tool
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetAdsetByIdRequest } from '../validation/schemas.js';

export async function getAdsetById(api: GraphApi, request: GetAdsetByIdRequest): Promise<JsonValue> {
  return api.call(request.adset_id, { fields: fieldsParam(request.fields) });
}
