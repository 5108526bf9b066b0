/**
 * get_details_of_ad_account tool
 * Fetches one ad account (act_<digits>)
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import { fieldsParam, type GetAdAccountDetailsRequest } from '../validation/schemas.js';

export const AD_ACCOUNT_DEFAULT_FIELDS = ['name', 'account_status', 'amount_spent', 'balance', 'currency'] as const;

export async function getAdAccountDetails(
  api: GraphApi,
  request: GetAdAccountDetailsRequest
): Promise<JsonValue> {
  return api.call(request.act_id, {
    fields: fieldsParam(request.fields, AD_ACCOUNT_DEFAULT_FIELDS)
  });
}
