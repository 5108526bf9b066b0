/**
 * list_ad_accounts tool
 * Lists every ad account the access token can read
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';

export const AD_ACCOUNT_LIST_FIELDS = ['name', 'account_id', 'account_status', 'currency'] as const;

export async function listAdAccounts(api: GraphApi): Promise<JsonValue> {
  return api.call('me/adaccounts', {
    fields: AD_ACCOUNT_LIST_FIELDS.join(',')
  });
}
