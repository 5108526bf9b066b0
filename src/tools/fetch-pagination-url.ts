/**
 * fetch_pagination_url tool
 * Follows a paging.next / paging.previous URL from an earlier response.
 * Those URLs already embed the access token, so none is added.
 */

import type { GraphApi, JsonValue } from '../api/graph-api-client.js';
import type { FetchPaginationUrlRequest } from '../validation/schemas.js';

export async function fetchPaginationUrl(api: GraphApi, request: FetchPaginationUrlRequest): Promise<JsonValue> {
  return api.callAbsolute(request.url);
}
