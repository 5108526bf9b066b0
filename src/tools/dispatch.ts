/**
 * Tool call dispatch
 * Validates arguments, runs the tool and wraps the result (or failure) as MCP content
 */

import { ZodError } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { GraphApi } from '../api/graph-api-client.js';
import { FacebookAdsError } from '../api/errors.js';
import {
  createErrorResponse,
  FetchPaginationUrlRequest,
  GetAdAccountDetailsRequest,
  GetAdByIdRequest,
  GetAdInsightsRequest,
  GetAdsByAdsetRequest,
  GetAdsetByIdRequest,
  GetAdsetInsightsRequest,
  GetAdsetsByCampaignRequest,
  GetCampaignByIdRequest,
  GetCampaignInsightsRequest,
  GetCampaignsByAccountRequest,
  GetComprehensiveAdReportRequest,
  GetSummaryReportRequest,
  type ErrorResponse
} from '../validation/schemas.js';
import { generateRequestId, type Logger } from '../utils/logger.js';
import { listAdAccounts } from './list-ad-accounts.js';
import { getAdAccountDetails } from './get-ad-account-details.js';
import { getCampaignsByAccount } from './get-campaigns-by-account.js';
import { getCampaignById } from './get-campaign-by-id.js';
import { getAdsetsByCampaign } from './get-adsets-by-campaign.js';
import { getAdsetById } from './get-adset-by-id.js';
import { getAdsByAdset } from './get-ads-by-adset.js';
import { getAdById } from './get-ad-by-id.js';
import { getCampaignInsights } from './get-campaign-insights.js';
import { getAdsetInsights } from './get-adset-insights.js';
import { getAdInsights } from './get-ad-insights.js';
import { getComprehensiveAdReport } from './get-comprehensive-ad-report.js';
import { getSummaryReport } from './get-summary-report.js';
import { fetchPaginationUrl } from './fetch-pagination-url.js';

export interface ToolContext {
  api: GraphApi;
  logger: Logger;
}

export class UnknownToolError extends Error {
  override readonly name = 'UnknownToolError';

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

function textResult(payload: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2)
      }
    ]
  };

  if (isError) {
    result.isError = true;
  }

  return result;
}

async function runTool(name: string, args: Record<string, unknown>, api: GraphApi): Promise<unknown> {
  switch (name) {
    case 'list_ad_accounts':
      return listAdAccounts(api);
    case 'get_details_of_ad_account':
      return getAdAccountDetails(api, GetAdAccountDetailsRequest.parse(args));
    case 'get_campaigns_by_adaccount':
      return getCampaignsByAccount(api, GetCampaignsByAccountRequest.parse(args));
    case 'get_campaign_by_id':
      return getCampaignById(api, GetCampaignByIdRequest.parse(args));
    case 'get_adsets_by_campaign':
      return getAdsetsByCampaign(api, GetAdsetsByCampaignRequest.parse(args));
    case 'get_adset_by_id':
      return getAdsetById(api, GetAdsetByIdRequest.parse(args));
    case 'get_ads_by_adset':
      return getAdsByAdset(api, GetAdsByAdsetRequest.parse(args));
    case 'get_ad_by_id':
      return getAdById(api, GetAdByIdRequest.parse(args));
    case 'get_campaign_insights':
      return getCampaignInsights(api, GetCampaignInsightsRequest.parse(args));
    case 'get_adset_insights':
      return getAdsetInsights(api, GetAdsetInsightsRequest.parse(args));
    case 'get_ad_insights':
      return getAdInsights(api, GetAdInsightsRequest.parse(args));
    case 'get_comprehensive_ad_report':
      return getComprehensiveAdReport(api, GetComprehensiveAdReportRequest.parse(args));
    case 'get_summary_report':
      return getSummaryReport(api, GetSummaryReportRequest.parse(args));
    case 'fetch_pagination_url':
      return fetchPaginationUrl(api, FetchPaginationUrlRequest.parse(args));
    default:
      throw new UnknownToolError(name);
  }
}

/**
 * Envelope returned to the host for a failed call
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    const detail = error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return createErrorResponse('VALIDATION', `Validation error: ${detail}`, 'VALIDATION_ERROR');
  }

  if (error instanceof FacebookAdsError) {
    return error.errorResponse;
  }

  if (error instanceof UnknownToolError) {
    return createErrorResponse('VALIDATION', error.message, 'UNKNOWN_TOOL');
  }

  const message = error instanceof Error ? error.message : String(error);
  return createErrorResponse('UNKNOWN', message || 'Unknown error occurred');
}

/**
 * Handle one tools/call request
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
  context: ToolContext
): Promise<CallToolResult> {
  const logger = context.logger.withRequestId(generateRequestId()).withTool(toolName);
  const startTime = Date.now();

  logger.info('Tool call started', { args });

  try {
    const result = await runTool(toolName, args, context.api);
    logger.info('Tool call completed', { duration_ms: Date.now() - startTime });
    return textResult(result);
  } catch (error) {
    logger.error('Tool call failed', error, { duration_ms: Date.now() - startTime });
    return textResult(toErrorResponse(error), true);
  }
}
