/**
 * Tool catalogue advertised on tools/list
 * Argument checking happens again in dispatch with the zod schemas.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

// Optional arguments also accept null, read as absent
const fields = {
  type: ['array', 'null'],
  items: { type: 'string' },
  description: 'Fields to retrieve. Omit for the default set.'
};

const limit = (fallback: number) => ({
  type: ['integer', 'null'],
  minimum: 1,
  default: fallback,
  description: `Max results per page (default: ${fallback})`
});

const datePreset = {
  type: ['string', 'null'],
  default: 'last_30d',
  description: "Date range preset, e.g. 'today', 'yesterday', 'last_7d', 'last_30d', 'last_90d', 'lifetime'"
};

const timeRange = {
  type: ['object', 'null'],
  properties: {
    since: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    until: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' }
  },
  required: ['since', 'until'],
  description: 'Custom date range. Overrides date_preset when given.'
};

const accountId = {
  type: 'string',
  description: 'Ad account ID (format: act_1234567890)'
};

export const TOOLS: Tool[] = [
  {
    name: 'list_ad_accounts',
    description: 'List all ad accounts linked to the access token (name, account_id, account_status, currency)',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false
    }
  },
  {
    name: 'get_details_of_ad_account',
    description: 'Get details of one ad account. Default fields: name, account_status, amount_spent, balance, currency',
    inputSchema: {
      type: 'object',
      properties: { act_id: accountId, fields },
      required: ['act_id']
    }
  },
  {
    name: 'get_campaigns_by_adaccount',
    description: 'List campaigns of an ad account, with optional filtering',
    inputSchema: {
      type: 'object',
      properties: {
        act_id: accountId,
        fields,
        limit: limit(25),
        filtering: {
          type: ['array', 'null'],
          items: {
            type: 'object',
            properties: {
              field: { type: 'string' },
              operator: { type: 'string' },
              value: {}
            },
            required: ['field', 'operator', 'value']
          },
          description: 'e.g. [{"field":"effective_status","operator":"IN","value":["ACTIVE"]}]'
        }
      },
      required: ['act_id']
    }
  },
  {
    name: 'get_campaign_by_id',
    description: 'Get details of one campaign',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: { type: 'string' }, fields },
      required: ['campaign_id']
    }
  },
  {
    name: 'get_adsets_by_campaign',
    description: 'List ad sets within a campaign',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: { type: 'string' }, fields, limit: limit(25) },
      required: ['campaign_id']
    }
  },
  {
    name: 'get_adset_by_id',
    description: 'Get details of one ad set',
    inputSchema: {
      type: 'object',
      properties: { adset_id: { type: 'string' }, fields },
      required: ['adset_id']
    }
  },
  {
    name: 'get_ads_by_adset',
    description: 'List ads within an ad set',
    inputSchema: {
      type: 'object',
      properties: { adset_id: { type: 'string' }, fields, limit: limit(25) },
      required: ['adset_id']
    }
  },
  {
    name: 'get_ad_by_id',
    description: 'Get details of one ad',
    inputSchema: {
      type: 'object',
      properties: { ad_id: { type: 'string' }, fields },
      required: ['ad_id']
    }
  },
  {
    name: 'get_campaign_insights',
    description: 'Performance insights for a campaign. Default fields: impressions, clicks, spend, cpc, cpm, ctr, reach',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: { type: 'string' },
        fields,
        date_preset: datePreset,
        time_range: timeRange
      },
      required: ['campaign_id']
    }
  },
  {
    name: 'get_adset_insights',
    description: 'Performance insights for an ad set. Default fields: impressions, clicks, spend, cpc, ctr',
    inputSchema: {
      type: 'object',
      properties: {
        adset_id: { type: 'string' },
        fields,
        date_preset: datePreset,
        time_range: timeRange
      },
      required: ['adset_id']
    }
  },
  {
    name: 'get_ad_insights',
    description: 'Performance insights for an ad. Default fields: impressions, clicks, spend, cpc, ctr',
    inputSchema: {
      type: 'object',
      properties: {
        ad_id: { type: 'string' },
        fields,
        date_preset: datePreset,
        time_range: timeRange
      },
      required: ['ad_id']
    }
  },
  {
    name: 'get_comprehensive_ad_report',
    description:
      'Per-ad report joining ad details (campaign, ad set, creative asset) with delivery, purchase, ' +
      'video, conversion and engagement metrics. Only ads with spend above min_spend are returned.',
    inputSchema: {
      type: 'object',
      properties: {
        act_id: accountId,
        date_preset: datePreset,
        time_range: timeRange,
        campaign_id: { type: ['string', 'null'], description: 'Only report ads of this campaign' },
        limit: limit(100),
        min_spend: {
          type: ['number', 'null'],
          default: 0,
          description: 'Only ads with spend > this value; a negative value includes zero-spend ads'
        }
      },
      required: ['act_id']
    }
  },
  {
    name: 'get_summary_report',
    description:
      'Lightweight per-ad summary (spend, impressions, clicks, CTR, CPC, CPM, purchases, CPA) with account totals',
    inputSchema: {
      type: 'object',
      properties: {
        act_id: accountId,
        date_preset: datePreset,
        time_range: timeRange,
        limit: limit(50)
      },
      required: ['act_id']
    }
  },
  {
    name: 'fetch_pagination_url',
    description: "Fetch the next or previous page using a 'paging.next' / 'paging.previous' URL from an earlier result",
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Full paging.next / paging.previous URL on https://graph.facebook.com' }
      },
      required: ['url'],
      additionalProperties: false
    }
  }
];
