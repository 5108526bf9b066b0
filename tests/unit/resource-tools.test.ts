/**
 * Unit tests for the resource and insight tools
 * Checks the endpoint and query each tool sends to the Graph API
 */

import { fetchPaginationUrl } from '../../src/tools/fetch-pagination-url';
import { getAdAccountDetails } from '../../src/tools/get-ad-account-details';
import { getAdById } from '../../src/tools/get-ad-by-id';
import { getAdInsights } from '../../src/tools/get-ad-insights';
import { getAdsByAdset } from '../../src/tools/get-ads-by-adset';
import { getAdsetById } from '../../src/tools/get-adset-by-id';
import { getAdsetInsights } from '../../src/tools/get-adset-insights';
import { getAdsetsByCampaign } from '../../src/tools/get-adsets-by-campaign';
import { getCampaignById } from '../../src/tools/get-campaign-by-id';
import { getCampaignInsights } from '../../src/tools/get-campaign-insights';
import { getCampaignsByAccount } from '../../src/tools/get-campaigns-by-account';
import { listAdAccounts } from '../../src/tools/list-ad-accounts';
import {
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
  GetCampaignsByAccountRequest
} from '../../src/validation/schemas';
import { fakeGraphApi } from '../helpers/fake-graph-api';

describe('Resource tools', () => {
  describe('list_ad_accounts', () => {
    it('should request the token owner ad accounts', async () => {
      const { api, call } = fakeGraphApi({ data: [{ id: 'act_1' }] });

      const result = await listAdAccounts(api);

      expect(result).toEqual({ data: [{ id: 'act_1' }] });
      expect(call).toHaveBeenCalledWith('me/adaccounts', {
        fields: 'name,account_id,account_status,currency'
      });
    });
  });

  describe('get_details_of_ad_account', () => {
    it('should use the default account fields', async () => {
      const { api, call } = fakeGraphApi({ id: 'act_123' });

      await getAdAccountDetails(api, GetAdAccountDetailsRequest.parse({ act_id: 'act_123' }));

      expect(call).toHaveBeenCalledWith('act_123', {
        fields: 'name,account_status,amount_spent,balance,currency'
      });
    });

    it('should fall back to the defaults for an empty field list', async () => {
      const { api, call } = fakeGraphApi({ id: 'act_123' });

      await getAdAccountDetails(api, GetAdAccountDetailsRequest.parse({ act_id: 'act_123', fields: [] }));

      expect(call.mock.calls[0][1]).toEqual({
        fields: 'name,account_status,amount_spent,balance,currency'
      });
    });
  });

  describe('get_campaigns_by_adaccount', () => {
    it('should send limit, default fields and no filtering', async () => {
      const { api, call } = fakeGraphApi();

      await getCampaignsByAccount(api, GetCampaignsByAccountRequest.parse({ act_id: 'act_123' }));

      expect(call.mock.calls[0][0]).toBe('act_123/campaigns');
      expect(call.mock.calls[0][1]).toEqual({
        limit: 25,
        fields: 'name,objective,status,effective_status,daily_budget,lifetime_budget',
        filtering: undefined
      });
    });

    it('should JSON-encode filtering clauses', async () => {
      const { api, call } = fakeGraphApi();

      await getCampaignsByAccount(
        api,
        GetCampaignsByAccountRequest.parse({
          act_id: 'act_123',
          fields: ['name'],
          limit: 10,
          filtering: [{ field: 'effective_status', operator: 'IN', value: ['ACTIVE'] }]
        })
      );

      expect(call.mock.calls[0][1]).toEqual({
        limit: 10,
        fields: 'name',
        filtering: '[{"field":"effective_status","operator":"IN","value":["ACTIVE"]}]'
      });
    });

    it('should leave out an empty filtering list', async () => {
      const { api, call } = fakeGraphApi();

      await getCampaignsByAccount(api, GetCampaignsByAccountRequest.parse({ act_id: 'act_123', filtering: [] }));

      expect(call.mock.calls[0][1]).toHaveProperty('filtering', undefined);
    });
  });

  describe('single-object lookups', () => {
    it('should leave fields to the API when none are given', async () => {
      const { api, call } = fakeGraphApi({ id: '42' });

      await getCampaignById(api, GetCampaignByIdRequest.parse({ campaign_id: '42' }));
      await getAdsetById(api, GetAdsetByIdRequest.parse({ adset_id: '43' }));
      await getAdById(api, GetAdByIdRequest.parse({ ad_id: '44' }));

      expect(call.mock.calls).toEqual([
        ['42', { fields: undefined }],
        ['43', { fields: undefined }],
        ['44', { fields: undefined }]
      ]);
    });

    it('should pass requested fields through', async () => {
      const { api, call } = fakeGraphApi({ id: '42' });

      await getCampaignById(api, GetCampaignByIdRequest.parse({ campaign_id: '42', fields: ['name', 'status'] }));

      expect(call).toHaveBeenCalledWith('42', { fields: 'name,status' });
    });
  });

  describe('child listings', () => {
    it('should list ad sets of a campaign', async () => {
      const { api, call } = fakeGraphApi();

      await getAdsetsByCampaign(api, GetAdsetsByCampaignRequest.parse({ campaign_id: '42' }));

      expect(call).toHaveBeenCalledWith('42/adsets', {
        limit: 25,
        fields: 'name,effective_status,daily_budget,lifetime_budget,targeting'
      });
    });

    it('should list ads of an ad set', async () => {
      const { api, call } = fakeGraphApi();

      await getAdsByAdset(api, GetAdsByAdsetRequest.parse({ adset_id: '43', limit: 5 }));

      expect(call).toHaveBeenCalledWith('43/ads', {
        limit: 5,
        fields: 'name,effective_status,creative'
      });
    });
  });

  describe('insights', () => {
    it('should default to the last_30d preset', async () => {
      const { api, call } = fakeGraphApi();

      await getCampaignInsights(api, GetCampaignInsightsRequest.parse({ campaign_id: '42' }));

      expect(call.mock.calls[0]).toEqual([
        '42/insights',
        { fields: 'impressions,clicks,spend,cpc,cpm,ctr,reach', date_preset: 'last_30d' }
      ]);
    });

    it('should send time_range instead of date_preset when both are given', async () => {
      const { api, call } = fakeGraphApi();

      await getAdsetInsights(
        api,
        GetAdsetInsightsRequest.parse({
          adset_id: '43',
          date_preset: 'last_7d',
          time_range: { since: '2024-01-01', until: '2024-01-31' }
        })
      );

      const params = call.mock.calls[0][1];
      expect(params).toEqual({
        fields: 'impressions,clicks,spend,cpc,ctr',
        time_range: '{"since":"2024-01-01","until":"2024-01-31"}'
      });
      expect(params).not.toHaveProperty('date_preset');
    });

    it('should send no window when date_preset is null', async () => {
      const { api, call } = fakeGraphApi();

      await getAdInsights(api, GetAdInsightsRequest.parse({ ad_id: '44', date_preset: null, fields: ['spend'] }));

      expect(call.mock.calls[0]).toEqual(['44/insights', { fields: 'spend' }]);
    });

    it('should reject a malformed time_range before calling the API', () => {
      expect(() =>
        GetCampaignInsightsRequest.parse({ campaign_id: '42', time_range: { since: '01/01/2024', until: '2024-01-31' } })
      ).toThrow('Date must be in YYYY-MM-DD format');
    });
  });

  describe('fetch_pagination_url', () => {
    it('should follow the URL as given', async () => {
      const { api, call, callAbsolute } = fakeGraphApi({ data: [], paging: {} });
      const url = 'https://graph.facebook.com/v22.0/act_1/campaigns?access_token=test-token&after=abc';

      const result = await fetchPaginationUrl(api, FetchPaginationUrlRequest.parse({ url }));

      expect(result).toEqual({ data: [], paging: {} });
      expect(callAbsolute).toHaveBeenCalledWith(url);
      expect(call).not.toHaveBeenCalled();
    });

    it('should reject non-http URLs', () => {
      expect(FetchPaginationUrlRequest.safeParse({ url: 'ftp://example.com/next' }).success).toBe(false);
      expect(FetchPaginationUrlRequest.safeParse({ url: 'not a url' }).success).toBe(false);
    });

    it('should only follow Graph API URLs', () => {
      expect(() => FetchPaginationUrlRequest.parse({ url: 'http://169.254.169.254/latest/meta-data' })).toThrow(
        'url must be a pagination URL on https://graph.facebook.com'
      );
      expect(FetchPaginationUrlRequest.safeParse({ url: 'http://graph.facebook.com/v22.0/act_1/ads' }).success).toBe(
        false
      );
      expect(
        FetchPaginationUrlRequest.safeParse({ url: 'https://graph.facebook.com.example.com/v22.0/act_1/ads' }).success
      ).toBe(false);
    });
  });
});
