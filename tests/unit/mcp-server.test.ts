/**
 * MCP wiring tests
 * Drives the server through an in-memory client/server transport pair
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from '../../src/mcp-server';
import { TOOLS } from '../../src/tools/definitions';
import { Logger, LogLevel } from '../../src/utils/logger';
import { fakeGraphApi, type FakeGraphApi } from '../helpers/fake-graph-api';

const TOOL_NAMES = [
  'list_ad_accounts',
  'get_details_of_ad_account',
  'get_campaigns_by_adaccount',
  'get_campaign_by_id',
  'get_adsets_by_campaign',
  'get_adset_by_id',
  'get_ads_by_adset',
  'get_ad_by_id',
  'get_campaign_insights',
  'get_adset_insights',
  'get_ad_insights',
  'get_comprehensive_ad_report',
  'get_summary_report',
  'fetch_pagination_url'
];

describe('MCP server', () => {
  let fake: FakeGraphApi;
  let client: Client;
  let server: ReturnType<typeof createMcpServer>;

  beforeEach(async () => {
    fake = fakeGraphApi({ data: [{ id: 'act_1', name: 'Test Account' }] });
    server = createMcpServer({ api: fake.api, logger: new Logger({}, LogLevel.ERROR, () => undefined) });
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('should advertise every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toEqual(TOOL_NAMES);
  });

  it('should route tools/call to the tool', async () => {
    const result = await client.callTool({ name: 'list_ad_accounts', arguments: {} });

    expect(result).toMatchObject({
      content: [
        {
          type: 'text',
          text: JSON.stringify({ data: [{ id: 'act_1', name: 'Test Account' }] }, null, 2)
        }
      ]
    });
    expect(result.isError).toBeUndefined();
    expect(fake.call).toHaveBeenCalledWith('me/adaccounts', { fields: 'name,account_id,account_status,currency' });
  });

  it('should flag failed calls as errors', async () => {
    const result = await client.callTool({ name: 'get_ad_by_id', arguments: {} });

    expect(result.isError).toBe(true);
  });
});

describe('Tool catalogue', () => {
  it('should describe object inputs with their required identifiers', () => {
    const required = Object.fromEntries(TOOLS.map(tool => [tool.name, tool.inputSchema.required ?? []]));

    expect(TOOLS.every(tool => tool.inputSchema.type === 'object')).toBe(true);
    expect(required).toEqual({
      list_ad_accounts: [],
      get_details_of_ad_account: ['act_id'],
      get_campaigns_by_adaccount: ['act_id'],
      get_campaign_by_id: ['campaign_id'],
      get_adsets_by_campaign: ['campaign_id'],
      get_adset_by_id: ['adset_id'],
      get_ads_by_adset: ['adset_id'],
      get_ad_by_id: ['ad_id'],
      get_campaign_insights: ['campaign_id'],
      get_adset_insights: ['adset_id'],
      get_ad_insights: ['ad_id'],
      get_comprehensive_ad_report: ['act_id'],
      get_summary_report: ['act_id'],
      fetch_pagination_url: ['url']
    });
  });
});
