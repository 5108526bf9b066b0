/**
 * Field mapper: ad + insight record → comprehensive report row
 * Joins ad metadata with its insight metrics and flattens action lists into named fields
 */

import type { AdRecord, Creative, InsightRecord } from '../validation/responses.js';
import {
  findActionValue,
  findFirstActionValue,
  PURCHASE_ACTION_TYPES,
  type ActionValue
} from './actions.js';

type Metric = string | number | null;

/**
 * One row of the comprehensive ad report
 */
export interface AggregatedRow {
  ad_creative_id: string | null;
  ad_id: string;
  ad_name: string | null;
  campaign_id: string | null;
  campaign_name: string | null;
  ad_set_id: string | null;
  ad_set_name: string | null;
  ad_status: string | null;
  delivery: string | null;
  asset_url: string | null;

  reach: Metric;
  impressions: Metric;
  frequency: Metric;
  purchases: ActionValue;
  cost_per_purchase: ActionValue;
  clicks_all: Metric;
  unique_clicks_all: Metric;
  ctr_all: Metric;
  unique_ctr_all: Metric;
  cpc_all: Metric;
  cpm: Metric;

  video_3_sec_plays: ActionValue;
  video_plays_25_percent: ActionValue;
  video_plays_50_percent: ActionValue;
  video_plays_75_percent: ActionValue;
  video_plays_100_percent: ActionValue;
  video_plays: ActionValue;
  thru_plays: ActionValue;

  adds_to_cart: ActionValue;
  content_views: ActionValue;
  checkouts_initiated: ActionValue;
  landing_page_views: ActionValue;
  link_clicks: ActionValue;
  outbound_clicks: ActionValue;

  post_reactions: ActionValue;
  post_comments: ActionValue;
  post_saves: ActionValue;
  post_shares: ActionValue;
  post_engagement: ActionValue;
  page_likes: ActionValue;

  amount_spent: Metric;
}

function hasKeys(value: object | undefined): boolean {
  return value !== undefined && Object.keys(value).length > 0;
}

/**
 * Preview for the ad's creative: thumbnail, then image, then the story's video id
 */
export function extractAssetUrl(creative: Creative | undefined): string | null {
  if (!creative || !hasKeys(creative)) {
    return null;
  }

  const direct = creative.thumbnail_url || creative.image_url;
  if (direct) {
    return direct;
  }

  const videoData = creative.object_story_spec?.video_data;
  if (videoData && hasKeys(videoData)) {
    return `Video ID: ${videoData.video_id ?? 'N/A'}`;
  }

  return null;
}

/**
 * Map an ad and its insight record to a report row.
 * Nested campaign/adset objects win over the flat *_id fields when both are present.
 */
export function mapToAggregatedRow(ad: AdRecord, insight: InsightRecord): AggregatedRow {
  const creative = ad.creative && hasKeys(ad.creative) ? ad.creative : undefined;
  const campaign = ad.campaign && hasKeys(ad.campaign) ? ad.campaign : undefined;
  const adset = ad.adset && hasKeys(ad.adset) ? ad.adset : undefined;

  const actions = insight.actions;
  const costPerAction = insight.cost_per_action_type;

  return {
    ad_creative_id: creative?.id ?? null,
    ad_id: ad.id,
    ad_name: ad.name ?? null,
    campaign_id: campaign ? campaign.id ?? null : ad.campaign_id ?? null,
    campaign_name: campaign?.name ?? null,
    ad_set_id: adset ? adset.id ?? null : ad.adset_id ?? null,
    ad_set_name: adset?.name ?? null,
    ad_status: ad.status ?? null,
    delivery: ad.effective_status ?? null,
    asset_url: extractAssetUrl(creative),

    reach: insight.reach ?? null,
    impressions: insight.impressions ?? null,
    frequency: insight.frequency ?? null,
    purchases: findFirstActionValue(actions, PURCHASE_ACTION_TYPES),
    cost_per_purchase: findFirstActionValue(costPerAction, PURCHASE_ACTION_TYPES),
    clicks_all: insight.clicks ?? null,
    unique_clicks_all: insight.unique_clicks ?? null,
    ctr_all: insight.ctr ?? null,
    unique_ctr_all: insight.unique_ctr ?? null,
    cpc_all: insight.cpc ?? null,
    cpm: insight.cpm ?? null,

    video_3_sec_plays: findActionValue(insight.video_continuous_2_sec_watched_actions, 'video_view'),
    video_plays_25_percent: findActionValue(insight.video_p25_watched_actions, 'video_view'),
    video_plays_50_percent: findActionValue(insight.video_p50_watched_actions, 'video_view'),
    video_plays_75_percent: findActionValue(insight.video_p75_watched_actions, 'video_view'),
    video_plays_100_percent: findActionValue(insight.video_p100_watched_actions, 'video_view'),
    video_plays: findActionValue(insight.video_play_actions, 'video_view'),
    thru_plays: findActionValue(insight.video_thruplay_watched_actions, 'video_view'),

    adds_to_cart: findFirstActionValue(actions, ['add_to_cart', 'offsite_conversion.fb_pixel_add_to_cart']),
    content_views: findFirstActionValue(actions, ['view_content', 'offsite_conversion.fb_pixel_view_content']),
    checkouts_initiated: findFirstActionValue(actions, [
      'initiate_checkout',
      'offsite_conversion.fb_pixel_initiate_checkout'
    ]),
    landing_page_views: findActionValue(actions, 'landing_page_view'),
    link_clicks: findActionValue(actions, 'link_click'),
    outbound_clicks: findActionValue(actions, 'outbound_click'),

    post_reactions: findActionValue(actions, 'post_reaction'),
    post_comments: findActionValue(actions, 'comment'),
    post_saves: findActionValue(actions, 'post_save'),
    post_shares: findActionValue(actions, 'post_share'),
    post_engagement: findActionValue(actions, 'post_engagement'),
    page_likes: findActionValue(actions, 'like'),

    amount_spent: insight.spend ?? null
  };
}
