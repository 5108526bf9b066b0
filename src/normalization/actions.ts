/**
 * Action list lookups
 *
 * Insights report heterogeneous events as [{action_type, value}] lists. Lookups match
 * on a substring of action_type, so "purchase" also finds
 * "offsite_conversion.fb_pixel_purchase" and "onsite_web_purchase".
 */

import type { ActionEntry } from '../validation/responses.js';

export type ActionValue = string | number | null;

/**
 * Candidate event names for the primary conversion, most specific first
 */
export const PURCHASE_ACTION_TYPES = [
  'purchase',
  'offsite_conversion.fb_pixel_purchase',
  'offsite_conversion',
  'onsite_conversion'
] as const;

/**
 * Value of the first entry whose action_type contains `actionType`.
 * The first matching entry decides, even when it carries no value.
 */
export function findActionValue(actions: readonly ActionEntry[] | undefined, actionType: string): ActionValue {
  if (!actions) {
    return null;
  }

  for (const action of actions) {
    if ((action.action_type ?? '').includes(actionType)) {
      return action.value ?? null;
    }
  }

  return null;
}

/**
 * Try each candidate in order and return the first non-null value.
 */
export function findFirstActionValue(
  actions: readonly ActionEntry[] | undefined,
  candidates: readonly string[]
): ActionValue {
  for (const candidate of candidates) {
    const value = findActionValue(actions, candidate);
    if (value !== null) {
      return value;
    }
  }

  return null;
}
