/**
 * Tier system constants
 * Defines outfit generation limits for free and premium subscription tiers
 */

import type { UserSubscription } from "../services/supabase.js";

export const TIER_LIMITS = {
  free: {
    monthlyOutfits: 5,
    unlimited: false,
    price: 0,
    features: ["5 generations per month", "Basic AI styling"],
  },
  premium: {
    // Advertised allowance; premium is not gated on it
    monthlyOutfits: 100,
    unlimited: true,
    price: 9.99,
    features: [
      "100 generations per month",
      "Advanced AI styling",
      "Early access to features",
    ],
  },
} as const;

export type TierName = keyof typeof TIER_LIMITS;

export const TIER_NAMES: readonly TierName[] = ["free", "premium"];

export interface QuotaCheck {
  tier: TierName;
  used: number;
  limit: number;
  requestsRemaining: number;
  hasUnlimitedEntitlement: boolean;
  resetsAt: Date;
}

/**
 * First instant of next month, when monthly usage resets
 */
export function getNextMonthStart(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
}

/**
 * Premium counts only while its expiry is in the future (or unset)
 */
export function hasActivePremium(
  subscription: Pick<UserSubscription, "subscription_tier" | "expiry_date"> | null,
  now: Date = new Date()
): boolean {
  if (!subscription || subscription.subscription_tier !== "premium") return false;
  if (!subscription.expiry_date) return true;
  return new Date(subscription.expiry_date) >= now;
}

/**
 * Work out remaining monthly generations. A missing row is a free user
 * who has not generated anything yet.
 */
export function resolveQuota(
  subscription: Pick<
    UserSubscription,
    "subscription_tier" | "expiry_date" | "monthly_outfits_used" | "monthly_outfit_limit"
  > | null,
  now: Date = new Date()
): QuotaCheck {
  const isPremium = hasActivePremium(subscription, now);
  const tier: TierName = isPremium ? "premium" : "free";
  const used = subscription?.monthly_outfits_used ?? 0;
  // A stored limit belongs to the tier it was set for; lapsed premium gets the free default
  const storedLimit =
    subscription?.subscription_tier === tier ? subscription.monthly_outfit_limit : null;
  const limit = storedLimit ?? TIER_LIMITS[tier].monthlyOutfits;

  return {
    tier,
    used,
    limit,
    requestsRemaining: Math.max(0, limit - used),
    hasUnlimitedEntitlement: isPremium,
    resetsAt: getNextMonthStart(now),
  };
}
