import { supabaseAdmin, getUserSubscription } from "../services/supabase.js";
import { resolveQuota, type QuotaCheck } from "../constants/tiers.js";
import type { UsageTracker } from "../services/ai/outfitSuggestions.js";

/**
 * Check monthly outfit generation quota for a user
 * Free: 5/month, Premium: unlimited
 */
export async function checkOutfitQuota(userId: string): Promise<QuotaCheck> {
  const subscription = await getUserSubscription(userId);
  return resolveQuota(subscription);
}

export async function canGenerateOutfit(userId: string): Promise<boolean> {
  const quota = await checkOutfitQuota(userId);
  return quota.hasUnlimitedEntitlement || quota.requestsRemaining > 0;
}

/**
 * Count one AI generation against the user's monthly quota
 */
export async function trackOutfitGeneration(userId: string): Promise<void> {
  const subscription = await getUserSubscription(userId);

  if (!subscription) {
    const { error } = await supabaseAdmin.from("user_subscriptions").insert({
      user_id: userId,
      subscription_tier: "free",
      monthly_outfits_used: 1,
    });

    if (error) {
      console.error("[Quota] Failed to create subscription row:", error);
    }
    return;
  }

  const { error } = await supabaseAdmin
    .from("user_subscriptions")
    .update({
      monthly_outfits_used: subscription.monthly_outfits_used + 1,
      updated_at: new Date().toISOString(),
    })
    .eq("id", subscription.id);

  if (error) {
    console.error("[Quota] Failed to record outfit generation:", error);
  }
}

export const supabaseUsageTracker: UsageTracker = {
  canGenerateOutfit,
  trackOutfitGeneration,
};
