import { Hono } from "hono";
import { TIER_LIMITS, TIER_NAMES, type QuotaCheck } from "../constants/tiers.js";

type Variables = {
  userId: string | null;
};

export interface SubscriptionRouteDeps {
  checkOutfitQuota(userId: string): Promise<QuotaCheck>;
}

export function createSubscriptionsRoutes(deps: SubscriptionRouteDeps) {
  const subscriptions = new Hono<{ Variables: Variables }>();

  /**
   * GET / - Current tier and monthly outfit quota
   */
  subscriptions.get("/", async (c) => {
    const userId = c.get("userId") ?? null;
    if (!userId) {
      return c.json({ error: "Sign in to view your subscription", code: "NOT_AUTHENTICATED" }, 401);
    }

    const quota = await deps.checkOutfitQuota(userId);

    return c.json({
      tier: quota.tier,
      unlimited: quota.hasUnlimitedEntitlement,
      used: quota.used,
      limit: quota.limit,
      requests_remaining: quota.requestsRemaining,
      resets_at: quota.resetsAt.toISOString(),
    });
  });

  /**
   * GET /plans - Available tiers
   */
  subscriptions.get("/plans", (c) => {
    return c.json({
      plans: TIER_NAMES.map((tier) => ({
        tier,
        monthly_outfits: TIER_LIMITS[tier].monthlyOutfits,
        unlimited: TIER_LIMITS[tier].unlimited,
        price: TIER_LIMITS[tier].price,
        features: TIER_LIMITS[tier].features,
      })),
    });
  });

  return subscriptions;
}
