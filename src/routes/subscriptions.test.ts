import { Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import { createSubscriptionsRoutes } from "./subscriptions.js";
import type { QuotaCheck } from "../constants/tiers.js";

function setup(userId: string | null) {
  const checkOutfitQuota = vi.fn(
    async (_userId: string): Promise<QuotaCheck> => ({
      tier: "free",
      used: 2,
      limit: 5,
      requestsRemaining: 3,
      hasUnlimitedEntitlement: false,
      resetsAt: new Date("2026-11-01T00:00:00Z"),
    })
  );

  const app = new Hono<{ Variables: { userId: string | null } }>();
  app.use("*", async (c, next) => {
    c.set("userId", userId);
    await next();
  });
  app.route("/subscription", createSubscriptionsRoutes({ checkOutfitQuota }));

  return { app, checkOutfitQuota };
}

describe("GET /subscription", () => {
  it("returns the caller's quota", async () => {
    const { app, checkOutfitQuota } = setup("user-1");

    const res = await app.request("/subscription");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      tier: "free",
      unlimited: false,
      used: 2,
      limit: 5,
      requests_remaining: 3,
      resets_at: "2026-11-01T00:00:00.000Z",
    });
    expect(checkOutfitQuota).toHaveBeenCalledWith("user-1");
  });

  it("requires a signed-in user", async () => {
    const { app, checkOutfitQuota } = setup(null);

    const res = await app.request("/subscription");

    expect(res.status).toBe(401);
    expect(checkOutfitQuota).not.toHaveBeenCalled();
  });
});

describe("GET /subscription/plans", () => {
  it("lists both tiers for guests too", async () => {
    const { app } = setup(null);

    const res = await app.request("/subscription/plans");
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      plans: [
        { tier: "free", monthly_outfits: 5, unlimited: false, price: 0 },
        { tier: "premium", monthly_outfits: 100, unlimited: true, price: 9.99 },
      ],
    });
  });
});
