import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { logger } from "hono/logger";
import { prettyJSON } from "hono/pretty-json";
import { cors } from "hono/cors";
import "dotenv/config";
import cron from "node-cron";

import { optionalAuthMiddleware, type AuthVariables } from "./middleware/auth.js";
import { createRateLimiter, OUTFIT_RATE_LIMIT } from "./middleware/rateLimit.js";
import { createOutfitsRoutes } from "./routes/outfits.js";
import { createSubscriptionsRoutes } from "./routes/subscriptions.js";
import { resetMonthlyQuota } from "./jobs/resetMonthlyQuota.js";
import { getUserWardrobe } from "./services/wardrobe.js";
import { OpenRouterSuggestionTransport } from "./services/ai/index.js";
import { DEFAULT_STATUS_INTERVAL_MS } from "./services/outfitGenerator.js";
import { checkOutfitQuota, supabaseUsageTracker } from "./utils/limits.js";
import { initSentry } from "./utils/sentry.js";

const CRON_SECRET = process.env.CRON_SECRET;

// Validate CRON_SECRET at startup to prevent "Bearer undefined" bypass
if (!CRON_SECRET || CRON_SECRET.length < 32) {
  console.error("FATAL: CRON_SECRET must be set and at least 32 characters");
  process.exit(1);
}

initSentry();

function parseInterval(raw: string | undefined): number {
  const parsed = raw ? parseInt(raw, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_STATUS_INTERVAL_MS;
}

/**
 * Initialize internal cron jobs using node-cron
 */
function initializeCronJobs() {
  console.log("[Cron] Initializing internal cron jobs...");

  // Monthly quota reset on 1st of each month at midnight UTC
  cron.schedule(
    "0 0 1 * *",
    async () => {
      console.log("[Cron] Starting monthly quota reset...");
      try {
        const result = await resetMonthlyQuota();
        console.log(`[Cron] Monthly quota reset completed: ${result.users_reset} users`);
      } catch (error) {
        console.error("[Cron] Monthly quota reset failed:", error);
      }
    },
    { timezone: "UTC" }
  );

  console.log("[Cron] All cron jobs initialized:");
  console.log("  - Monthly quota reset: 1st of month at midnight UTC");
}

const app = new Hono<{ Variables: AuthVariables }>();

// Global middleware
app.use("*", logger());
app.use("*", prettyJSON());
app.use(
  "*",
  cors({
    origin: "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization"],
  })
);

// Security headers
app.use("*", async (c, next) => {
  await next();
  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "strict-origin-when-cross-origin");
  if (process.env.NODE_ENV === "production") {
    c.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
  }
});

app.get("/", (c) => {
  return c.json({
    name: "Outfit Picker API",
    version: "1.0.0",
    status: "running",
  });
});

app.get("/health", (c) => {
  return c.json({ status: "healthy", timestamp: new Date().toISOString() });
});

// Monthly quota reset endpoint (protected by secret)
app.get("/cron/reset-quota", async (c) => {
  const authHeader = c.req.header("authorization");
  if (authHeader !== `Bearer ${CRON_SECRET}`) {
    return c.json({ error: "Unauthorized" }, 401);
  }

  console.log("[Cron] Starting monthly quota reset via HTTP trigger");

  try {
    const result = await resetMonthlyQuota();
    return c.json({
      message: "Monthly quota reset completed",
      ...result,
    });
  } catch (error) {
    console.error("[Cron] Quota reset failed:", error);
    return c.json(
      {
        success: false,
        error: "Quota reset failed",
        message: error instanceof Error ? error.message : "Unknown error",
      },
      500
    );
  }
});

const outfitsRoutes = createOutfitsRoutes({
  getWardrobe: getUserWardrobe,
  getQuotaStatus: checkOutfitQuota,
  createTransport: (userId) =>
    new OpenRouterSuggestionTransport({ userId, usage: supabaseUsageTracker }),
  statusIntervalMs: parseInterval(process.env.STATUS_INTERVAL_MS),
});

const subscriptionsRoutes = createSubscriptionsRoutes({ checkOutfitQuota });

const api = new Hono<{ Variables: AuthVariables }>();
// Guests may generate with local matching; routes that need a session check userId
api.use("*", optionalAuthMiddleware);
api.use("/outfits/*", createRateLimiter({ ...OUTFIT_RATE_LIMIT, prefix: "outfits" }));
api.route("/outfits", outfitsRoutes);
api.route("/subscription", subscriptionsRoutes);

app.route("/api", api);

// 404 handler
app.notFound((c) => {
  return c.json({ error: "Not found" }, 404);
});

// Error handler
app.onError((err, c) => {
  console.error("Unhandled error:", err);
  return c.json(
    {
      error: "Internal server error",
      message: process.env.NODE_ENV === "development" ? err.message : undefined,
    },
    500
  );
});

// Start server
const port = parseInt(process.env.PORT ?? "3000");

console.log(`Starting Outfit Picker API on port ${port}...`);

serve({
  fetch: app.fetch,
  port,
});

console.log(`Outfit Picker API running at http://localhost:${port}`);

initializeCronJobs();
