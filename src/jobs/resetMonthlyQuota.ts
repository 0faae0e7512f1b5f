/**
 * Monthly Quota Reset Cron Job
 * Runs on the 1st of each month at midnight UTC and zeroes every
 * user's outfit generation count.
 */

import { supabaseAdmin } from "../services/supabase.js";

interface QuotaResetResult {
  success: boolean;
  users_reset: number;
  duration_ms: number;
}

export async function resetMonthlyQuota(): Promise<QuotaResetResult> {
  const startTime = Date.now();
  console.log("[QuotaReset] Starting monthly quota reset");

  const now = new Date().toISOString();
  const { data, error } = await supabaseAdmin
    .from("user_subscriptions")
    .update({
      monthly_outfits_used: 0,
      quota_reset_at: now,
      updated_at: now,
    })
    .gt("monthly_outfits_used", 0)
    .select("id");

  if (error) {
    throw new Error(`Failed to reset quota: ${error.message}`);
  }

  const usersReset = data?.length ?? 0;
  const durationMs = Date.now() - startTime;
  console.log(`[QuotaReset] Reset ${usersReset} users in ${durationMs}ms`);

  return {
    success: true,
    users_reset: usersReset,
    duration_ms: durationMs,
  };
}
