import { createClient } from "@supabase/supabase-js";
import "dotenv/config";

const supabaseUrl = process.env.SUPABASE_URL;
const supabaseServiceKey = process.env.SUPABASE_SERVICE_KEY;

if (!supabaseUrl || !supabaseServiceKey) {
  throw new Error("Missing SUPABASE_URL or SUPABASE_SERVICE_KEY");
}

export const supabaseAdmin = createClient(supabaseUrl, supabaseServiceKey, {
  auth: {
    autoRefreshToken: false,
    persistSession: false,
  },
});

// Type definitions for database tables

export interface WardrobeItemRow {
  id: string;
  user_id: string;
  category: string;
  tags: string[] | null;
  image_path: string | null;
  is_archived: boolean;
  created_at: string;
}

export interface UserSubscription {
  id: string;
  user_id: string;
  subscription_tier: "free" | "premium";
  monthly_outfits_used: number;
  monthly_outfit_limit: number | null;
  expiry_date: string | null;
  quota_reset_at: string | null;
  created_at: string;
  updated_at: string;
}

// Helper functions

export async function getUserSubscription(
  userId: string
): Promise<UserSubscription | null> {
  const { data, error } = await supabaseAdmin
    .from("user_subscriptions")
    .select("*")
    .eq("user_id", userId)
    .single();

  if (error && error.code !== "PGRST116") {
    console.error("Error fetching subscription:", error);
    return null;
  }
  return data;
}
