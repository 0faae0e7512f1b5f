import { supabaseAdmin, type WardrobeItemRow } from "./supabase.js";
import { parseCategory, type ClothingItem } from "./styling/types.js";

type WardrobeSelection = Pick<WardrobeItemRow, "id" | "category" | "tags" | "image_path" | "created_at">;

export function mapWardrobeRow(row: WardrobeSelection): ClothingItem | null {
  const category = parseCategory(row.category);
  if (!category) {
    console.warn(`[Wardrobe] Skipping item ${row.id} with unknown category "${row.category}"`);
    return null;
  }

  return {
    id: row.id,
    category,
    tags: row.tags ?? [],
    imagePath: row.image_path,
    dateAdded: row.created_at,
  };
}

/**
 * Fetch the user's active wardrobe. Errors yield an empty wardrobe.
 */
export async function getUserWardrobe(userId: string): Promise<ClothingItem[]> {
  const { data, error } = await supabaseAdmin
    .from("wardrobe_items")
    .select("id, category, tags, image_path, created_at")
    .eq("user_id", userId)
    .eq("is_archived", false)
    .order("created_at", { ascending: true });

  if (error) {
    console.error("[Wardrobe] Failed to fetch wardrobe:", error);
    return [];
  }

  const rows: WardrobeSelection[] = data ?? [];
  return rows
    .map(mapWardrobeRow)
    .filter((item): item is ClothingItem => item !== null);
}
