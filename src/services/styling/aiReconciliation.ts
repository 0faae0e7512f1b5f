import {
  createGeneratedOutfit,
  isOutfitSlot,
  type AISuggestion,
  type ClothingItem,
  type GeneratedOutfit,
  type OutfitSlots,
} from "./types.js";

/**
 * Map the stylist's selected ids back onto the live wardrobe.
 * The first id that resolves for a category wins its slot; accessories
 * and ids that no longer exist are dropped.
 */
export function reconcileSuggestion(
  suggestion: AISuggestion,
  wardrobe: readonly ClothingItem[]
): GeneratedOutfit {
  const itemMap = new Map(wardrobe.map((item) => [item.id, item]));
  const slots: Partial<OutfitSlots> = {};

  for (const itemId of suggestion.selectedItemIds) {
    const item = itemMap.get(itemId);
    if (!item || !isOutfitSlot(item.category)) continue;
    if (slots[item.category]) continue;
    slots[item.category] = item;
  }

  return createGeneratedOutfit(slots, []);
}
