/**
 * Outfit domain types shared by the matcher, composer and reconciliation.
 */

export const CLOTHING_CATEGORIES = ["top", "bottom", "shoes", "outerwear", "accessory"] as const;

export type ClothingCategory = (typeof CLOTHING_CATEGORIES)[number];

// Slot order is the order items are listed in a generated outfit
export const OUTFIT_SLOTS = ["top", "bottom", "shoes", "outerwear"] as const;

export type OutfitSlot = (typeof OUTFIT_SLOTS)[number];

export interface ClothingItem {
  id: string;
  category: ClothingCategory;
  tags: string[];
  imagePath?: string | null;
  dateAdded?: string | null;
}

export interface GeneratedOutfit {
  readonly top: ClothingItem | null;
  readonly bottom: ClothingItem | null;
  readonly shoes: ClothingItem | null;
  readonly outerwear: ClothingItem | null;
  readonly matchedKeywords: readonly string[];
  /** Filled slots in slot order */
  readonly items: readonly ClothingItem[];
  /** Outerwear alone never makes an outfit */
  readonly isValid: boolean;
}

export type OutfitSlots = Record<OutfitSlot, ClothingItem | null>;

/**
 * Suggestion returned by the remote stylist, before it is matched
 * against the live wardrobe.
 */
export interface AISuggestion {
  selectedItemIds: string[];
  reasoning: string;
  styleTip: string | null;
  matchScore: number | null;
}

export function createGeneratedOutfit(
  slots: Partial<OutfitSlots>,
  matchedKeywords: readonly string[] = []
): GeneratedOutfit {
  const top = slots.top ?? null;
  const bottom = slots.bottom ?? null;
  const shoes = slots.shoes ?? null;
  const outerwear = slots.outerwear ?? null;

  const items = [top, bottom, shoes, outerwear].filter(
    (item): item is ClothingItem => item !== null
  );

  return Object.freeze({
    top,
    bottom,
    shoes,
    outerwear,
    matchedKeywords: Object.freeze([...matchedKeywords]),
    items: Object.freeze(items),
    isValid: top !== null || bottom !== null || shoes !== null,
  });
}

export function isClothingCategory(value: string): value is ClothingCategory {
  return CLOTHING_CATEGORIES.some((category) => category === value);
}

/**
 * Normalise a stored category label ("Top", " shoes ") to a ClothingCategory
 */
export function parseCategory(raw: string | null | undefined): ClothingCategory | null {
  if (!raw) return null;
  const normalized = raw.toLowerCase().trim();
  return isClothingCategory(normalized) ? normalized : null;
}

export function isOutfitSlot(category: ClothingCategory): category is OutfitSlot {
  return category !== "accessory";
}
