/**
 * Local Outfit Composer
 * Rule-based outfit selection used when the AI stylist is off or fails
 */

import { bestMatch } from "./categoryMatcher.js";
import { mathRandom, type RandomSource } from "./random.js";
import { DEFAULT_LEXICON, needsOuterwear, tagsFor, type TagLexicon } from "./tagLexicon.js";
import {
  createGeneratedOutfit,
  isOutfitSlot,
  type ClothingItem,
  type GeneratedOutfit,
  type OutfitSlot,
} from "./types.js";

/**
 * Split a wardrobe into slot pools. Accessories never take part in composition.
 */
export function groupBySlot(wardrobe: readonly ClothingItem[]): Record<OutfitSlot, ClothingItem[]> {
  const groups: Record<OutfitSlot, ClothingItem[]> = {
    top: [],
    bottom: [],
    shoes: [],
    outerwear: [],
  };

  for (const item of wardrobe) {
    if (isOutfitSlot(item.category)) {
      groups[item.category].push(item);
    }
  }

  return groups;
}

export function composeOutfit(
  prompt: string,
  wardrobe: readonly ClothingItem[],
  random: RandomSource = mathRandom,
  lexicon: TagLexicon = DEFAULT_LEXICON
): GeneratedOutfit {
  const { matchedKeywords, tags } = tagsFor(prompt, lexicon);
  const includeOuterwear = needsOuterwear(prompt, lexicon);
  const groups = groupBySlot(wardrobe);

  return createGeneratedOutfit(
    {
      top: bestMatch(groups.top, tags, random),
      bottom: bestMatch(groups.bottom, tags, random),
      shoes: bestMatch(groups.shoes, tags, random),
      outerwear: includeOuterwear ? bestMatch(groups.outerwear, tags, random) : null,
    },
    matchedKeywords
  );
}
