/**
 * Category Matcher
 * Picks one item for a slot by counting overlapping style tags
 */

import type { ClothingItem } from "./types.js";
import { mathRandom, pickRandom, type RandomSource } from "./random.js";

export interface CandidateScores {
  maxScore: number;
  /** Every candidate that reached maxScore, in input order */
  tied: ClothingItem[];
}

export function scoreItem(item: ClothingItem, desiredTags: ReadonlySet<string>): number {
  let score = 0;
  for (const tag of new Set(item.tags)) {
    if (desiredTags.has(tag)) score++;
  }
  return score;
}

export function scoreCandidates(
  candidates: readonly ClothingItem[],
  desiredTags: ReadonlySet<string>
): CandidateScores {
  let maxScore = 0;
  let tied: ClothingItem[] = [];

  for (const item of candidates) {
    const score = scoreItem(item, desiredTags);
    if (score > maxScore) {
      maxScore = score;
      tied = [item];
    } else if (score === maxScore) {
      tied.push(item);
    }
  }

  return { maxScore, tied };
}

/**
 * Best tag match among the candidates, ties broken at random.
 * With no desired tags, or nothing scoring above zero, any candidate
 * may be returned: a slot is only left empty when there is nothing in it.
 */
export function bestMatch(
  candidates: readonly ClothingItem[],
  desiredTags: ReadonlySet<string>,
  random: RandomSource = mathRandom
): ClothingItem | null {
  if (candidates.length === 0) return null;

  if (desiredTags.size > 0) {
    const { maxScore, tied } = scoreCandidates(candidates, desiredTags);
    if (maxScore > 0) {
      return pickRandom(tied, random);
    }
  }

  return pickRandom(candidates, random);
}
