/**
 * Canned reasoning and style tips for locally matched outfits.
 * Copy lives in data/outfitCopy.json.
 */

import { isRecord, isStringArray, readDataFile } from "../../utils/loadData.js";
import { mathRandom, pickRandom, type RandomSource } from "./random.js";

interface ReasoningPool {
  category: string;
  keywords: string[];
  lines: string[];
}

interface TipRule {
  keywords: string[];
  tip: string;
}

export interface OutfitCopy {
  reasoning: ReasoningPool[];
  defaultReasoning: string[];
  tips: TipRule[];
  defaultTips: string[];
}

export interface OutfitDescription {
  reasoning: string;
  styleTip: string;
}

function parseCopy(raw: unknown): OutfitCopy {
  if (
    !isRecord(raw) ||
    !Array.isArray(raw.reasoning) ||
    !Array.isArray(raw.tips) ||
    !isStringArray(raw.defaultReasoning) ||
    !isStringArray(raw.defaultTips) ||
    raw.defaultReasoning.length === 0 ||
    raw.defaultTips.length === 0
  ) {
    throw new Error("outfitCopy.json is missing reasoning or tip pools");
  }

  const reasoning = raw.reasoning.map((pool, index): ReasoningPool => {
    if (
      !isRecord(pool) ||
      typeof pool.category !== "string" ||
      !isStringArray(pool.keywords) ||
      !isStringArray(pool.lines) ||
      pool.lines.length === 0
    ) {
      throw new Error(`outfitCopy.json: invalid reasoning pool at index ${index}`);
    }
    return { category: pool.category, keywords: pool.keywords, lines: pool.lines };
  });

  const tips = raw.tips.map((rule, index): TipRule => {
    if (!isRecord(rule) || !isStringArray(rule.keywords) || typeof rule.tip !== "string") {
      throw new Error(`outfitCopy.json: invalid tip at index ${index}`);
    }
    return { keywords: rule.keywords, tip: rule.tip };
  });

  return {
    reasoning,
    defaultReasoning: raw.defaultReasoning,
    tips,
    defaultTips: raw.defaultTips,
  };
}

export const DEFAULT_COPY: OutfitCopy = parseCopy(readDataFile("outfitCopy.json"));

function mentionsAny(promptLower: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => promptLower.includes(keyword));
}

/**
 * Occasion bucket used to pick reasoning copy ("default" when nothing matches)
 */
export function occasionCategory(prompt: string, copy: OutfitCopy = DEFAULT_COPY): string {
  const promptLower = prompt.toLowerCase();
  const pool = copy.reasoning.find((entry) => mentionsAny(promptLower, entry.keywords));
  return pool?.category ?? "default";
}

export function generateOutfitComment(
  prompt: string,
  random: RandomSource = mathRandom,
  copy: OutfitCopy = DEFAULT_COPY
): string {
  const promptLower = prompt.toLowerCase();
  const pool = copy.reasoning.find((entry) => mentionsAny(promptLower, entry.keywords));
  const lines = pool?.lines ?? copy.defaultReasoning;
  return pickRandom(lines, random) ?? copy.defaultReasoning[0];
}

export function generateStyleTip(
  prompt: string,
  random: RandomSource = mathRandom,
  copy: OutfitCopy = DEFAULT_COPY
): string {
  const promptLower = prompt.toLowerCase();
  const rule = copy.tips.find((entry) => mentionsAny(promptLower, entry.keywords));
  if (rule) return rule.tip;
  return pickRandom(copy.defaultTips, random) ?? copy.defaultTips[0];
}

export function describeOutfit(
  prompt: string,
  random: RandomSource = mathRandom,
  copy: OutfitCopy = DEFAULT_COPY
): OutfitDescription {
  return {
    reasoning: generateOutfitComment(prompt, random, copy),
    styleTip: generateStyleTip(prompt, random, copy),
  };
}
