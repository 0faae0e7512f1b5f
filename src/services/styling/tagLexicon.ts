/**
 * Tag Lexicon
 * Maps occasion keywords found in a free-text prompt to wardrobe style tags
 */

import { isRecord, isStringArray, readDataFile } from "../../utils/loadData.js";

export interface KeywordMapping {
  keyword: string;
  tags: string[];
}

export interface TagLexicon {
  keywords: KeywordMapping[];
  outerwearTriggers: string[];
}

export interface PromptTags {
  /** Matching keywords in table order, not prompt order */
  matchedKeywords: string[];
  tags: Set<string>;
}

function parseLexicon(raw: unknown): TagLexicon {
  if (!isRecord(raw) || !Array.isArray(raw.keywords) || !isStringArray(raw.outerwearTriggers)) {
    throw new Error("tagLexicon.json must contain keywords and outerwearTriggers");
  }

  const keywords = raw.keywords.map((entry, index): KeywordMapping => {
    if (!isRecord(entry) || typeof entry.keyword !== "string" || !isStringArray(entry.tags)) {
      throw new Error(`tagLexicon.json: invalid keyword entry at index ${index}`);
    }
    return { keyword: entry.keyword.toLowerCase(), tags: entry.tags };
  });

  return {
    keywords,
    outerwearTriggers: raw.outerwearTriggers.map((trigger) => trigger.toLowerCase()),
  };
}

export const DEFAULT_LEXICON: TagLexicon = parseLexicon(readDataFile("tagLexicon.json"));

/**
 * Collect the style tags implied by a prompt.
 * Keywords match by substring, so "gymnastics" still hits "gym".
 */
export function tagsFor(prompt: string, lexicon: TagLexicon = DEFAULT_LEXICON): PromptTags {
  const promptLower = prompt.toLowerCase();
  const matchedKeywords: string[] = [];
  const tags = new Set<string>();

  for (const { keyword, tags: keywordTags } of lexicon.keywords) {
    if (promptLower.includes(keyword)) {
      matchedKeywords.push(keyword);
      for (const tag of keywordTags) {
        tags.add(tag);
      }
    }
  }

  return { matchedKeywords, tags };
}

export function needsOuterwear(prompt: string, lexicon: TagLexicon = DEFAULT_LEXICON): boolean {
  const promptLower = prompt.toLowerCase();
  return lexicon.outerwearTriggers.some((trigger) => promptLower.includes(trigger));
}
