export { tagsFor, needsOuterwear, DEFAULT_LEXICON } from "./tagLexicon.js";
export type { TagLexicon, PromptTags, KeywordMapping } from "./tagLexicon.js";
export { bestMatch, scoreCandidates, scoreItem } from "./categoryMatcher.js";
export type { CandidateScores } from "./categoryMatcher.js";
export { composeOutfit, groupBySlot } from "./outfitComposer.js";
export { describeOutfit, generateOutfitComment, generateStyleTip, occasionCategory } from "./outfitCopy.js";
export type { OutfitDescription } from "./outfitCopy.js";
export { reconcileSuggestion } from "./aiReconciliation.js";
export { mathRandom, seededRandom, pickRandom } from "./random.js";
export type { RandomSource } from "./random.js";
export * from "./types.js";
