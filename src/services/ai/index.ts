export {
  classifyCompletionFailure,
  completeWithFallback,
  extractJson,
  isOpenRouterAvailable,
  MODEL_CHAIN,
} from "./openrouter.js";
export type { ChatMessage, CompletionFn, CompletionOptions } from "./openrouter.js";
export {
  OpenRouterSuggestionTransport,
  buildStylistPrompt,
  parseStylistResponse,
  DEFAULT_REASONING,
  DEFAULT_STYLE_TIP,
} from "./outfitSuggestions.js";
export type { UsageTracker, OpenRouterSuggestionOptions } from "./outfitSuggestions.js";
export { SuggestionError, suggestionErrorKind } from "./types.js";
export type {
  SuggestionErrorKind,
  SuggestionItem,
  SuggestionRequest,
  SuggestionTransport,
} from "./types.js";
