/**
 * AI Outfit Suggestions
 * Asks the LLM stylist to pick one item per slot from the caller's wardrobe
 */

import type { AISuggestion } from "../styling/types.js";
import { isRecord } from "../../utils/loadData.js";
import {
  classifyCompletionFailure,
  completeWithFallback,
  extractJson,
  isOpenRouterAvailable,
  type CompletionFn,
} from "./openrouter.js";
import {
  SuggestionError,
  type SuggestionItem,
  type SuggestionRequest,
  type SuggestionTransport,
} from "./types.js";

export const DEFAULT_REASONING = "A stylish outfit for your occasion!";
export const DEFAULT_STYLE_TIP = "Accessorize to make it your own!";

/**
 * Usage accounting the transport needs from the subscription store
 */
export interface UsageTracker {
  canGenerateOutfit(userId: string): Promise<boolean>;
  trackOutfitGeneration(userId: string): Promise<void>;
}

export interface OpenRouterSuggestionOptions {
  /** Signed-in user, or null for a guest */
  userId: string | null;
  usage: UsageTracker;
  complete?: CompletionFn;
  isAvailable?: () => boolean;
}

function formatItems(items: SuggestionItem[]): string {
  if (items.length === 0) return "  (none available)";
  return items
    .map((item, idx) => {
      const tags = item.tags.length > 0 ? item.tags.join(", ") : "none";
      return `  ${idx + 1}. ID: "${item.id}" - Tags: [${tags}]`;
    })
    .join("\n");
}

export function buildStylistPrompt(request: SuggestionRequest): string {
  const { prompt, availableItems, userStyle } = request;
  const byCategory = (category: SuggestionItem["category"]) =>
    availableItems.filter((item) => item.category === category);

  return `You are a professional fashion stylist. Select the best outfit for: "${prompt}"
${userStyle ? `\nThe user describes their style as: ${userStyle}\n` : ""}
AVAILABLE ITEMS (select ONE from each category that has items):

TOPS:
${formatItems(byCategory("top"))}

BOTTOMS:
${formatItems(byCategory("bottom"))}

SHOES:
${formatItems(byCategory("shoes"))}

OUTERWEAR:
${formatItems(byCategory("outerwear"))}

Select items that work well together for the occasion. If a category has no suitable items or is empty, set that ID to null.

Respond ONLY with valid JSON (no markdown):
{
  "top_id": "selected-top-id-or-null",
  "bottom_id": "selected-bottom-id-or-null",
  "shoes_id": "selected-shoes-id-or-null",
  "outerwear_id": "selected-outerwear-id-or-null-if-not-needed",
  "reasoning": "Brief explanation of why these items work together for the occasion",
  "style_tip": "One helpful styling tip for wearing this outfit"
}`;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

/**
 * Turn the model's JSON into a suggestion, keeping only ids that were offered
 */
export function parseStylistResponse(
  content: string,
  availableItems: SuggestionItem[]
): AISuggestion {
  const parsed = extractJson(content);
  if (!isRecord(parsed)) {
    throw new SuggestionError("INVALID_RESPONSE", "Stylist response is not a JSON object");
  }

  const response = parsed;
  const knownIds = new Set(availableItems.map((item) => item.id));

  const selectedItemIds = [
    response.top_id,
    response.bottom_id,
    response.shoes_id,
    response.outerwear_id,
  ].filter((id): id is string => typeof id === "string" && knownIds.has(id));

  return {
    selectedItemIds,
    reasoning: nonEmptyString(response.reasoning) ?? DEFAULT_REASONING,
    styleTip: nonEmptyString(response.style_tip) ?? DEFAULT_STYLE_TIP,
    matchScore: typeof response.match_score === "number" ? response.match_score : null,
  };
}

export class OpenRouterSuggestionTransport implements SuggestionTransport {
  private readonly userId: string | null;
  private readonly usage: UsageTracker;
  private readonly complete: CompletionFn;
  private readonly isAvailable: () => boolean;

  constructor(options: OpenRouterSuggestionOptions) {
    this.userId = options.userId;
    this.usage = options.usage;
    this.complete = options.complete ?? completeWithFallback;
    this.isAvailable = options.isAvailable ?? isOpenRouterAvailable;
  }

  async generateSuggestion(request: SuggestionRequest): Promise<AISuggestion> {
    const userId = this.userId;
    if (!userId) {
      throw new SuggestionError("NOT_AUTHENTICATED", "Sign in required for AI styling");
    }

    const canProceed = await this.usage.canGenerateOutfit(userId);
    if (!canProceed) {
      throw new SuggestionError("USAGE_LIMIT_REACHED", "Monthly outfit limit reached");
    }

    if (!this.isAvailable()) {
      throw new SuggestionError("NOT_CONFIGURED", "OpenRouter is not configured");
    }

    let content: string;
    try {
      console.log(`[Suggestions] Requesting outfit for ${request.availableItems.length} items`);
      content = await this.complete(
        [{ role: "user", content: buildStylistPrompt(request) }],
        { max_tokens: 800, temperature: 0.7 }
      );
    } catch (err) {
      if (err instanceof SuggestionError) throw err;
      const errorMessage = err instanceof Error ? err.message : String(err);
      throw new SuggestionError(classifyCompletionFailure(err), errorMessage, { cause: err });
    }

    const suggestion = parseStylistResponse(content, request.availableItems);

    await this.usage.trackOutfitGeneration(userId);

    return suggestion;
  }
}
