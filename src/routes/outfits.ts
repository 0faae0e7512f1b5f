import { Hono } from "hono";
import {
  INITIAL_STATE,
  OutfitGenerator,
  type GenerationError,
  type GenerationErrorKind,
  type GenerationState,
  type QuotaStatus,
} from "../services/outfitGenerator.js";
import type { SuggestionTransport } from "../services/ai/types.js";
import type { RandomSource } from "../services/styling/random.js";
import {
  parseCategory,
  type ClothingItem,
  type GeneratedOutfit,
} from "../services/styling/types.js";
import { isRecord, isStringArray } from "../utils/loadData.js";
import type { Ticker } from "../utils/ticker.js";
import { MAX_PROMPT_LENGTH, PROMPT_SUGGESTIONS } from "../constants/prompts.js";

type Variables = {
  userId: string | null;
};

export interface OutfitRouteDeps {
  getWardrobe(userId: string): Promise<ClothingItem[]>;
  getQuotaStatus(userId: string): Promise<QuotaStatus | null>;
  createTransport(userId: string | null): SuggestionTransport;
  random?: RandomSource;
  ticker?: Ticker;
  statusIntervalMs?: number;
  /** Signed-in generators kept for status polling */
  maxSessions?: number;
}

const DEFAULT_MAX_SESSIONS = 1000;

const ERROR_STATUS: Record<GenerationErrorKind, 400 | 401 | 429> = {
  EMPTY_PROMPT: 400,
  EMPTY_WARDROBE: 400,
  NOT_AUTHENTICATED: 401,
  QUOTA_EXCEEDED: 429,
};

interface GenerateBody {
  prompt: string;
  items: ClothingItem[] | null;
}

/**
 * Validate the generate request body. Returns an error message when invalid.
 */
export function parseGenerateBody(body: unknown): GenerateBody | string {
  if (!isRecord(body)) return "Request body must be a JSON object";

  const { prompt, items } = body;
  if (typeof prompt !== "string") return "prompt must be a string";
  if (prompt.length > MAX_PROMPT_LENGTH) {
    return `prompt must be at most ${MAX_PROMPT_LENGTH} characters`;
  }

  if (items === undefined || items === null) {
    return { prompt, items: null };
  }
  if (!Array.isArray(items)) return "items must be an array";

  const rawItems: unknown[] = items;
  const parsed: ClothingItem[] = [];
  for (const [index, raw] of rawItems.entries()) {
    if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.length === 0) {
      return `items[${index}].id must be a non-empty string`;
    }
    const category = typeof raw.category === "string" ? parseCategory(raw.category) : null;
    if (!category) {
      return `items[${index}].category must be one of top, bottom, shoes, outerwear, accessory`;
    }
    const tags = raw.tags ?? [];
    if (!isStringArray(tags)) {
      return `items[${index}].tags must be an array of strings`;
    }
    parsed.push({ id: raw.id, category, tags });
  }

  return { prompt, items: parsed };
}

function serializeItem(item: ClothingItem | null) {
  if (!item) return null;
  return {
    id: item.id,
    category: item.category,
    tags: item.tags,
    image_path: item.imagePath ?? null,
  };
}

export function serializeOutfit(outfit: GeneratedOutfit) {
  return {
    top: serializeItem(outfit.top),
    bottom: serializeItem(outfit.bottom),
    shoes: serializeItem(outfit.shoes),
    outerwear: serializeItem(outfit.outerwear),
    item_ids: outfit.items.map((item) => item.id),
    matched_keywords: outfit.matchedKeywords,
  };
}

function serializeError(error: GenerationError | null) {
  if (!error) return null;
  return {
    code: error.kind,
    message: error.message,
    show_upgrade_offer: error.showUpgradeOffer,
  };
}

function serializeState(state: GenerationState) {
  return {
    phase: state.phase,
    is_generating: state.isGenerating,
    status_message: state.currentStatusMessage,
    last_reasoning: state.lastReasoning,
    last_style_tip: state.lastStyleTip,
    last_error: serializeError(state.lastError),
    show_upgrade_offer: state.showUpgradeOffer,
    last_source: state.lastSource,
    outfit: state.generatedOutfit ? serializeOutfit(state.generatedOutfit) : null,
  };
}

export function createOutfitsRoutes(deps: OutfitRouteDeps) {
  const outfits = new Hono<{ Variables: Variables }>();
  const generators = new Map<string, OutfitGenerator>();
  const maxSessions = deps.maxSessions ?? DEFAULT_MAX_SESSIONS;

  function createGenerator(userId: string | null): OutfitGenerator {
    return new OutfitGenerator({
      transport: deps.createTransport(userId),
      session: { isAIEnabled: () => userId !== null },
      quota: {
        getQuotaStatus: async () => (userId ? deps.getQuotaStatus(userId) : null),
      },
      random: deps.random,
      ticker: deps.ticker,
      statusIntervalMs: deps.statusIntervalMs,
    });
  }

  // Guests get a throwaway generator; signed-in users keep theirs for /status
  function generatorFor(userId: string | null): OutfitGenerator {
    if (!userId) return createGenerator(null);

    const existing = generators.get(userId);
    if (existing) {
      // Re-insert to keep the map in least-recently-used order
      generators.delete(userId);
      generators.set(userId, existing);
      return existing;
    }

    const generator = createGenerator(userId);
    generators.set(userId, generator);

    if (generators.size > maxSessions) {
      for (const [key, candidate] of generators) {
        if (generators.size <= maxSessions) break;
        if (!candidate.getState().isGenerating) generators.delete(key);
      }
    }

    return generator;
  }

  /**
   * POST /generate - Pick an outfit for a free-text occasion
   */
  outfits.post("/generate", async (c) => {
    const userId = c.get("userId") ?? null;

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Request body must be valid JSON", code: "INVALID_BODY" }, 400);
    }

    const parsed = parseGenerateBody(body);
    if (typeof parsed === "string") {
      return c.json({ error: parsed, code: "INVALID_BODY" }, 400);
    }

    const { prompt, items } = parsed;

    // A blank prompt is rejected before the wardrobe would be used
    const wardrobe =
      items ?? (userId && prompt.trim().length > 0 ? await deps.getWardrobe(userId) : []);

    const outcome = await generatorFor(userId).generate(prompt, wardrobe);

    switch (outcome.status) {
      case "success":
        return c.json({
          status: "success",
          source: outcome.source,
          outfit: serializeOutfit(outcome.outfit),
          reasoning: outcome.reasoning,
          style_tip: outcome.styleTip,
        });
      case "empty":
        return c.json({
          status: "empty",
          source: outcome.source,
          message: outcome.message,
          reasoning: outcome.reasoning,
          style_tip: outcome.styleTip,
        });
      case "superseded":
        return c.json(
          { error: "Superseded by a newer generation request", code: "SUPERSEDED" },
          409
        );
      case "failed": {
        const { error } = outcome;
        if (error.kind === "QUOTA_EXCEEDED") {
          return c.json(
            {
              error: error.message,
              code: error.kind,
              show_upgrade_offer: true,
              upgrade_url: "/api/subscription/plans",
            },
            429
          );
        }
        return c.json({ error: error.message, code: error.kind }, ERROR_STATUS[error.kind]);
      }
    }
  });

  /**
   * GET /status - Progress and last result of the caller's generation
   */
  outfits.get("/status", (c) => {
    const userId = c.get("userId") ?? null;
    if (!userId) {
      return c.json({ error: "Sign in to track generation status", code: "NOT_AUTHENTICATED" }, 401);
    }

    const state = generators.get(userId)?.getState() ?? INITIAL_STATE;
    return c.json(serializeState(state));
  });

  /**
   * POST /reset - Clear the caller's last result
   */
  outfits.post("/reset", (c) => {
    const userId = c.get("userId") ?? null;
    if (!userId) {
      return c.json({ error: "Sign in to reset generation state", code: "NOT_AUTHENTICATED" }, 401);
    }

    const generator = generators.get(userId);
    generator?.reset();
    return c.json(serializeState(generator?.getState() ?? INITIAL_STATE));
  });

  /**
   * GET /suggestions - Example prompts
   */
  outfits.get("/suggestions", (c) => {
    return c.json({ suggestions: PROMPT_SUGGESTIONS });
  });

  return outfits;
}
