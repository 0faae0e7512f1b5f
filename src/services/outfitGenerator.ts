/**
 * Outfit Generator Service
 * Runs one outfit generation: validates the request, gates on quota, asks the
 * AI stylist and falls back to local tag matching when the AI call fails.
 */

import {
  composeOutfit,
  describeOutfit,
  mathRandom,
  reconcileSuggestion,
  type ClothingItem,
  type GeneratedOutfit,
  type RandomSource,
} from "./styling/index.js";
import {
  suggestionErrorKind,
  type SuggestionErrorKind,
  type SuggestionItem,
  type SuggestionTransport,
} from "./ai/index.js";
import { intervalTicker, type Ticker } from "../utils/ticker.js";
import { addBreadcrumb, captureRecoveredFailure } from "../utils/sentry.js";

export const STATUS_MESSAGES = [
  "Analyzing your wardrobe...",
  "Considering color harmony...",
  "Checking style compatibility...",
  "Finding the perfect match...",
  "Almost there...",
] as const;

export const DEFAULT_STATUS_INTERVAL_MS = 1500;

export const NOTHING_SUITABLE_MESSAGE =
  "Nothing suitable for this occasion! Try adding more clothes to your closet";

// ============================================================================
// TYPES
// ============================================================================

export type GenerationErrorKind =
  | "EMPTY_PROMPT"
  | "EMPTY_WARDROBE"
  | "QUOTA_EXCEEDED"
  | "NOT_AUTHENTICATED";

export interface GenerationError {
  kind: GenerationErrorKind;
  message: string;
  /** Caller should present the upgrade offer */
  showUpgradeOffer: boolean;
}

export type GenerationPhase = "idle" | "validating" | "ai" | "local" | "completed" | "failed";

export type OutfitSource = "ai" | "local";

export type GenerationOutcome =
  | {
      status: "success";
      outfit: GeneratedOutfit;
      reasoning: string | null;
      styleTip: string | null;
      source: OutfitSource;
    }
  | {
      status: "empty";
      outfit: GeneratedOutfit;
      message: string;
      reasoning: string | null;
      styleTip: string | null;
      source: OutfitSource;
    }
  | { status: "failed"; error: GenerationError }
  /** A newer request started before this one finished; it wrote nothing */
  | { status: "superseded" };

export interface GenerationState {
  readonly phase: GenerationPhase;
  readonly isGenerating: boolean;
  readonly currentStatusMessage: string;
  readonly generatedOutfit: GeneratedOutfit | null;
  readonly lastReasoning: string | null;
  readonly lastStyleTip: string | null;
  readonly lastError: GenerationError | null;
  readonly showUpgradeOffer: boolean;
  readonly lastSource: OutfitSource | null;
  readonly lastFallbackReason: SuggestionErrorKind | null;
}

export interface QuotaStatus {
  requestsRemaining: number;
  hasUnlimitedEntitlement: boolean;
}

export interface QuotaProvider {
  /** null when the caller has no subscription record to gate on */
  getQuotaStatus(): Promise<QuotaStatus | null>;
}

export interface SessionProvider {
  isAIEnabled(): boolean;
}

export interface OutfitGeneratorOptions {
  transport: SuggestionTransport;
  session: SessionProvider;
  quota: QuotaProvider;
  random?: RandomSource;
  ticker?: Ticker;
  statusIntervalMs?: number;
  userStyle?: string | null;
}

export type StateListener = (state: GenerationState) => void;

const ERROR_MESSAGES: Record<GenerationErrorKind, string> = {
  EMPTY_PROMPT: "Please enter what you're doing today!",
  EMPTY_WARDROBE: "Your closet is empty! Add some clothes first.",
  QUOTA_EXCEEDED: "You've used all your free generations this month",
  NOT_AUTHENTICATED: "Please sign in to use AI styling",
};

const AI_LIMIT_MESSAGE = "You've reached your monthly limit";

const SUPERSEDED: GenerationOutcome = { status: "superseded" };

export const INITIAL_STATE: GenerationState = Object.freeze({
  phase: "idle",
  isGenerating: false,
  currentStatusMessage: STATUS_MESSAGES[0],
  generatedOutfit: null,
  lastReasoning: null,
  lastStyleTip: null,
  lastError: null,
  showUpgradeOffer: false,
  lastSource: null,
  lastFallbackReason: null,
});

function toSuggestionItem(item: ClothingItem): SuggestionItem {
  return { id: item.id, category: item.category, tags: [...item.tags] };
}

// ============================================================================
// GENERATOR
// ============================================================================

export class OutfitGenerator {
  private readonly transport: SuggestionTransport;
  private readonly session: SessionProvider;
  private readonly quota: QuotaProvider;
  private readonly random: RandomSource;
  private readonly ticker: Ticker;
  private readonly statusIntervalMs: number;
  private readonly userStyle: string | null;

  private state: GenerationState = INITIAL_STATE;
  private generationId = 0;
  private stopTicker: (() => void) | null = null;
  private readonly listeners = new Set<StateListener>();

  constructor(options: OutfitGeneratorOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.quota = options.quota;
    this.random = options.random ?? mathRandom;
    this.ticker = options.ticker ?? intervalTicker;
    this.statusIntervalMs = options.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS;
    this.userStyle = options.userStyle ?? null;
  }

  getState(): GenerationState {
    return this.state;
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Clear the last result. Has no effect while a generation is running.
   */
  reset(): void {
    if (this.state.isGenerating) return;
    this.setState({
      phase: "idle",
      generatedOutfit: null,
      lastReasoning: null,
      lastStyleTip: null,
      lastError: null,
      showUpgradeOffer: false,
      lastSource: null,
    });
  }

  async generate(prompt: string, wardrobe: readonly ClothingItem[]): Promise<GenerationOutcome> {
    const generationId = ++this.generationId;
    this.haltTicker();

    this.setState({
      phase: "validating",
      isGenerating: false,
      lastError: null,
      showUpgradeOffer: false,
      lastFallbackReason: null,
    });

    if (prompt.trim().length === 0) {
      return this.fail("EMPTY_PROMPT");
    }

    if (wardrobe.length === 0) {
      return this.fail("EMPTY_WARDROBE");
    }

    const quota = await this.lookUpQuota();
    if (!this.isCurrent(generationId)) return SUPERSEDED;

    if (quota && quota.requestsRemaining <= 0 && !quota.hasUnlimitedEntitlement) {
      console.log("[OutfitGen] Quota exhausted, offering upgrade");
      return this.fail("QUOTA_EXCEEDED");
    }

    const useAI = this.session.isAIEnabled();
    console.log(
      `[OutfitGen] Generating outfit from ${wardrobe.length} items via ${useAI ? "AI" : "local matching"}`
    );

    this.setState({
      phase: useAI ? "ai" : "local",
      isGenerating: true,
      currentStatusMessage: STATUS_MESSAGES[0],
      lastReasoning: null,
      lastStyleTip: null,
    });
    this.startTicker(generationId);

    if (useAI) {
      return this.generateWithAI(generationId, prompt, wardrobe);
    }
    return this.generateLocally(prompt, wardrobe);
  }

  private async generateWithAI(
    generationId: number,
    prompt: string,
    wardrobe: readonly ClothingItem[]
  ): Promise<GenerationOutcome> {
    try {
      const suggestion = await this.transport.generateSuggestion({
        prompt,
        availableItems: wardrobe.map(toSuggestionItem),
        userStyle: this.userStyle,
      });

      if (!this.isCurrent(generationId)) return SUPERSEDED;

      const outfit = reconcileSuggestion(suggestion, wardrobe);
      return this.complete(outfit, suggestion.reasoning, suggestion.styleTip, "ai");
    } catch (err) {
      if (!this.isCurrent(generationId)) return SUPERSEDED;

      const kind = suggestionErrorKind(err);
      if (kind === "NOT_AUTHENTICATED") {
        return this.fail("NOT_AUTHENTICATED");
      }
      if (kind === "USAGE_LIMIT_REACHED") {
        return this.fail("QUOTA_EXCEEDED", AI_LIMIT_MESSAGE);
      }

      this.recordFallback(kind, err);
      return this.generateLocally(prompt, wardrobe);
    }
  }

  /**
   * A failed lookup leaves the attempt ungated; the AI transport still
   * checks usage before spending a generation.
   */
  private async lookUpQuota(): Promise<QuotaStatus | null> {
    try {
      return await this.quota.getQuotaStatus();
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.warn(`[OutfitGen] Quota lookup failed, continuing ungated: ${errorMessage}`);
      addBreadcrumb("outfit-generation", "Quota lookup failed");
      captureRecoveredFailure(
        "Quota lookup failed",
        { failure_kind: "QUOTA_UNAVAILABLE" },
        { message: errorMessage }
      );
      return null;
    }
  }

  private generateLocally(prompt: string, wardrobe: readonly ClothingItem[]): GenerationOutcome {
    this.setState({ phase: "local" });

    const outfit = composeOutfit(prompt, wardrobe, this.random);
    const description = outfit.isValid ? describeOutfit(prompt, this.random) : null;

    return this.complete(
      outfit,
      description?.reasoning ?? null,
      description?.styleTip ?? null,
      "local"
    );
  }

  private complete(
    outfit: GeneratedOutfit,
    reasoning: string | null,
    styleTip: string | null,
    source: OutfitSource
  ): GenerationOutcome {
    this.haltTicker();
    this.setState({
      phase: "completed",
      isGenerating: false,
      generatedOutfit: outfit,
      lastReasoning: reasoning,
      lastStyleTip: styleTip,
      lastSource: source,
      lastError: null,
    });

    if (!outfit.isValid) {
      console.log(`[OutfitGen] Nothing suitable found (${source})`);
      return { status: "empty", outfit, message: NOTHING_SUITABLE_MESSAGE, reasoning, styleTip, source };
    }

    console.log(`[OutfitGen] Generated outfit with ${outfit.items.length} items (${source})`);
    return { status: "success", outfit, reasoning, styleTip, source };
  }

  private fail(kind: GenerationErrorKind, message: string = ERROR_MESSAGES[kind]): GenerationOutcome {
    const error: GenerationError = {
      kind,
      message,
      showUpgradeOffer: kind === "QUOTA_EXCEEDED",
    };

    this.haltTicker();
    this.setState({
      phase: "failed",
      isGenerating: false,
      lastError: error,
      showUpgradeOffer: error.showUpgradeOffer,
    });

    return { status: "failed", error };
  }

  /**
   * Fallbacks never reach the user, so log and report them here
   */
  private recordFallback(kind: SuggestionErrorKind, error: unknown): void {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(
      `[OutfitGen] AI suggestion failed (${kind}), falling back to local matching: ${errorMessage}`
    );
    addBreadcrumb("outfit-generation", "AI suggestion fallback", { kind });
    captureRecoveredFailure(
      `AI suggestion fallback: ${kind}`,
      { failure_kind: kind },
      { message: errorMessage }
    );
    this.setState({ lastFallbackReason: kind });
  }

  private startTicker(generationId: number): void {
    let messageIndex = 0;

    const stop = this.ticker.every(this.statusIntervalMs, () => {
      if (!this.isCurrent(generationId) || !this.state.isGenerating) {
        stop();
        return;
      }
      messageIndex = (messageIndex + 1) % STATUS_MESSAGES.length;
      this.setState({ currentStatusMessage: STATUS_MESSAGES[messageIndex] });
    });

    this.stopTicker = stop;
  }

  private haltTicker(): void {
    if (this.stopTicker) {
      this.stopTicker();
      this.stopTicker = null;
    }
  }

  private isCurrent(generationId: number): boolean {
    return generationId === this.generationId;
  }

  private setState(patch: Partial<GenerationState>): void {
    this.state = Object.freeze({ ...this.state, ...patch });
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
