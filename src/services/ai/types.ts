import type { AISuggestion, ClothingCategory } from "../styling/types.js";

/**
 * Failure kinds reported by a suggestion transport.
 * Only NOT_AUTHENTICATED and USAGE_LIMIT_REACHED are terminal for a generation;
 * every other kind sends the request to local matching.
 */
export type SuggestionErrorKind =
  | "NOT_AUTHENTICATED"
  | "USAGE_LIMIT_REACHED"
  | "NOT_CONFIGURED"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "SERVER_ERROR"
  | "INVALID_RESPONSE"
  | "UNKNOWN";

export class SuggestionError extends Error {
  readonly kind: SuggestionErrorKind;

  constructor(kind: SuggestionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SuggestionError";
    this.kind = kind;
  }
}

export function suggestionErrorKind(error: unknown): SuggestionErrorKind {
  return error instanceof SuggestionError ? error.kind : "UNKNOWN";
}

export interface SuggestionItem {
  id: string;
  category: ClothingCategory;
  tags: string[];
}

export interface SuggestionRequest {
  prompt: string;
  availableItems: SuggestionItem[];
  userStyle?: string | null;
}

export interface SuggestionTransport {
  generateSuggestion(request: SuggestionRequest): Promise<AISuggestion>;
}
