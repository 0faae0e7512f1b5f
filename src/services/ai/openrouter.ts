/**
 * OpenRouter Client
 * Stylist completions over OpenRouter. Each model in the chain gets a few
 * attempts before the next one is tried. Failures surface as SuggestionError.
 */

import { isRecord } from "../../utils/loadData.js";
import { SuggestionError, type SuggestionErrorKind } from "./types.js";

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

// Tried in order; the first model is the stylist of choice
export const MODEL_CHAIN = [
  "google/gemini-2.5-flash",
  "google/gemini-2.0-flash-001",
  "meta-llama/llama-3.3-70b-instruct",
] as const;

const ATTEMPTS_PER_MODEL = 3;
const REQUEST_TIMEOUT_MS = 30000;

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface CompletionOptions {
  max_tokens?: number;
  temperature?: number;
}

export type CompletionFn = (messages: ChatMessage[], options?: CompletionOptions) => Promise<string>;

// Read per call so the key can be rotated without a restart
function getApiKey(): string | undefined {
  return process.env.OPENROUTER_API_KEY || undefined;
}

export function isOpenRouterAvailable(): boolean {
  return getApiKey() !== undefined;
}

function isTimeout(error: Error): boolean {
  return (
    error.name === "TimeoutError" ||
    error.name === "AbortError" ||
    /timed out/i.test(error.message)
  );
}

/**
 * Map any completion failure onto a transport failure kind.
 * Errors that never produced a response count as network failures.
 */
export function classifyCompletionFailure(error: unknown): SuggestionErrorKind {
  if (error instanceof SuggestionError) return error.kind;
  if (error instanceof Error && isTimeout(error)) return "TIMEOUT";
  return "NETWORK_ERROR";
}

function toSuggestionError(error: unknown, model: string): SuggestionError {
  if (error instanceof SuggestionError) return error;

  const kind = classifyCompletionFailure(error);
  const reason = error instanceof Error ? error.message : String(error);
  const message =
    kind === "TIMEOUT"
      ? `${model} timed out after ${REQUEST_TIMEOUT_MS}ms`
      : `${model} unreachable: ${reason}`;
  return new SuggestionError(kind, message, { cause: error });
}

function readContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const { content } = first.message;
  return typeof content === "string" && content.length > 0 ? content : null;
}

async function requestCompletion(
  apiKey: string,
  model: string,
  messages: ChatMessage[],
  options: CompletionOptions
): Promise<string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
    "X-Title": "Outfit Picker",
  };
  if (process.env.OPENROUTER_APP_URL) {
    headers["HTTP-Referer"] = process.env.OPENROUTER_APP_URL;
  }

  let response: Response;
  try {
    response = await fetch(OPENROUTER_API_URL, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model,
        messages,
        max_tokens: options.max_tokens ?? 1000,
        temperature: options.temperature ?? 0.7,
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw toSuggestionError(err, model);
  }

  if (!response.ok) {
    const detail = await response.text();
    throw new SuggestionError("SERVER_ERROR", `${model} returned ${response.status}: ${detail}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new SuggestionError("INVALID_RESPONSE", `${model} returned a body that is not JSON`, { cause: err });
  }

  const content = readContent(body);
  if (!content) {
    throw new SuggestionError("INVALID_RESPONSE", `${model} returned no completion text`);
  }
  return content;
}

/**
 * Run the model chain. The error that ends the chain carries the kind of the
 * last failure, so a fallback can still be attributed.
 */
export const completeWithFallback: CompletionFn = async (messages, options = {}) => {
  const apiKey = getApiKey();
  if (!apiKey) {
    throw new SuggestionError("NOT_CONFIGURED", "OPENROUTER_API_KEY not configured");
  }

  let lastFailure: SuggestionError | null = null;

  for (const model of MODEL_CHAIN) {
    for (let attempt = 1; attempt <= ATTEMPTS_PER_MODEL; attempt++) {
      try {
        const content = await requestCompletion(apiKey, model, messages, options);
        console.log(`[OpenRouter] ${model} answered on attempt ${attempt}`);
        return content;
      } catch (err) {
        lastFailure = toSuggestionError(err, model);
        console.warn(`[OpenRouter] ${model} attempt ${attempt} failed (${lastFailure.kind}): ${lastFailure.message}`);

        // Timeouts skip straight to the next model
        if (lastFailure.kind === "TIMEOUT") break;
      }
    }
  }

  const kind = lastFailure?.kind ?? "NETWORK_ERROR";
  throw new SuggestionError(
    kind,
    `All OpenRouter models failed (${kind}): ${lastFailure?.message ?? "no attempt made"}`,
    { cause: lastFailure }
  );
};

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

function locateJson(content: string): string | null {
  const fenced = FENCED_BLOCK.exec(content);
  if (fenced) return fenced[1].trim();

  const trimmed = content.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return trimmed;

  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  return start !== -1 && end > start ? content.slice(start, end + 1) : null;
}

/**
 * Pull the JSON payload out of a chatty model reply (fenced, bare, or
 * embedded in prose).
 */
export function extractJson(content: string): unknown {
  const candidate = locateJson(content);
  if (candidate === null) {
    throw new SuggestionError("INVALID_RESPONSE", "Stylist reply contains no JSON");
  }

  try {
    return JSON.parse(candidate);
  } catch (err) {
    throw new SuggestionError("INVALID_RESPONSE", "Stylist reply is not valid JSON", { cause: err });
  }
}
