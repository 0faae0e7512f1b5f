import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  classifyCompletionFailure,
  completeWithFallback,
  extractJson,
  isOpenRouterAvailable,
} from "./openrouter.js";
import { SuggestionError } from "./types.js";

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

function timeoutError(): Error {
  return Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
}

function stubFetch(handler: (call: number) => Response | Promise<Response>) {
  let call = 0;
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => handler(++call));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : null;
}

const messages = [{ role: "user" as const, content: "hi" }];

beforeEach(() => {
  vi.stubEnv("OPENROUTER_API_KEY", "test-secret");
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("completeWithFallback", () => {
  it("asks the primary model first", async () => {
    const fetchMock = stubFetch(() => completion("hello"));

    expect(await completeWithFallback(messages)).toBe("hello");

    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret", "X-Title": "Outfit Picker" });
    expect(requestBody(init)).toEqual({
      model: "google/gemini-2.5-flash",
      messages,
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it("moves to the next model after three failed attempts", async () => {
    const fetchMock = stubFetch((call) => (call <= 3 ? new Response("busy", { status: 503 }) : completion("ok")));

    expect(await completeWithFallback(messages, { max_tokens: 800 })).toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(requestBody(fetchMock.mock.calls[3][1])).toMatchObject({
      model: "google/gemini-2.0-flash-001",
      max_tokens: 800,
    });
  });

  it("skips the remaining attempts of a model that times out", async () => {
    const fetchMock = stubFetch((call) => {
      if (call === 1) throw timeoutError();
      return completion("ok");
    });

    await completeWithFallback(messages);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestBody(fetchMock.mock.calls[1][1])).toMatchObject({ model: "google/gemini-2.0-flash-001" });
  });

  it("reports server errors once every model is exhausted", async () => {
    const fetchMock = stubFetch(() => new Response("down", { status: 502 }));

    const failure = completeWithFallback(messages);

    await expect(failure).rejects.toBeInstanceOf(SuggestionError);
    await expect(failure).rejects.toMatchObject({
      kind: "SERVER_ERROR",
      message: "All OpenRouter models failed (SERVER_ERROR): meta-llama/llama-3.3-70b-instruct returned 502: down",
    });
    expect(fetchMock).toHaveBeenCalledTimes(9);
  });

  it("reports a timeout when every model times out", async () => {
    const fetchMock = stubFetch(() => {
      throw timeoutError();
    });

    await expect(completeWithFallback(messages)).rejects.toMatchObject({ kind: "TIMEOUT" });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("reports network errors when no response arrives", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    await expect(completeWithFallback(messages)).rejects.toMatchObject({
      kind: "NETWORK_ERROR",
      message: "All OpenRouter models failed (NETWORK_ERROR): meta-llama/llama-3.3-70b-instruct unreachable: fetch failed",
    });
  });

  it("treats an empty completion as an invalid response", async () => {
    stubFetch(() => completion(""));

    await expect(completeWithFallback(messages)).rejects.toMatchObject({ kind: "INVALID_RESPONSE" });
  });

  it("fails fast without an API key", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "");
    const fetchMock = stubFetch(() => completion("unused"));

    await expect(completeWithFallback(messages)).rejects.toMatchObject({ kind: "NOT_CONFIGURED" });
    expect(isOpenRouterAvailable()).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("classifyCompletionFailure", () => {
  it("keeps the kind of a SuggestionError", () => {
    expect(classifyCompletionFailure(new SuggestionError("SERVER_ERROR", "503"))).toBe("SERVER_ERROR");
  });

  it("recognises timeouts by name or message", () => {
    expect(classifyCompletionFailure(timeoutError())).toBe("TIMEOUT");
    expect(classifyCompletionFailure(new Error("OpenRouter request timed out after 30000ms"))).toBe("TIMEOUT");
  });

  it("counts anything else as a network failure", () => {
    expect(classifyCompletionFailure(new TypeError("fetch failed"))).toBe("NETWORK_ERROR");
    expect(classifyCompletionFailure("socket hang up")).toBe("NETWORK_ERROR");
  });
});

describe("extractJson", () => {
  it("reads fenced JSON", () => {
    expect(extractJson('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it("reads bare JSON", () => {
    expect(extractJson('  {"a": [1, 2]} ')).toEqual({ a: [1, 2] });
  });

  it("finds an object inside prose", () => {
    expect(extractJson('Sure! {"top_id": "t1"} Enjoy.')).toEqual({ top_id: "t1" });
  });

  it("rejects replies without JSON", () => {
    expect(() => extractJson("nothing to see")).toThrow("Stylist reply contains no JSON");
    expect(() => extractJson("{not json}")).toThrow("Stylist reply is not valid JSON");
  });
});
