/**
 * One-shot OpenRouter chat completion used to check a key/model pair.
 * Exactly one attempt, bounded by the configured timeout; no retries.
 */

import OpenAI, { APIError, type ClientOptions } from "openai";

export const DEFAULT_TEST_MODEL = "anthropic/claude-haiku-4.5";

export const TEST_MESSAGES = [
  { role: "system", content: "Return only a number from 0 to 10" },
  { role: "user", content: "Rate this: Hello world" },
] as const;

type Fetch = NonNullable<ClientOptions["fetch"]>;

export interface OpenRouterOptions {
  baseURL: string;
  timeoutMs: number;
  /** Custom fetch, e.g. a stub in tests. */
  fetch?: Fetch;
}

export type OpenRouterTestBody =
  | { success: true; result: unknown }
  | { success: false; error: string; body?: string };

export interface OpenRouterTestResult {
  status: number;
  body: OpenRouterTestBody;
}

export async function runOpenRouterTest(
  apiKey: string,
  model: string,
  options: OpenRouterOptions
): Promise<OpenRouterTestResult> {
  const baseFetch: Fetch = options.fetch ?? fetch;
  // Raw text of a non-2xx answer; the SDK only keeps its parsed `error` member.
  let upstreamBody = "";
  const capturingFetch: Fetch = async (input, init) => {
    const response = await baseFetch(input, init);
    if (!response.ok) upstreamBody = await response.clone().text();
    return response;
  };
  const client = new OpenAI({
    apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxRetries: 0,
    fetch: capturingFetch,
  });
  try {
    const result = await client.chat.completions.create({
      model,
      messages: [...TEST_MESSAGES],
      max_tokens: 10,
      temperature: 0.1,
    });
    return { status: 200, body: { success: true, result } };
  } catch (error) {
    // Upstream answered with an error status: relay it.
    if (error instanceof APIError && typeof error.status === "number") {
      return {
        status: error.status,
        body: { success: false, error: error.message, body: upstreamBody },
      };
    }
    console.warn("[openrouter] Test call failed:", error instanceof Error ? error.message : error);
    return {
      status: 500,
      body: { success: false, error: error instanceof Error ? error.message : String(error) },
    };
  }
}
