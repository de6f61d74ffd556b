import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { Settings } from "@/lib/config";

export interface LLMClient {
  analyze(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string>;
  isAvailable(): boolean;
  providerName(): string;
}

interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Stops further attempts and cuts the backoff wait short */
  signal?: AbortSignal;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Retry wrapper with exponential backoff and 429 handling.
 * Respects Retry-After header when available. Never retries once the
 * signal has fired.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, signal } = opts;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt === maxRetries || signal?.aborted) throw error;

      // Check for rate limit (429) or transient server errors (5xx)
      const status = getErrorStatus(error);
      const isRetryable = status === 429 || (status !== null && status >= 500);

      if (!isRetryable && status !== null) throw error;

      // Calculate delay: exponential backoff, or Retry-After header
      let delayMs = baseDelayMs * Math.pow(2, attempt);
      const retryAfter = getRetryAfter(error);
      if (retryAfter !== null) {
        delayMs = Math.max(delayMs, retryAfter * 1000);
      }

      console.warn(
        `[LLM] Request failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${Math.round(delayMs)}ms...`,
        status ? `status=${status}` : ""
      );
      await sleep(delayMs, signal);
    }
  }

  // Unreachable, but TypeScript needs it
  throw new Error("withRetry: exhausted retries");
}

export function getErrorStatus(error: unknown): number | null {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") {
      return error.status;
    }
    if ("statusCode" in error && typeof error.statusCode === "number") {
      return error.statusCode;
    }
  }
  return null;
}

function getRetryAfter(error: unknown): number | null {
  if (error && typeof error === "object" && "headers" in error) {
    const { headers } = error;
    if (headers && typeof headers === "object") {
      const val =
        "retry-after" in headers ? headers["retry-after"]
        : "Retry-After" in headers ? headers["Retry-After"]
        : null;
      if (typeof val === "string") {
        const seconds = parseFloat(val);
        if (!isNaN(seconds)) return seconds;
      }
    }
  }
  return null;
}

class AnthropicClient implements LLMClient {
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async analyze(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    return withRetry(async () => {
      const message = await this.client.messages.create(
        {
          model: "claude-sonnet-4-20250514",
          max_tokens: 4096,
          system: systemPrompt,
          messages: [{ role: "user", content: userPrompt }],
        },
        { signal },
      );

      const block = message.content[0];
      if (block?.type === "text") {
        return block.text;
      }
      return "";
    }, { signal });
  }

  isAvailable(): boolean {
    return true;
  }

  providerName(): string {
    return "Anthropic Claude";
  }
}

class OpenAIClient implements LLMClient {
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async analyze(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    return withRetry(async () => {
      const response = await this.client.chat.completions.create(
        {
          model: "gpt-4o-mini",
          max_tokens: 4096,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
        },
        { signal },
      );

      return response.choices[0]?.message?.content || "";
    }, { signal });
  }

  isAvailable(): boolean {
    return true;
  }

  providerName(): string {
    return "OpenAI";
  }
}

export class NullClient implements LLMClient {
  async analyze(): Promise<string> {
    return "{}";
  }
  isAvailable(): boolean {
    return false;
  }
  providerName(): string {
    return "None";
  }
}

/** Anthropic first, then OpenAI; a NullClient when neither key is set. */
export function createLLMClient(llm: Settings["llm"]): LLMClient {
  if (llm.anthropicApiKey) {
    return new AnthropicClient(llm.anthropicApiKey);
  }
  if (llm.openaiApiKey) {
    return new OpenAIClient(llm.openaiApiKey);
  }
  return new NullClient();
}
