import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";

import { ProviderError, RequestAbortedError } from "./errors.js";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export type TokenUsage = { promptTokens: number; completionTokens: number; totalTokens: number };

export type ChatCompletion = { text: string; model: string; usage: TokenUsage | null };

export type ChatOptions = { temperature: number; signal?: AbortSignal };

export interface ChatClient {
  complete(messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion>;
}

const ContentPart = z.object({ type: z.string().optional(), text: z.string().optional() });

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.union([z.string(), z.array(ContentPart), z.null()]).optional() })
          .optional(),
        text: z.string().optional()
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .optional()
});

type ChatResponse = z.infer<typeof ChatResponseSchema>;

/** Providers answer either with `message.content` (chat shape) or a plain `text` (completion shape). */
export function extractCompletionText(data: ChatResponse): string | null {
  const choice = data.choices?.[0];
  if (!choice) return null;
  const content = choice.message?.content;
  if (typeof content === "string") return content;
  if (Array.isArray(content)) return content.map((part) => part.text ?? "").join("");
  if (typeof choice.text === "string") return choice.text;
  return null;
}

function toUsage(data: ChatResponse): TokenUsage | null {
  if (!data.usage) return null;
  const promptTokens = data.usage.prompt_tokens ?? 0;
  const completionTokens = data.usage.completion_tokens ?? 0;
  return { promptTokens, completionTokens, totalTokens: data.usage.total_tokens ?? promptTokens + completionTokens };
}

export type HttpChatClientOptions = {
  apiUrl: string;
  apiKey?: string;
  model: string;
  fallbackModel?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
};

/**
 * Minimal OpenAI-compatible chat-completions client. Retries network failures,
 * timeouts, 429 and 5xx with linear back-off; other 4xx fail immediately.
 */
export class HttpChatClient implements ChatClient {
  private apiUrl: string;
  private apiKey?: string;
  private model: string;
  private fallbackModel?: string;
  private timeoutMs: number;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(options: HttpChatClientOptions) {
    this.apiUrl = options.apiUrl;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  async complete(messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion> {
    try {
      return await this.completeWithRetry(this.model, messages, options);
    } catch (err) {
      const fallback = this.fallbackModel;
      if (!fallback || fallback === this.model || !isModelError(err)) throw err;
      console.warn(`[llm] model ${this.model} rejected, retrying with ${fallback}`);
      return await this.completeWithRetry(fallback, messages, options);
    }
  }

  private async completeWithRetry(model: string, messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion> {
    for (let attempt = 0; ; attempt++) {
      if (options.signal?.aborted) throw new RequestAbortedError();
      try {
        return await this.post(model, messages, options);
      } catch (err) {
        if (options.signal?.aborted) throw new RequestAbortedError();
        if (!(err instanceof ProviderError) || !isRetryable(err) || attempt >= this.maxRetries) throw err;
        console.warn(`[llm] attempt ${attempt + 1} failed (${err.message}), retrying`);
        await this.backoff(attempt, options.signal);
      }
    }
  }

  private async backoff(attempt: number, signal?: AbortSignal) {
    try {
      await sleep(this.retryDelayMs * (attempt + 1), undefined, { signal });
    } catch {
      throw new RequestAbortedError();
    }
  }

  private async post(model: string, messages: ChatMessage[], options: ChatOptions): Promise<ChatCompletion> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let res: Response;
    let body: string;
    try {
      res = await fetch(this.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {})
        },
        body: JSON.stringify({ model, messages, temperature: options.temperature }),
        signal
      });
      body = await res.text();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const message = timeout.aborted ? `LLM request timed out after ${this.timeoutMs}ms` : "LLM request failed";
      throw new ProviderError(message, { detail, cause: err });
    }

    if (!res.ok) {
      throw new ProviderError(`LLM request failed with status ${res.status}`, { providerStatus: res.status, detail: body });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new ProviderError("LLM response was not JSON", { providerStatus: res.status, detail: body.slice(0, 500), cause: err });
    }
    const data = ChatResponseSchema.safeParse(json);
    const text = data.success ? extractCompletionText(data.data) : null;
    if (!data.success || text === null) {
      throw new ProviderError("Unexpected LLM response shape", { providerStatus: res.status, detail: body.slice(0, 500) });
    }
    return { text, model: data.data.model ?? model, usage: toUsage(data.data) };
  }
}

function isRetryable(err: ProviderError): boolean {
  const s = err.providerStatus;
  return s === 0 || s === 408 || s === 429 || s >= 500;
}

function isModelError(err: unknown): boolean {
  if (!(err instanceof ProviderError)) return false;
  if (err.providerStatus === 404) return true;
  return err.providerStatus === 400 && /model/i.test(err.detail);
}

/** Per-request token accounting across every LLM call. */
export class UsageTally {
  calls = 0;
  promptTokens = 0;
  completionTokens = 0;
  totalTokens = 0;

  add(usage: TokenUsage | null) {
    this.calls += 1;
    if (!usage) return;
    this.promptTokens += usage.promptTokens;
    this.completionTokens += usage.completionTokens;
    this.totalTokens += usage.totalTokens;
  }

  toJSON() {
    return {
      calls: this.calls,
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      totalTokens: this.totalTokens
    };
  }
}
