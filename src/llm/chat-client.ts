/**
 * HTTP client for OpenAI-compatible chat completion endpoints.
 *
 * Only the first choice's message content is returned; callers parse it with
 * `extractJsonObject` when they expect structured output.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatCompletionOpts = {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

/** The single operation units and the judge depend on. */
export interface ChatModel {
  complete(messages: ChatMessage[], opts?: ChatCompletionOpts): Promise<string>;
}

export const DEFAULT_CHAT_MODEL = "qwen/qwen3-32b";

const CompletionResponseSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Union([Type.String(), Type.Null()]),
      }),
    }),
    { minItems: 1 },
  ),
});

export type ChatClientOpts = {
  baseUrl: string;
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export class ChatClient implements ChatModel {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: ChatClientOpts) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? DEFAULT_CHAT_MODEL;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async complete(messages: ChatMessage[], opts?: ChatCompletionOpts): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = opts?.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    const res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature: opts?.temperature ?? 0.2,
        max_tokens: opts?.maxTokens ?? 1024,
      }),
      signal,
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`Chat completion error (${res.status}): ${text}`);
    }

    const body: unknown = await res.json();
    if (!Value.Check(CompletionResponseSchema, body)) {
      throw new Error("Chat completion response has no choices");
    }
    return body.choices[0]?.message.content ?? "";
  }
}
