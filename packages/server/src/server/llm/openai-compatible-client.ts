import OpenAI from "openai";
import type { Logger } from "pino";
import { NetworkTimeoutError, UpstreamApiError } from "../../shared/errors.js";
import type { LLMClient, LLMPromptRequest } from "./llm-client.js";
import { getMaxTokens, type ProviderId } from "./model-catalog.js";

export interface OpenAICompatibleClientOptions {
  provider: ProviderId;
  model: string;
  apiKey: string;
  baseUrl: string;
  logger: Logger;
  client?: OpenAI;
}

/**
 * Chat-completions client for any OpenAI-compatible endpoint. Claude is
 * reached through Anthropic's compatibility endpoint with the same code.
 */
export class OpenAICompatibleClient implements LLMClient {
  readonly provider: ProviderId;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleClientOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.logger = options.logger.child({ provider: options.provider, model: options.model });
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: 0,
      });
  }

  async sendPrompt(request: LLMPromptRequest): Promise<string> {
    const maxTokens =
      request.maxTokens && request.maxTokens > 0
        ? request.maxTokens
        : getMaxTokens(this.provider, this.model);

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      ...request.history.map((entry) =>
        entry.role === "assistant"
          ? { role: "assistant" as const, content: entry.content }
          : { role: "user" as const, content: entry.content }
      ),
      { role: "user", content: request.prompt },
    ];

    const startedAt = Date.now();
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        { model: this.model, messages, max_tokens: maxTokens },
        { signal: request.signal }
      );
    } catch (error) {
      throw toProviderError(error, request.signal);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`Empty response from ${this.provider}`);
    }
    this.logger.debug(
      { durationMs: Date.now() - startedAt, responseLength: content.length },
      "Completion received"
    );
    return content;
  }
}

/** Maps SDK failures onto the shared error taxonomy. */
export function toProviderError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof Error ? reason : new NetworkTimeoutError();
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new NetworkTimeoutError();
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return new UpstreamApiError(error.status, error.message);
  }
  return error instanceof Error ? error : new Error(String(error));
}
