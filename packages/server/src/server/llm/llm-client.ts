import type { ChatHistoryEntry } from "../../shared/messages.js";
import type { ProviderId } from "./model-catalog.js";

export interface LLMPromptRequest {
  prompt: string;
  history: readonly ChatHistoryEntry[];
  /** Falls back to the model's catalog limit when absent or not positive. */
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * One provider/model pair. Implementations perform a single request and
 * leave retry and circuit breaking to the caller.
 */
export interface LLMClient {
  readonly provider: ProviderId;
  readonly model: string;
  sendPrompt(request: LLMPromptRequest): Promise<string>;
}

export interface LLMClientResolver {
  getClient(provider: string, model: string): LLMClient;
}
