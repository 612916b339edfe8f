import { vi } from "vitest";
import type { LLMClient, LLMClientResolver, LLMPromptRequest } from "../llm/llm-client.js";
import type { ProviderId } from "../llm/model-catalog.js";
import type { ProviderSummary } from "../llm/llm-manager.js";

type Reply = string | Error | ((request: LLMPromptRequest) => Promise<string>);

/** LLM client that plays back scripted replies in order, repeating the last. */
export class FakeLLMClient implements LLMClient {
  readonly requests: LLMPromptRequest[] = [];
  readonly sendPrompt = vi.fn(async (request: LLMPromptRequest): Promise<string> => {
    this.requests.push(request);
    const index = Math.min(this.requests.length - 1, this.replies.length - 1);
    const reply = this.replies[index];
    if (reply === undefined) {
      throw new Error("FakeLLMClient has no scripted reply");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(request);
    }
    return reply;
  });

  constructor(
    readonly provider: ProviderId,
    readonly model: string,
    private readonly replies: Reply[]
  ) {}
}

export class FakeLLMResolver implements LLMClientResolver {
  readonly getClient = vi.fn((provider: string, _model: string): LLMClient => {
    const client = this.clients.get(provider.trim().toUpperCase());
    if (!client) {
      throw new Error(`LLM provider '${provider}' is not supported or not configured. Available providers: ${[...this.clients.keys()].join(", ")}`);
    }
    return client;
  });

  private readonly clients = new Map<string, LLMClient>();

  constructor(clients: LLMClient[]) {
    for (const client of clients) {
      this.clients.set(client.provider, client);
    }
  }

  listProviders(): ProviderSummary[] {
    return [...this.clients.values()].map((client) => ({
      id: client.provider,
      defaultModel: client.model,
      models: [{ id: client.model, label: client.model, maxTokens: 4096 }],
    }));
  }
}
