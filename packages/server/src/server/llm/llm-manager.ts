import type { Logger } from "pino";
import { UnknownProviderError } from "../../shared/errors.js";
import type { ProviderSettings } from "../config.js";
import type { LLMClient, LLMClientResolver } from "./llm-client.js";
import {
  CLAUDE_SONNET_4_5,
  OPENAI_DEFAULT_MODEL,
  PROVIDER_IDS,
  isProviderId,
  listModels,
  normalizeProviderId,
  resolveModel,
  type ProviderId,
} from "./model-catalog.js";
import { OpenAICompatibleClient } from "./openai-compatible-client.js";

export type ProviderSettingsMap = Record<"openai" | "claude", ProviderSettings>;

export interface ClientFactoryInput {
  provider: ProviderId;
  model: string;
  apiKey: string;
  baseUrl: string;
  logger: Logger;
}

export type LLMClientFactory = (input: ClientFactoryInput) => LLMClient;

export interface ProviderSummary {
  id: ProviderId;
  defaultModel: string;
  models: Array<{ id: string; label: string; maxTokens: number }>;
}

const SETTINGS_KEY: Record<ProviderId, keyof ProviderSettingsMap> = {
  OPENAI: "openai",
  CLAUDE: "claude",
};

const defaultFactory: LLMClientFactory = (input) => new OpenAICompatibleClient(input);

export class LLMManager implements LLMClientResolver {
  private readonly logger: Logger;
  private readonly createClient: LLMClientFactory;
  private readonly clients = new Map<string, LLMClient>();

  constructor(
    private readonly providers: ProviderSettingsMap,
    logger: Logger,
    createClient: LLMClientFactory = defaultFactory
  ) {
    this.logger = logger.child({ module: "llm-manager" });
    this.createClient = createClient;
    for (const id of PROVIDER_IDS) {
      if (!this.isConfigured(id)) {
        this.logger.warn({ provider: id }, "Provider not configured, API key missing");
      }
    }
  }

  availableProviders(): ProviderId[] {
    return PROVIDER_IDS.filter((id) => this.isConfigured(id));
  }

  getClient(provider: string, model: string): LLMClient {
    const id = normalizeProviderId(provider);
    if (!isProviderId(id)) {
      throw new UnknownProviderError(provider, this.availableProviders());
    }
    const settings = this.providers[SETTINGS_KEY[id]];
    const apiKey = settings.apiKey;
    if (!apiKey) {
      throw new UnknownProviderError(provider, this.availableProviders());
    }

    const resolvedModel = this.resolveModelId(id, model, settings.defaultModel);
    const cacheKey = `${id}:${resolvedModel}`;
    const cached = this.clients.get(cacheKey);
    if (cached) {
      return cached;
    }
    const client = this.createClient({
      provider: id,
      model: resolvedModel,
      apiKey,
      baseUrl: settings.baseUrl,
      logger: this.logger,
    });
    this.clients.set(cacheKey, client);
    return client;
  }

  listProviders(): ProviderSummary[] {
    return this.availableProviders().map((id) => ({
      id,
      defaultModel: this.resolveModelId(id, "", this.providers[SETTINGS_KEY[id]].defaultModel),
      models: listModels(id).map(({ id: modelId, label, maxTokens }) => ({
        id: modelId,
        label,
        maxTokens,
      })),
    }));
  }

  private isConfigured(id: ProviderId): boolean {
    return Boolean(this.providers[SETTINGS_KEY[id]].apiKey);
  }

  private resolveModelId(id: ProviderId, requested: string, configuredDefault: string | null): string {
    const model = requested.trim();
    switch (id) {
      case "OPENAI":
        return model || configuredDefault || OPENAI_DEFAULT_MODEL;
      case "CLAUDE": {
        if (!model) {
          return configuredDefault ?? CLAUDE_SONNET_4_5;
        }
        const meta = resolveModel(id, model);
        if (meta) {
          return meta.id;
        }
        this.logger.warn(
          { requested: model, fallback: CLAUDE_SONNET_4_5 },
          "Unsupported Claude model, falling back to Sonnet 4.5"
        );
        return CLAUDE_SONNET_4_5;
      }
    }
  }
}
