export const PROVIDER_IDS = ["OPENAI", "CLAUDE"] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const OPENAI_DEFAULT_MODEL = "gpt-4o";
export const CLAUDE_SONNET_4 = "claude-sonnet-4-20250514";
export const CLAUDE_SONNET_4_5 = "claude-sonnet-4-5-20250929";

export const FALLBACK_MAX_TOKENS = 4096;

export interface ModelMeta {
  id: string;
  provider: ProviderId;
  label: string;
  maxTokens: number;
}

export const MODEL_CATALOG: readonly ModelMeta[] = [
  { id: OPENAI_DEFAULT_MODEL, provider: "OPENAI", label: "GPT-4o", maxTokens: 4096 },
  { id: CLAUDE_SONNET_4, provider: "CLAUDE", label: "Claude Sonnet 4", maxTokens: 4096 },
  { id: CLAUDE_SONNET_4_5, provider: "CLAUDE", label: "Claude Sonnet 4.5", maxTokens: 4096 },
];

export function normalizeProviderId(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export function resolveModel(provider: string, modelId: string): ModelMeta | null {
  const normalizedProvider = normalizeProviderId(provider);
  const normalizedModel = modelId.trim().toLowerCase();
  return (
    MODEL_CATALOG.find(
      (meta) => meta.provider === normalizedProvider && meta.id === normalizedModel
    ) ?? null
  );
}

export function getMaxTokens(provider: string, modelId: string): number {
  return resolveModel(provider, modelId)?.maxTokens ?? FALLBACK_MAX_TOKENS;
}

export function listModels(provider: ProviderId): ModelMeta[] {
  return MODEL_CATALOG.filter((meta) => meta.provider === provider);
}
