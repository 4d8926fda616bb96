export type Provider = "openai" | "ollama";

/** Model ids may carry a provider prefix: "ollama_chat/qwen3:8b", "openai/gpt-4o". */
const PROVIDER_PREFIXES: Record<string, Provider> = {
  ollama: "ollama",
  ollama_chat: "ollama",
  openai: "openai",
};

export const DEFAULT_MODEL_ID = "ollama_chat/qwen3:30b-a3b-q4_K_M";

export interface ResolvedModel {
  provider: Provider;
  /** Model name as the backend knows it, prefix removed. */
  model: string;
}

/** Split a model id into provider and backend model name. Unprefixed ids are OpenAI-compatible. */
export function parseModelId(id: string): ResolvedModel {
  const trimmed = id.trim();
  const slash = trimmed.indexOf("/");
  if (slash > 0) {
    const prefix = trimmed.slice(0, slash).toLowerCase();
    const provider = PROVIDER_PREFIXES[prefix];
    if (provider) return { provider, model: trimmed.slice(slash + 1) };
  }
  return { provider: "openai", model: trimmed };
}

export function defaultBaseUrl(provider: Provider): string {
  switch (provider) {
    case "ollama": return "http://localhost:11434";
    case "openai": return "https://api.openai.com";
  }
}
