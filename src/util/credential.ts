import type { ProviderName } from "../types.js";

const KEY_PREFIXES: Record<ProviderName, string> = {
  openai: "sk-",
  anthropic: "sk-ant-",
  google: "AIza",
  xai: "xai-",
};

const PROVIDER_LABELS: Record<ProviderName, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  google: "Gemini",
  xai: "xAI",
};

const KEY_ENV_VARS: Record<ProviderName, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GEMINI_API_KEY",
  xai: "XAI_API_KEY",
};

/**
 * Shape check only: a key that passes can still be rejected by the provider.
 */
export function isWellFormedApiKey(key: string | undefined, provider: ProviderName = "openai"): boolean {
  if (!key) return false;
  return key.startsWith(KEY_PREFIXES[provider]);
}

export function apiKeyPrefix(provider: ProviderName): string {
  return KEY_PREFIXES[provider];
}

export function providerLabel(provider: ProviderName): string {
  return PROVIDER_LABELS[provider];
}

export function apiKeyEnvVar(provider: ProviderName): string {
  return KEY_ENV_VARS[provider];
}

export function apiKeyFromEnv(provider: ProviderName, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const v = env[KEY_ENV_VARS[provider]]?.trim();
  return v ? v : undefined;
}
