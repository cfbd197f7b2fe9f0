import { askClaude } from "./anthropic.js";
import { askGemini } from "./gemini.js";
import { askOpenAI } from "./openai.js";
import { askGrok } from "./xai.js";
import type { ModelAnswer, ModelRequest, ProviderName } from "../types.js";

export function isProviderName(v: unknown): v is ProviderName {
  return v === "openai" || v === "anthropic" || v === "google" || v === "xai";
}

export function defaultModelFor(provider: ProviderName): string {
  switch (provider) {
    case "openai":
      return "gpt-4o";
    case "anthropic":
      return "claude-sonnet-4-5-20250929";
    case "google":
      return "gemini-2.5-flash";
    case "xai":
      return "grok-4";
  }
}

export async function askProvider(req: ModelRequest): Promise<ModelAnswer> {
  switch (req.provider) {
    case "openai":
      return askOpenAI(req);
    case "anthropic":
      return askClaude(req);
    case "google":
      return askGemini(req);
    case "xai":
      return askGrok(req);
  }
}
