import { describe, expect, it } from "vitest";
import { apiKeyEnvVar, apiKeyFromEnv, isWellFormedApiKey } from "../src/util/credential.js";

describe("isWellFormedApiKey", () => {
  it("accepts any suffix after the provider prefix", () => {
    for (const key of ["sk-", "sk-abc", "sk-proj-123", "sk- with spaces"]) {
      expect(isWellFormedApiKey(key)).toBe(true);
    }
  });

  it("rejects keys without the prefix", () => {
    for (const key of ["", "bad-key", "SK-abc", " sk-abc", "s", "pk-abc"]) {
      expect(isWellFormedApiKey(key)).toBe(false);
    }
    expect(isWellFormedApiKey(undefined)).toBe(false);
  });

  it("uses the prefix of the selected provider", () => {
    expect(isWellFormedApiKey("sk-ant-test", "anthropic")).toBe(true);
    expect(isWellFormedApiKey("sk-test", "anthropic")).toBe(false);
    expect(isWellFormedApiKey("AIzaTest", "google")).toBe(true);
    expect(isWellFormedApiKey("xai-test", "xai")).toBe(true);
    expect(isWellFormedApiKey("sk-test", "xai")).toBe(false);
  });
});

describe("apiKeyFromEnv", () => {
  it("reads the provider's variable and ignores blanks", () => {
    expect(apiKeyEnvVar("google")).toBe("GEMINI_API_KEY");
    expect(apiKeyFromEnv("openai", { OPENAI_API_KEY: " sk-test " })).toBe("sk-test");
    expect(apiKeyFromEnv("openai", { OPENAI_API_KEY: "  " })).toBeUndefined();
    expect(apiKeyFromEnv("anthropic", {})).toBeUndefined();
  });
});
