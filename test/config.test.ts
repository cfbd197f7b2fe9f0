import path from "node:path";
import fs from "fs-extra";
import { describe, expect, it } from "vitest";
import { ConfigError, configuredProvider, mergeAppConfig, parseAppConfig, readAppConfig } from "../src/util/config.js";
import { makeTempDir } from "./fakeModel.js";

describe("parseAppConfig", () => {
  it("accepts known fields and blanks empty strings", () => {
    expect(parseAppConfig({ provider: "anthropic", model: "  ", maxHistory: 4 })).toEqual({
      provider: "anthropic",
      model: undefined,
      maxHistory: 4,
      outdir: undefined,
    });
  });

  it("rejects unknown keys and out-of-range values", () => {
    expect(() => parseAppConfig({ apiKey: "sk-test-secret" })).toThrow(ConfigError);
    expect(() => parseAppConfig({ analysisTemperature: 3 })).toThrow(/analysisTemperature/);
    expect(() => parseAppConfig({ provider: "other" })).toThrow(/provider/);
  });
});

describe("readAppConfig", () => {
  it("reads a JSON file", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "config.json");
    await fs.outputJson(file, { provider: "xai", followUpTemperature: 0.5 });
    expect(await readAppConfig(file)).toMatchObject({ provider: "xai", followUpTemperature: 0.5 });
  });

  it("reports a missing or malformed file", async () => {
    const dir = await makeTempDir();
    await expect(readAppConfig(path.join(dir, "missing.json"))).rejects.toThrow("Config file not found");

    const bad = path.join(dir, "bad.json");
    await fs.outputFile(bad, "{ not json");
    await expect(readAppConfig(bad)).rejects.toThrow("Config file is not valid JSON");
  });
});

describe("mergeAppConfig", () => {
  it("lets command-line values win", () => {
    const merged = mergeAppConfig(
      { provider: " Google ", model: "gemini-test", maxHistory: "7" },
      { provider: "openai", model: "gpt-4o", outdir: "out" },
    );
    expect(merged).toEqual({ provider: "google", model: "gemini-test", maxHistory: 7, outdir: "out" });
    expect(configuredProvider(merged)).toBe("google");
  });

  it("clamps history and ignores blank values", () => {
    expect(mergeAppConfig({ maxHistory: "999", model: "" }, { model: "keep" })).toEqual({ maxHistory: 200, model: "keep" });
    expect(mergeAppConfig({ maxHistory: -3 }).maxHistory).toBe(0);
  });

  it("rejects an unknown provider", () => {
    expect(() => mergeAppConfig({ provider: "acme" })).toThrow("Unknown provider: acme");
  });

  it("defaults to openai", () => {
    expect(configuredProvider({})).toBe("openai");
  });
});
