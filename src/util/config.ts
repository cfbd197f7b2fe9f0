import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { isProviderName } from "../providers/index.js";
import type { ProviderName } from "../types.js";

const ProviderSchema = z.enum(["openai", "anthropic", "google", "xai"]);

const AppConfigSchema = z
  .object({
    provider: ProviderSchema.optional(),
    model: z.string().optional(),
    analysisTemperature: z.number().min(0).max(2).optional(),
    followUpTemperature: z.number().min(0).max(2).optional(),
    maxHistory: z.number().int().min(0).max(200).optional(),
    outdir: z.string().optional(),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

function cleanNumber(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  const s = cleanString(v);
  if (!s) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/** API keys never live here: they come from flags or the environment. */
export function parseAppConfig(raw: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config JSON: ${msg}`);
  }

  // Normalize: convert blank strings to undefined.
  const cfg = parsed.data;
  return {
    ...cfg,
    model: cleanString(cfg.model),
    outdir: cleanString(cfg.outdir),
  };
}

export async function readAppConfig(configPath: string): Promise<AppConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new ConfigError(`Config file not found: ${configPath}`);

  let raw: unknown;
  try {
    raw = await fs.readJson(abs);
  } catch (e) {
    throw new ConfigError(`Config file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseAppConfig(raw);
}

export function mergeAppConfig(
  cli: {
    provider?: unknown;
    model?: unknown;
    analysisTemperature?: unknown;
    followUpTemperature?: unknown;
    maxHistory?: unknown;
    outdir?: unknown;
  },
  cfg: AppConfig = {},
): AppConfig {
  // CLI wins when explicitly set
  const merged: AppConfig = { ...cfg };

  const p = cleanString(cli.provider)?.toLowerCase();
  if (p !== undefined) {
    if (!isProviderName(p)) throw new ConfigError(`Unknown provider: ${p} (use openai|anthropic|google|xai)`);
    merged.provider = p;
  }

  const m = cleanString(cli.model);
  if (m) merged.model = m;

  const at = cleanNumber(cli.analysisTemperature);
  if (at !== undefined) merged.analysisTemperature = at;

  const ft = cleanNumber(cli.followUpTemperature);
  if (ft !== undefined) merged.followUpTemperature = ft;

  const mh = cleanNumber(cli.maxHistory);
  if (mh !== undefined) merged.maxHistory = Math.max(0, Math.min(200, Math.trunc(mh)));

  const outdir = cleanString(cli.outdir);
  if (outdir) merged.outdir = outdir;

  return merged;
}

export function configuredProvider(cfg: AppConfig): ProviderName {
  return cfg.provider ?? "openai";
}
