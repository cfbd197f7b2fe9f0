import fs from "fs-extra";
import path from "node:path";
import type { AnalysisOutcome } from "./analyse.js";
import type { Transcript } from "./conversation.js";
import { ANALYSIS_PROMPT_VERSION } from "./prompt.js";
import type { ProviderName } from "./types.js";

export type RunMeta = {
  provider: ProviderName;
  model: string;
  screenshots: string[];
};

/** `<baseDir>/<yyyymmdd_hhmmss>`; created if missing. */
export async function makeRunDir(baseDir = "runs", now = new Date()): Promise<string> {
  const pad = (n: number) => String(n).padStart(2, "0");
  const dirName =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

  const full = path.join(baseDir, dirName);
  await fs.mkdirp(full);
  return full;
}

/**
 * analysis.md always; analysis.json only for a parsed result, raw.txt when the
 * completion could not be parsed.
 */
export async function saveAnalysis(runDir: string, outcome: AnalysisOutcome, meta: RunMeta): Promise<string[]> {
  const written: string[] = [];

  const md = path.join(runDir, "analysis.md");
  await fs.outputFile(md, outcome.rendered + "\n", "utf-8");
  written.push(md);

  if (outcome.result) {
    const json = path.join(runDir, "analysis.json");
    await fs.outputJson(json, { ...meta, promptVersion: ANALYSIS_PROMPT_VERSION, kind: outcome.kind, result: outcome.result }, { spaces: 2 });
    written.push(json);
  } else if (outcome.raw !== undefined) {
    const raw = path.join(runDir, "raw.txt");
    await fs.outputFile(raw, outcome.raw, "utf-8");
    written.push(raw);
  }
  return written;
}

export async function saveTranscript(runDir: string, transcript: Transcript, meta: Omit<RunMeta, "screenshots">): Promise<string[]> {
  const md = path.join(runDir, "chat.md");
  const json = path.join(runDir, "chat.json");
  await fs.outputFile(md, transcript.text + "\n", "utf-8");
  await fs.outputJson(json, { ...meta, exchanges: transcript.exchanges }, { spaces: 2 });
  return [md, json];
}
