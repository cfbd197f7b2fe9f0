import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import type { AskModel, ModelAnswer, ModelRequest } from "../src/types.js";

export const TEST_KEY = "sk-test-secret";

export const SAMPLE_COMPLETION = JSON.stringify({
  screenshots_analysed: 1,
  extracted_text: "NullPointerException",
  error_analysis: { error_type: "runtime", severity: "critical", location: "Main.java:42", language: "Java" },
  environment: { ide: "IntelliJ", framework: "none" },
  screenshot_breakdown: { screenshot_1: "shows stack trace" },
  solution: "1. Check null\n2. Add guard",
  confidence: 0.82,
});

export type FakeModel = AskModel & { calls: ModelRequest[] };

/** Replies with the given answers in order; the last one repeats. */
export function fakeModel(...replies: Array<string | Omit<ModelAnswer, "provider" | "model">>): FakeModel {
  const calls: ModelRequest[] = [];
  const ask = async (req: ModelRequest): Promise<ModelAnswer> => {
    calls.push(req);
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)] ?? "";
    const base = { provider: req.provider, model: req.model };
    return typeof reply === "string" ? { ...base, text: reply } : { ...base, ...reply };
  };
  return Object.assign(ask, { calls });
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix = "sda-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((d) => fs.remove(d)));
}

export async function writeScreenshot(dir: string, name: string, bytes = "fake-image-bytes"): Promise<string> {
  const p = path.join(dir, name);
  await fs.outputFile(p, bytes);
  return p;
}
