import { parseAnalysisResult, type AnalysisResult } from "./analysis/schema.js";
import { errorAnswer, resolveErrorKind } from "./errors.js";
import { buildAnalysisRequest } from "./prompt.js";
import { askProvider, defaultModelFor } from "./providers/index.js";
import { renderAnalysis } from "./render.js";
import { apiKeyPrefix, isWellFormedApiKey, providerLabel } from "./util/credential.js";
import { encodeImages, ImageReadError } from "./util/image.js";
import { silentLogger, type Logger } from "./util/logger.js";
import type { AskModel, ImageAttachment, InputImage, ModelAnswer, ModelRequest, ProviderName } from "./types.js";

export const DEFAULT_ANALYSIS_TEMPERATURE = 0.3;

export const NO_SCREENSHOTS_MESSAGE = "Please upload at least one screenshot to analyse.";
export const RATE_LIMIT_MESSAGE = "**Rate Limit Error**: Too many requests. Please wait a moment and try again.";

export function invalidKeyMessage(provider: ProviderName): string {
  return `**Invalid API Key**: Please enter a valid ${providerLabel(provider)} API key starting with '${apiKeyPrefix(provider)}'`;
}

export function connectionErrorMessage(provider: ProviderName): string {
  return `**Connection Error**: Please check your ${providerLabel(provider)} API key is valid and has sufficient credits.`;
}

export type AnalysisInput = {
  text: string;
  attachments: ImageAttachment[];
  apiKey?: string;
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
};

export type AnalysisOutcomeKind =
  | "ok"
  | "no_screenshots"
  | "invalid_key"
  | "image_error"
  | "credential"
  | "rate_limit"
  | "failed"
  | "unparsed";

export type AnalysisOutcome = {
  kind: AnalysisOutcomeKind;
  /** Markdown shown to the user, whatever the outcome. */
  rendered: string;
  /** Present only for kind "ok". */
  result?: AnalysisResult;
  /** Model completion, when one was received. */
  raw?: string;
};

export type AnalysisDeps = {
  ask?: AskModel;
  logger?: Logger;
};

/**
 * Runs one screenshot analysis. Rejects only on an unexpected encoder failure:
 * preconditions, model failures (thrown or returned) and unparseable
 * completions all come back as an outcome with no result, so a failed run
 * cannot replace a stored good one.
 */
export async function analyseScreenshots(input: AnalysisInput, deps: AnalysisDeps = {}): Promise<AnalysisOutcome> {
  const ask = deps.ask ?? askProvider;
  const logger = deps.logger ?? silentLogger;
  const provider = input.provider ?? "openai";
  const model = input.model ?? defaultModelFor(provider);

  if (!input.attachments.length) {
    return { kind: "no_screenshots", rendered: NO_SCREENSHOTS_MESSAGE };
  }

  const apiKey = input.apiKey;
  if (!apiKey || !isWellFormedApiKey(apiKey, provider)) {
    return { kind: "invalid_key", rendered: invalidKeyMessage(provider) };
  }

  let images: InputImage[];
  try {
    images = await encodeImages(input.attachments);
  } catch (e) {
    if (e instanceof ImageReadError) {
      logger.warn(e.message);
      return { kind: "image_error", rendered: e.message };
    }
    throw e;
  }

  const request = buildAnalysisRequest(input.text, images);
  logger.info(`Analysing ${images.length} screenshot(s) with ${provider}/${model}`);

  const modelRequest: ModelRequest = {
    ...request,
    provider,
    model,
    apiKey,
    temperature: input.temperature ?? DEFAULT_ANALYSIS_TEMPERATURE,
    jsonOnly: true,
    signal: input.signal,
  };
  let answer: ModelAnswer;
  try {
    answer = await ask(modelRequest);
  } catch (e) {
    answer = errorAnswer(modelRequest, e);
  }

  if (answer.error !== undefined) {
    const kind = resolveErrorKind(answer);
    logger.error(`Analysis request failed (${kind}): ${answer.error}`);
    if (kind === "credential") return { kind: "credential", rendered: connectionErrorMessage(provider) };
    if (kind === "rate_limit") return { kind: "rate_limit", rendered: RATE_LIMIT_MESSAGE };
    return {
      kind: "failed",
      rendered: `Analysis failed: ${answer.error}. Please try again with another screenshot`,
    };
  }

  const parsed = parseAnalysisResult(answer.text);
  if (!parsed.ok) {
    logger.warn(`Could not parse analysis response: ${parsed.reason}`);
    return { kind: "unparsed", rendered: `Error parsing response. Raw output:\n${answer.text}`, raw: answer.text };
  }

  return { kind: "ok", rendered: renderAnalysis(parsed.result), result: parsed.result, raw: answer.text };
}
