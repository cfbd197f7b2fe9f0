import type { AnalysisResult } from "./analysis/schema.js";
import { errorAnswer, resolveErrorKind } from "./errors.js";
import { buildFollowUpSystemPrompt } from "./prompt.js";
import { askProvider, defaultModelFor } from "./providers/index.js";
import { isWellFormedApiKey, providerLabel } from "./util/credential.js";
import { silentLogger, type Logger } from "./util/logger.js";
import type { AskModel, ModelAnswer, ModelRequest, ProviderName } from "./types.js";

export const TRANSCRIPT_PLACEHOLDER = "Your conversation will appear here after you start asking questions...";

export const DEFAULT_FOLLOW_UP_TEMPERATURE = 0.7;
/** Exchanges re-sent to the model as context; older ones are left out. */
export const DEFAULT_MAX_HISTORY = 10;

export const EMPTY_QUESTION_MESSAGE = "Please ask a question.";

export type Exchange = { question: string; answer: string };

export type Transcript = {
  /** Display text: the placeholder until the first exchange, then the blocks. */
  text: string;
  exchanges: Exchange[];
};

export function emptyTranscript(): Transcript {
  return { text: TRANSCRIPT_PLACEHOLDER, exchanges: [] };
}

export function formatExchange(e: Exchange): string {
  return `**You:** ${e.question}\n\n**Assistant:** ${e.answer}`;
}

export function appendExchange(transcript: Transcript, exchange: Exchange): Transcript {
  const block = formatExchange(exchange);
  const text =
    transcript.text === TRANSCRIPT_PLACEHOLDER || !transcript.text.trim() ? block : `${transcript.text}\n\n${block}`;
  return { text, exchanges: [...transcript.exchanges, exchange] };
}

export function analysisContext(analysis: AnalysisResult | undefined): string {
  if (!analysis) {
    return "No previous screenshot analysis available. The user has not analysed any screenshots yet; do not invent an analysis, and suggest analysing screenshot(s) first if the question depends on one.";
  }
  const count = analysis.screenshots_analysed ?? 1;
  return `Previous screenshot analysis context (${count} screenshot(s) analysed):

${JSON.stringify(analysis, null, 2)}

This analysis was performed on the user's ${count} screenshot(s). Reference this context when answering the follow-up questions.`;
}

/**
 * The most recent `maxHistory` exchanges, rendered as in the transcript, with
 * a note when older ones were cut.
 */
export function conversationContext(transcript: Transcript, maxHistory = DEFAULT_MAX_HISTORY): string {
  const keep = Math.max(0, maxHistory);
  const recent = keep ? transcript.exchanges.slice(-keep) : [];
  const omitted = transcript.exchanges.length - recent.length;

  const parts: string[] = [];
  if (omitted > 0) parts.push(`(${omitted} earlier exchange(s) omitted)`);
  parts.push(...recent.map(formatExchange));
  return parts.length ? parts.join("\n\n") : "(none yet)";
}

export type FollowUpInput = {
  question: string;
  transcript: Transcript;
  analysis?: AnalysisResult;
  apiKey?: string;
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  maxHistory?: number;
  signal?: AbortSignal;
};

export type FollowUpOutcome = {
  ok: boolean;
  transcript: Transcript;
  /** Empty on success. */
  status: string;
};

export type FollowUpDeps = {
  ask?: AskModel;
  logger?: Logger;
};

export async function askFollowUp(input: FollowUpInput, deps: FollowUpDeps = {}): Promise<FollowUpOutcome> {
  const ask = deps.ask ?? askProvider;
  const logger = deps.logger ?? silentLogger;
  const provider = input.provider ?? "openai";
  const model = input.model ?? defaultModelFor(provider);
  const unchanged = (status: string): FollowUpOutcome => ({ ok: false, transcript: input.transcript, status });

  const question = input.question.trim();
  if (!question) return unchanged(EMPTY_QUESTION_MESSAGE);

  const apiKey = input.apiKey;
  if (!apiKey || !isWellFormedApiKey(apiKey, provider)) {
    return unchanged(`Please enter a valid ${providerLabel(provider)} API key above.`);
  }

  const system = buildFollowUpSystemPrompt({
    analysisContext: analysisContext(input.analysis),
    conversation: conversationContext(input.transcript, input.maxHistory),
  });

  const request: ModelRequest = {
    provider,
    model,
    apiKey,
    system,
    content: [{ type: "text", text: question }],
    temperature: input.temperature ?? DEFAULT_FOLLOW_UP_TEMPERATURE,
    jsonOnly: false,
    signal: input.signal,
  };
  let answer: ModelAnswer;
  try {
    answer = await ask(request);
  } catch (e) {
    answer = errorAnswer(request, e);
  }

  if (answer.error !== undefined) {
    const kind = resolveErrorKind(answer);
    logger.error(`Follow-up request failed (${kind}): ${answer.error}`);
    if (kind === "credential") {
      return unchanged("**Assistant:** I'm having trouble connecting to the AI service. Please check your API key.");
    }
    if (kind === "rate_limit") {
      return unchanged("**Assistant:** I'm receiving too many requests. Please wait a moment and try again.");
    }
    return unchanged(`**Assistant:** Sorry, I encountered an error: ${answer.error}. Please try again.`);
  }

  return {
    ok: true,
    transcript: appendExchange(input.transcript, { question: input.question, answer: answer.text }),
    status: "",
  };
}
