import type { ModelAnswer, ModelErrorKind } from "./types.js";

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" ? status : undefined;
}

function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === "AbortError" || err.name === "APIUserAbortError";
}

export function describeError(err: unknown): string {
  if (isAbortError(err)) return "Request was cancelled";
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Kind from the HTTP status the SDK error carries. `undefined` when the status
 * is missing or says nothing about credentials or rate limits (Gemini answers
 * a bad key with 400), so the message decides.
 */
export function classifyModelError(err: unknown): ModelErrorKind | undefined {
  if (isAbortError(err)) return "other";
  const status = statusOf(err);
  if (status === 401 || status === 403) return "credential";
  if (status === 429) return "rate_limit";
  return undefined;
}

/** Last resort for errors without a status: scan the message. */
export function classifyErrorMessage(message: string): ModelErrorKind {
  if (message.includes("API key")) return "credential";
  if (message.toLowerCase().includes("rate limit")) return "rate_limit";
  return "other";
}

export function resolveErrorKind(answer: ModelAnswer): ModelErrorKind {
  return answer.errorKind ?? classifyErrorMessage(answer.error ?? "");
}

/** Normalizes a thrown SDK error into the answer shape the providers return. */
export function errorAnswer(base: Pick<ModelAnswer, "provider" | "model">, err: unknown): ModelAnswer {
  const error = describeError(err);
  return { provider: base.provider, model: base.model, text: "", error, errorKind: classifyModelError(err) ?? classifyErrorMessage(error) };
}
