import { describe, expect, it } from "vitest";
import { classifyErrorMessage, classifyModelError, describeError, errorAnswer, resolveErrorKind } from "../src/errors.js";
import type { ModelRequest } from "../src/types.js";

class StatusError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

function abortError(): Error {
  const e = new Error("This operation was aborted");
  e.name = "AbortError";
  return e;
}

describe("classifyModelError", () => {
  it("maps HTTP status to a kind", () => {
    expect(classifyModelError(new StatusError(401, "Unauthorized"))).toBe("credential");
    expect(classifyModelError(new StatusError(403, "Forbidden"))).toBe("credential");
    expect(classifyModelError(new StatusError(429, "Too Many Requests"))).toBe("rate_limit");
  });

  it("leaves other statuses to the message", () => {
    expect(classifyModelError(new StatusError(500, "Incorrect API key"))).toBeUndefined();
    expect(classifyModelError(new StatusError(400, "API key not valid. Please pass a valid API key."))).toBeUndefined();
  });

  it("leaves errors without a status undecided", () => {
    expect(classifyModelError(new Error("socket hang up"))).toBeUndefined();
    expect(classifyModelError("string failure")).toBeUndefined();
  });

  it("treats cancellation as a plain failure", () => {
    expect(classifyModelError(abortError())).toBe("other");
    expect(describeError(abortError())).toBe("Request was cancelled");
  });
});

describe("classifyErrorMessage", () => {
  it("matches the credential and rate-limit phrases", () => {
    expect(classifyErrorMessage("Incorrect API key provided")).toBe("credential");
    expect(classifyErrorMessage("Rate limit reached for gpt-4o")).toBe("rate_limit");
    expect(classifyErrorMessage("api key missing")).toBe("other");
    expect(classifyErrorMessage("timeout")).toBe("other");
  });
});

describe("resolveErrorKind", () => {
  it("prefers the structured kind over the message", () => {
    expect(resolveErrorKind({ provider: "openai", model: "m", text: "", error: "rate limit", errorKind: "credential" })).toBe(
      "credential",
    );
    expect(resolveErrorKind({ provider: "openai", model: "m", text: "", error: "rate limit" })).toBe("rate_limit");
  });
});

describe("errorAnswer", () => {
  it("copies only the provider and model from the request", () => {
    const request: ModelRequest = {
      provider: "anthropic",
      model: "claude-test",
      apiKey: "sk-ant-test-secret",
      system: "sys",
      content: [],
      temperature: 0.3,
      jsonOnly: true,
    };
    const answer = errorAnswer(request, new StatusError(429, "slow down"));

    expect(answer).toEqual({ provider: "anthropic", model: "claude-test", text: "", error: "slow down", errorKind: "rate_limit" });
  });

  it("reads a credential failure from the message when the status is 400", () => {
    const answer = errorAnswer(
      { provider: "google", model: "gemini-2.5-flash" },
      new StatusError(400, "API key not valid. Please pass a valid API key."),
    );
    expect(answer.errorKind).toBe("credential");
  });

  it("falls back to the message when there is no status", () => {
    const answer = errorAnswer({ provider: "openai", model: "gpt-4o" }, new Error("Invalid API key"));
    expect(answer.errorKind).toBe("credential");
  });
});
