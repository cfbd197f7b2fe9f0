import crypto from "node:crypto";
import type { AnalysisResult } from "./analysis/schema.js";
import { analyseScreenshots, invalidKeyMessage, type AnalysisDeps, type AnalysisInput, type AnalysisOutcome } from "./analyse.js";
import { askFollowUp, emptyTranscript, type FollowUpDeps, type FollowUpOutcome, type Transcript } from "./conversation.js";
import { isWellFormedApiKey } from "./util/credential.js";
import type { ProviderName } from "./types.js";

export const ANALYSING_STATUS = "**Analysing...**\n\nPlease wait while I identify the issue.";

export type PendingAnalysis = {
  /** Shown immediately, before the model has answered. */
  status: string;
  done: Promise<AnalysisOutcome>;
  cancel: () => void;
};

export type SessionSettings = {
  provider?: ProviderName;
  model?: string;
  analysisTemperature?: number;
  followUpTemperature?: number;
  maxHistory?: number;
};

/**
 * One user's state: the last successful analysis and the follow-up
 * transcript. Operations run one at a time in submission order.
 */
export class DebugSession {
  readonly id: string;
  readonly settings: SessionSettings;

  private analysis?: AnalysisResult;
  private conversation: Transcript = emptyTranscript();
  private readonly controller = new AbortController();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(id: string = crypto.randomUUID(), settings: SessionSettings = {}) {
    this.id = id;
    this.settings = settings;
  }

  get lastAnalysis(): AnalysisResult | undefined {
    return this.analysis;
  }

  get transcript(): Transcript {
    return this.conversation;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private linkedSignal(): { signal: AbortSignal; abort: () => void; release: () => void } {
    const local = new AbortController();
    const onClose = () => local.abort();
    if (this.closed) local.abort();
    else this.controller.signal.addEventListener("abort", onClose, { once: true });
    return {
      signal: local.signal,
      abort: () => local.abort(),
      release: () => this.controller.signal.removeEventListener("abort", onClose),
    };
  }

  startAnalysis(input: Omit<AnalysisInput, "signal" | "provider" | "model" | "temperature">, deps: AnalysisDeps = {}): PendingAnalysis {
    const provider = this.settings.provider ?? "openai";
    const keyOk = Boolean(input.apiKey && isWellFormedApiKey(input.apiKey, provider));
    const { signal, abort, release } = this.linkedSignal();

    const done = this.enqueue(async () => {
      try {
        const outcome = await analyseScreenshots(
          {
            ...input,
            provider,
            model: this.settings.model,
            temperature: this.settings.analysisTemperature,
            signal,
          },
          deps,
        );
        if (outcome.result && !this.closed) this.analysis = outcome.result;
        return outcome;
      } finally {
        release();
      }
    });

    return { status: keyOk ? ANALYSING_STATUS : invalidKeyMessage(provider), done, cancel: abort };
  }

  ask(question: string, apiKey: string | undefined, deps: FollowUpDeps = {}): Promise<FollowUpOutcome> {
    const { signal, release } = this.linkedSignal();
    return this.enqueue(async () => {
      try {
        const outcome = await askFollowUp(
          {
            question,
            transcript: this.conversation,
            analysis: this.analysis,
            apiKey,
            provider: this.settings.provider,
            model: this.settings.model,
            temperature: this.settings.followUpTemperature,
            maxHistory: this.settings.maxHistory,
            signal,
          },
          deps,
        );
        if (outcome.ok && !this.closed) this.conversation = outcome.transcript;
        return outcome;
      } finally {
        release();
      }
    });
  }

  /** Aborts in-flight model calls; nothing is stored after this. */
  close(): void {
    this.controller.abort();
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, DebugSession>();
  private readonly defaults: SessionSettings;

  constructor(defaults: SessionSettings = {}) {
    this.defaults = defaults;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(settings: SessionSettings = {}): DebugSession {
    const session = new DebugSession(crypto.randomUUID(), { ...this.defaults, ...settings });
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): DebugSession | undefined {
    return this.sessions.get(id);
  }

  close(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.close();
    this.sessions.delete(id);
    return true;
  }

  closeAll(): void {
    for (const id of Array.from(this.sessions.keys())) this.close(id);
  }
}
