import http from "node:http";
import path from "node:path";
import crypto from "node:crypto";
import fs from "fs-extra";
import { execa } from "execa";
import MarkdownIt from "markdown-it";

import type { AnalysisOutcome } from "../analyse.js";
import { describeError } from "../errors.js";
import { defaultModelFor } from "../providers/index.js";
import { SessionStore, type DebugSession } from "../session.js";
import { configuredProvider, type AppConfig } from "../util/config.js";
import { silentLogger, type Logger } from "../util/logger.js";
import type { AskModel } from "../types.js";
import { parseMultipart, type MultipartUpload } from "./multipart.js";
import { htmlPage } from "./page.js";

export type UiServerOptions = {
  host?: string;
  port?: number;
  /** Auto-open browser after start when supported. */
  openBrowser?: boolean;
  config?: AppConfig;
  logger?: Logger;
};

export type UiHandlerOptions = {
  store: SessionStore;
  config?: AppConfig;
  /** Where uploads are staged until their analysis finishes. */
  uploadRoot: string;
  logger?: Logger;
  /** Model capability override (tests). */
  ask?: AskModel;
};

type Json = Record<string, unknown>;

type Job = {
  sessionId: string;
  status: string;
  outcome?: AnalysisOutcome;
};

const MAX_JSON_BODY_BYTES = 1_000_000;

const md = new MarkdownIt({ html: false, linkify: true });

function sendJson(res: http.ServerResponse, status: number, data: Json): void {
  const body = JSON.stringify(data, null, 2);
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "cache-control": "no-store",
  });
  res.end(body);
}

function sendText(res: http.ServerResponse, status: number, contentType: string, text: string): void {
  res.writeHead(status, {
    "content-type": contentType,
    "cache-control": "no-store",
  });
  res.end(text);
}

async function readJsonBody(req: http.IncomingMessage): Promise<Json> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_JSON_BODY_BYTES) throw new Error("Request body too large");
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf-8").trim();
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) throw new Error("Expected a JSON object");
  return Object.fromEntries(Object.entries(parsed));
}

function stringField(obj: Json, key: string): string {
  const v = obj[key];
  return typeof v === "string" ? v : "";
}

export function renderMarkdown(text: string): string {
  return md.render(text);
}

export function createUiHandler(opts: UiHandlerOptions): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  const { store, uploadRoot } = opts;
  const logger = opts.logger ?? silentLogger;
  const deps = { ask: opts.ask, logger };
  const provider = configuredProvider(opts.config ?? {});
  const model = opts.config?.model ?? defaultModelFor(provider);
  const jobs = new Map<string, Job>();

  const sessionOr404 = (res: http.ServerResponse, id: string): DebugSession | undefined => {
    const session = id ? store.get(id) : undefined;
    if (!session) sendJson(res, 404, { error: "Unknown session" });
    return session;
  };

  const closeSession = (res: http.ServerResponse, id: string) => {
    for (const [jobId, job] of jobs) if (job.sessionId === id) jobs.delete(jobId);
    const closed = store.close(id);
    if (closed) logger.info(`Session closed: ${id}`);
    sendJson(res, closed ? 200 : 404, { ok: closed });
  };

  return async (req, res) => {
    try {
      const u = new URL(req.url ?? "/", "http://localhost");
      const method = (req.method ?? "GET").toUpperCase();
      const pathname = u.pathname;

      if (method === "GET" && pathname === "/") {
        sendText(res, 200, "text/html; charset=utf-8", htmlPage({ provider, model }));
        return;
      }

      if (method === "GET" && pathname === "/favicon.ico") {
        res.writeHead(204, { "cache-control": "no-store" });
        res.end();
        return;
      }

      if (method === "GET" && pathname === "/api/health") {
        sendJson(res, 200, { ok: true, sessions: store.size, provider, model });
        return;
      }

      if (method === "POST" && pathname === "/api/session") {
        const session = store.create();
        logger.info(`Session opened: ${session.id}`);
        sendJson(res, 200, {
          sessionId: session.id,
          transcript: session.transcript.text,
          transcriptHtml: renderMarkdown(session.transcript.text),
        });
        return;
      }

      const closeMatch = /^\/api\/session\/([^/]+)(\/close)?$/.exec(pathname);
      if (closeMatch?.[1] && ((method === "DELETE" && !closeMatch[2]) || (method === "POST" && closeMatch[2]))) {
        closeSession(res, decodeURIComponent(closeMatch[1]));
        return;
      }

      if (method === "POST" && pathname === "/api/analyse") {
        const jobId = crypto.randomUUID();
        const uploadDir = path.join(uploadRoot, jobId);
        let upload: MultipartUpload;
        try {
          upload = await parseMultipart(req, { uploadDir });
        } catch (e) {
          await fs.remove(uploadDir);
          sendJson(res, 400, { error: describeError(e) });
          return;
        }

        const session = sessionOr404(res, upload.fields.sessionId ?? "");
        if (!session) {
          await fs.remove(uploadDir);
          return;
        }

        const pending = session.startAnalysis(
          {
            text: upload.fields.text ?? "",
            attachments: upload.files.map((f) => ({ path: f.filePath, label: f.filename })),
            apiKey: upload.fields.apiKey,
          },
          deps,
        );
        const job: Job = { sessionId: session.id, status: pending.status };
        jobs.set(jobId, job);

        pending.done
          .catch(
            (e: unknown): AnalysisOutcome => ({
              kind: "failed",
              rendered: `Analysis failed: ${describeError(e)}. Please try again with another screenshot`,
            }),
          )
          .then((outcome) => {
            job.outcome = outcome;
            return fs.remove(uploadDir);
          })
          .catch((e: unknown) => logger.warn(`Could not remove uploads in ${uploadDir}: ${describeError(e)}`));

        sendJson(res, 202, { jobId, status: pending.status, statusHtml: renderMarkdown(pending.status) });
        return;
      }

      const jobMatch = /^\/api\/jobs\/([^/]+)$/.exec(pathname);
      if (method === "GET" && jobMatch?.[1]) {
        const jobId = decodeURIComponent(jobMatch[1]);
        const job = jobs.get(jobId);
        if (!job) {
          sendJson(res, 404, { error: "Unknown job" });
          return;
        }
        if (!job.outcome) {
          sendJson(res, 200, { done: false, status: job.status });
          return;
        }
        jobs.delete(jobId);
        sendJson(res, 200, {
          done: true,
          kind: job.outcome.kind,
          hasResult: Boolean(job.outcome.result),
          rendered: job.outcome.rendered,
          html: renderMarkdown(job.outcome.rendered),
        });
        return;
      }

      if (method === "POST" && pathname === "/api/ask") {
        const body = await readJsonBody(req);
        const session = sessionOr404(res, stringField(body, "sessionId"));
        if (!session) return;

        const outcome = await session.ask(stringField(body, "question"), stringField(body, "apiKey"), deps);
        sendJson(res, 200, {
          ok: outcome.ok,
          status: outcome.status,
          statusHtml: renderMarkdown(outcome.status),
          transcript: outcome.transcript.text,
          transcriptHtml: renderMarkdown(outcome.transcript.text),
        });
        return;
      }

      sendText(res, 404, "text/plain; charset=utf-8", "Not found");
    } catch (e) {
      sendJson(res, 500, { error: describeError(e) });
    }
  };
}

async function openBrowser(urlToOpen: string, logger: Logger): Promise<void> {
  try {
    if (process.platform === "win32") {
      // cmd's start needs a window title argument
      await execa("cmd", ["/c", "start", "", urlToOpen]);
      return;
    }
    if (process.platform === "darwin") {
      await execa("open", [urlToOpen]);
      return;
    }
    await execa("xdg-open", [urlToOpen]);
  } catch (e) {
    logger.warn(`Could not open a browser: ${describeError(e)}`);
  }
}

export async function startUiServer(opts: UiServerOptions = {}): Promise<{ url: string; close: () => Promise<void> }> {
  const host = opts.host ?? "127.0.0.1";
  const requestedPort = opts.port ?? 3210;
  const logger = opts.logger ?? silentLogger;
  const cfg = opts.config ?? {};
  const uploadRoot = path.resolve(process.cwd(), ".ui_uploads");

  const store = new SessionStore({
    provider: cfg.provider,
    model: cfg.model,
    analysisTemperature: cfg.analysisTemperature,
    followUpTemperature: cfg.followUpTemperature,
    maxHistory: cfg.maxHistory,
  });
  const handler = createUiHandler({ store, config: cfg, uploadRoot, logger });
  const server = http.createServer((req, res) => {
    handler(req, res).catch((e: unknown) => logger.error(`Request failed: ${describeError(e)}`));
  });

  const maxPortAttempts = 25;

  const listening = await (async () => {
    for (let i = 0; i <= maxPortAttempts; i++) {
      const p = requestedPort + i;
      try {
        await new Promise<void>((resolve, reject) => {
          const onError = (err: Error) => {
            server.off("listening", onListening);
            reject(err);
          };
          const onListening = () => {
            server.off("error", onError);
            resolve();
          };

          server.once("error", onError);
          server.once("listening", onListening);
          server.listen(p, host);
        });
        return { url: `http://${host}:${p}/` };
      } catch (e) {
        if (e instanceof Error && "code" in e && e.code === "EADDRINUSE") continue;
        throw e;
      }
    }
    throw new Error(`No available port found in range ${requestedPort}-${requestedPort + maxPortAttempts}`);
  })();

  if (opts.openBrowser ?? true) await openBrowser(listening.url, logger);

  return {
    url: listening.url,
    close: async () => {
      store.closeAll();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await fs.remove(uploadRoot);
    },
  };
}
