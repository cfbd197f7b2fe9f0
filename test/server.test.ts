import request from "supertest";
import { describe, expect, it } from "vitest";
import { NO_SCREENSHOTS_MESSAGE } from "../src/analyse.js";
import { TRANSCRIPT_PLACEHOLDER } from "../src/conversation.js";
import { ANALYSING_STATUS, SessionStore } from "../src/session.js";
import { createUiHandler } from "../src/ui/server.js";
import { fakeModel, makeTempDir, SAMPLE_COMPLETION, TEST_KEY, type FakeModel } from "./fakeModel.js";

async function setup(ask: FakeModel = fakeModel(SAMPLE_COMPLETION, "because")) {
  const store = new SessionStore();
  const handler = createUiHandler({ store, uploadRoot: await makeTempDir(), ask });
  return { store, ask, app: request(handler) };
}

async function openSession(app: ReturnType<typeof request>): Promise<string> {
  const res = await app.post("/api/session").expect(200);
  const id: unknown = res.body.sessionId;
  if (typeof id !== "string") throw new Error("no session id");
  return id;
}

describe("ui server", () => {
  it("serves the page and health", async () => {
    const { app } = await setup();

    const page = await app.get("/").expect(200);
    expect(page.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(page.text).toContain("<title>Screenshot Debug Assistant</title>");

    const health = await app.get("/api/health").expect(200);
    expect(health.body).toEqual({ ok: true, sessions: 0, provider: "openai", model: "gpt-4o" });
  });

  it("opens a session with the placeholder transcript", async () => {
    const { app, store } = await setup();
    const res = await app.post("/api/session").expect(200);

    expect(res.body.transcript).toBe(TRANSCRIPT_PLACEHOLDER);
    expect(res.body.transcriptHtml).toBe(`<p>${TRANSCRIPT_PLACEHOLDER}</p>\n`);
    expect(store.size).toBe(1);
  });

  it("answers follow-up questions", async () => {
    const { app, ask } = await setup(fakeModel("because"));
    const sessionId = await openSession(app);

    const res = await app.post("/api/ask").send({ sessionId, apiKey: TEST_KEY, question: "why?" }).expect(200);
    expect(res.body).toEqual({
      ok: true,
      status: "",
      statusHtml: "",
      transcript: "**You:** why?\n\n**Assistant:** because",
      transcriptHtml: "<p><strong>You:</strong> why?</p>\n<p><strong>Assistant:</strong> because</p>\n",
    });
    expect(ask.calls).toHaveLength(1);
  });

  it("keeps the transcript when the key is malformed", async () => {
    const { app, ask } = await setup();
    const sessionId = await openSession(app);

    const res = await app.post("/api/ask").send({ sessionId, apiKey: "bad-key", question: "why?" }).expect(200);
    expect(res.body.ok).toBe(false);
    expect(res.body.status).toBe("Please enter a valid OpenAI API key above.");
    expect(res.body.transcript).toBe(TRANSCRIPT_PLACEHOLDER);
    expect(ask.calls).toHaveLength(0);
  });

  it("runs an upload as a job and grounds later questions in it", async () => {
    const { app, ask } = await setup();
    const sessionId = await openSession(app);

    const started = await app
      .post("/api/analyse")
      .field("sessionId", sessionId)
      .field("apiKey", TEST_KEY)
      .field("text", "crash on startup")
      .attach("screenshots", Buffer.from("png-bytes"), "trace.png")
      .expect(202);
    expect(started.body.status).toBe(ANALYSING_STATUS);

    let done: Record<string, unknown> = {};
    for (let i = 0; i < 50; i++) {
      const res = await app.get(`/api/jobs/${started.body.jobId}`).expect(200);
      if (res.body.done) {
        done = res.body;
        break;
      }
      await new Promise((r) => setTimeout(r, 10));
    }

    expect(done.kind).toBe("ok");
    expect(done.hasResult).toBe(true);
    expect(String(done.rendered).startsWith("## 🔴 Error Analysis")).toBe(true);
    expect(ask.calls[0]?.content[1]).toEqual({
      type: "image",
      image: { mimeType: "image/png", base64: Buffer.from("png-bytes").toString("base64"), filename: "trace.png" },
    });

    await app.get(`/api/jobs/${started.body.jobId}`).expect(404);

    await app.post("/api/ask").send({ sessionId, apiKey: TEST_KEY, question: "why?" }).expect(200);
    expect(ask.calls[1]?.system).toContain("Previous screenshot analysis context (1 screenshot(s) analysed)");
  });

  it("finishes a job without screenshots with the upload prompt", async () => {
    const { app, ask } = await setup();
    const sessionId = await openSession(app);

    const started = await app.post("/api/analyse").field("sessionId", sessionId).field("apiKey", TEST_KEY).expect(202);
    let body: Record<string, unknown> = {};
    for (let i = 0; i < 50 && !body.done; i++) {
      body = (await app.get(`/api/jobs/${started.body.jobId}`).expect(200)).body;
      if (!body.done) await new Promise((r) => setTimeout(r, 10));
    }

    expect(body.kind).toBe("no_screenshots");
    expect(body.rendered).toBe(NO_SCREENSHOTS_MESSAGE);
    expect(ask.calls).toHaveLength(0);
  });

  it("rejects unknown sessions and non-multipart uploads", async () => {
    const { app } = await setup();

    await app.post("/api/ask").send({ sessionId: "nope", question: "why?" }).expect(404, { error: "Unknown session" });
    await app.post("/api/analyse").field("sessionId", "nope").expect(404, { error: "Unknown session" });
    await app.post("/api/analyse").send({ sessionId: "nope" }).expect(400, { error: "Expected multipart/form-data" });
    await app.get("/api/jobs/missing").expect(404, { error: "Unknown job" });
    await app.get("/nowhere").expect(404, "Not found");
  });

  it("closes sessions", async () => {
    const { app, store } = await setup();
    const sessionId = await openSession(app);

    await app.delete(`/api/session/${sessionId}`).expect(200, { ok: true });
    expect(store.size).toBe(0);
    await app.post(`/api/session/${sessionId}/close`).expect(404, { ok: false });
  });
});
