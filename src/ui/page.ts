import { apiKeyPrefix, providerLabel } from "../util/credential.js";
import type { ProviderName } from "../types.js";

// Browser-side script kept as plain JS so the page needs no build step.
const CLIENT_SCRIPT = `
const state = { sessionId: null };
const $ = (id) => document.getElementById(id);

async function json(res) {
  const body = await res.json().catch(() => ({}));
  if (!res.ok) throw new Error(body.error || res.statusText);
  return body;
}

async function ensureSession() {
  if (state.sessionId) return state.sessionId;
  const body = await json(await fetch("/api/session", { method: "POST" }));
  state.sessionId = body.sessionId;
  $("transcript").innerHTML = body.transcriptHtml;
  return state.sessionId;
}

async function poll(jobId) {
  while (true) {
    const body = await json(await fetch("/api/jobs/" + encodeURIComponent(jobId)));
    if (body.done) return body;
    await new Promise((r) => setTimeout(r, 800));
  }
}

async function analyse() {
  const btn = $("analyseBtn");
  btn.disabled = true;
  try {
    const form = new FormData();
    form.set("sessionId", await ensureSession());
    form.set("apiKey", $("apiKey").value);
    form.set("text", $("text").value);
    for (const f of $("screenshots").files) form.append("screenshots", f, f.name);
    const started = await json(await fetch("/api/analyse", { method: "POST", body: form }));
    $("analysis").innerHTML = started.statusHtml;
    const done = await poll(started.jobId);
    $("analysis").innerHTML = done.html;
  } catch (e) {
    $("analysis").textContent = String(e.message || e);
  } finally {
    btn.disabled = false;
  }
}

async function ask() {
  const btn = $("askBtn");
  btn.disabled = true;
  try {
    const body = await json(
      await fetch("/api/ask", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ sessionId: await ensureSession(), apiKey: $("apiKey").value, question: $("question").value }),
      }),
    );
    $("transcript").innerHTML = body.transcriptHtml;
    $("askStatus").innerHTML = body.statusHtml;
    if (body.ok) $("question").value = "";
  } catch (e) {
    $("askStatus").textContent = String(e.message || e);
  } finally {
    btn.disabled = false;
  }
}

$("analyseBtn").addEventListener("click", analyse);
$("askBtn").addEventListener("click", ask);
window.addEventListener("pagehide", () => {
  if (state.sessionId) navigator.sendBeacon("/api/session/" + encodeURIComponent(state.sessionId) + "/close");
});
ensureSession().catch((e) => { $("analysis").textContent = String(e.message || e); });
`;

function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function htmlPage(args: { provider: ProviderName; model: string }): string {
  const label = escapeHtml(providerLabel(args.provider));
  const prefix = escapeHtml(apiKeyPrefix(args.provider));

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Screenshot Debug Assistant</title>
  <style>
    *, *::before, *::after { box-sizing: border-box; }
    :root { color-scheme: light dark; }
    body { font-family: ui-sans-serif, system-ui, Segoe UI, Roboto, Arial; margin: 0; }
    header { padding: 14px 18px; border-bottom: 1px solid rgba(127,127,127,.3); }
    main { padding: 18px; max-width: 1100px; margin: 0 auto; }
    .grid { display: grid; grid-template-columns: 1fr 2fr; gap: 14px; }
    @media (max-width: 980px) { .grid { grid-template-columns: 1fr; } }
    .card { border: 1px solid rgba(127,127,127,.3); border-radius: 12px; padding: 14px; margin-bottom: 14px; }
    input[type=password], textarea { width: 100%; padding: 8px 10px; border-radius: 8px; border: 1px solid rgba(127,127,127,.4); background: rgba(127,127,127,.06); color: inherit; }
    .hint { opacity: .75; font-size: 12px; }
    button { padding: 8px 12px; border-radius: 10px; border: 1px solid #2563eb; background: #2563eb; color: white; cursor: pointer; margin-top: 10px; }
    button:disabled { opacity: .6; cursor: progress; }
    pre { white-space: pre-wrap; word-break: break-word; }
    .mono { font-family: ui-monospace, SFMono-Regular, Menlo, Consolas, monospace; }
  </style>
</head>
<body>
  <header>
    <div style="font-weight:700;">Screenshot Debug Assistant</div>
    <div class="hint">Upload screenshots of your code errors and get quick debugging help. Provider: ${label} <span class="mono">${escapeHtml(args.model)}</span></div>
  </header>
  <main>
    <div class="card">
      <label for="apiKey">${label} API key</label>
      <input id="apiKey" type="password" placeholder="${prefix}..." autocomplete="off" />
      <div class="hint">Only used for this session and never stored.</div>
    </div>
    <div class="grid">
      <div class="card">
        <div style="font-weight:700; margin-bottom:8px;">Upload screenshots and describe your issue</div>
        <textarea id="text" rows="4" placeholder="What were you trying to do when this error occurred?"></textarea>
        <div style="margin-top:10px;"><input id="screenshots" type="file" multiple accept=".png,.jpg,.jpeg,.webp,.gif" /></div>
        <div class="hint">1-3 screenshots recommended: code, terminal error, browser console.</div>
        <button type="button" id="analyseBtn">Analyse Screenshots</button>
      </div>
      <div class="card" id="analysis"></div>
    </div>
    <div class="card">
      <div style="font-weight:700; margin-bottom:8px;">Ask follow-up questions</div>
      <div id="transcript"></div>
      <textarea id="question" rows="2" placeholder="Can you explain this in more detail? How do I prevent this error in the future?"></textarea>
      <button type="button" id="askBtn">Submit</button>
      <div id="askStatus"></div>
    </div>
  </main>
  <script>${CLIENT_SCRIPT}</script>
</body>
</html>`;
}
