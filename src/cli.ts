import path from "node:path";
import fs from "fs-extra";
import { Command } from "commander";
import chalk from "chalk";
import { createInterface, type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { analyseScreenshots, type AnalysisOutcome } from "./analyse.js";
import { makeRunDir, saveAnalysis, saveTranscript } from "./artifacts.js";
import { DEFAULT_MAX_HISTORY } from "./conversation.js";
import { defaultModelFor } from "./providers/index.js";
import { DebugSession } from "./session.js";
import { startUiServer } from "./ui/server.js";
import { apiKeyEnvVar, apiKeyFromEnv } from "./util/credential.js";
import { configuredProvider, mergeAppConfig, readAppConfig, type AppConfig } from "./util/config.js";
import { attachmentLabel } from "./util/image.js";
import { defaultLogger } from "./util/logger.js";
import type { ImageAttachment, ProviderName } from "./types.js";

type CommonOpts = {
  config?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  outdir?: string;
};

async function loadConfig(opts: CommonOpts & { maxHistory?: string }): Promise<AppConfig> {
  const cfg = opts.config ? await readAppConfig(String(opts.config)) : undefined;
  return mergeAppConfig(opts, cfg);
}

function resolveApiKey(provider: ProviderName, explicit?: string): string | undefined {
  const k = explicit?.trim();
  return k ? k : apiKeyFromEnv(provider);
}

function toAttachments(paths: string[]): ImageAttachment[] {
  return paths.map((p) => ({ path: p, label: path.basename(p) }));
}

async function readUserText(opts: { text?: string; textFile?: string }): Promise<string> {
  if (opts.textFile) {
    const ok = await fs.pathExists(opts.textFile);
    if (!ok) throw new Error(`Text file not found: ${opts.textFile}`);
    return fs.readFile(opts.textFile, "utf-8");
  }
  return opts.text ?? "";
}

function printOutcome(outcome: AnalysisOutcome): void {
  if (outcome.kind === "ok") console.log(outcome.rendered);
  else if (outcome.kind === "unparsed") console.log(chalk.yellow(outcome.rendered));
  else console.log(chalk.red(outcome.rendered));
}

async function readPasted(rl: Interface): Promise<string> {
  const lines: string[] = [];
  while (true) {
    const line = await rl.question("");
    if (line.trim() === "---END---") break;
    lines.push(line);
  }
  return lines.join("\n").trim();
}

/** The full command tree; parsing is left to the caller. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("screenshot-debug")
    .description("Analyse error screenshots with a multimodal model, then ask follow-up questions.")
    .version("0.1.0");

  program
    .command("analyse")
    .alias("analyze")
    .description("Analyse one or more screenshots and print the structured analysis.")
    .argument("<images...>", "Screenshot files (png/jpg/jpeg/webp/gif), in order")
    .option("--text <text>", "Describe the issue (optional)")
    .option("--text-file <path>", "Read the issue description from a file")
    .option("--config <path>", "JSON config file")
    .option("--provider <name>", "Provider: openai|anthropic|google|xai")
    .option("--model <name>", "Model name (defaults per provider)")
    .option("--api-key <key>", "API key (defaults to the provider's environment variable)")
    .option("--json", "Print the parsed analysis as JSON instead of Markdown", false)
    .option("--save", "Save analysis.md/analysis.json into a run folder", false)
    .option("--outdir <path>", "Output directory root for --save")
    .action(async (images: string[], opts: CommonOpts & { text?: string; textFile?: string; json: boolean; save: boolean }) => {
      try {
        const cfg = await loadConfig(opts);
        const provider = configuredProvider(cfg);
        const model = cfg.model ?? defaultModelFor(provider);
        const attachments = toAttachments(images);

        const outcome = await analyseScreenshots(
          {
            text: await readUserText(opts),
            attachments,
            apiKey: resolveApiKey(provider, opts.apiKey),
            provider,
            model,
            temperature: cfg.analysisTemperature,
          },
          { logger: defaultLogger() },
        );

        if (opts.json && outcome.result) console.log(JSON.stringify(outcome.result, null, 2));
        else printOutcome(outcome);

        if (opts.save) {
          const dir = await makeRunDir(cfg.outdir ?? "runs");
          const written = await saveAnalysis(dir, outcome, { provider, model, screenshots: attachments.map(attachmentLabel) });
          console.log(chalk.cyan("Saved:"));
          for (const f of written) console.log(`- ${f}`);
        }

        if (!outcome.result) process.exitCode = outcome.kind === "unparsed" ? 1 : 2;
      } catch (e) {
        console.error(chalk.red(e instanceof Error ? e.message : String(e)));
        process.exitCode = 2;
      }
    });

  program
    .command("chat")
    .description("Interactive session: analyse screenshots, then ask follow-up questions about the analysis.")
    .argument("[images...]", "Screenshots to analyse before the first question")
    .option("--text <text>", "Issue description for the initial analysis")
    .option("--config <path>", "JSON config file")
    .option("--provider <name>", "Provider: openai|anthropic|google|xai")
    .option("--model <name>", "Model name (defaults per provider)")
    .option("--api-key <key>", "API key (defaults to the provider's environment variable)")
    .option("--max-history <n>", `Max prior exchanges re-sent with each question (default ${DEFAULT_MAX_HISTORY})`)
    .option("--save", "Save analysis + transcript into a run folder on exit", false)
    .option("--outdir <path>", "Output directory root for --save")
    .action(async (images: string[], opts: CommonOpts & { text?: string; maxHistory?: string; save: boolean }) => {
      let cfg: AppConfig;
      try {
        cfg = await loadConfig(opts);
      } catch (e) {
        console.error(chalk.red(e instanceof Error ? e.message : String(e)));
        process.exitCode = 2;
        return;
      }

      const provider = configuredProvider(cfg);
      const model = cfg.model ?? defaultModelFor(provider);
      const apiKey = resolveApiKey(provider, opts.apiKey);
      const logger = defaultLogger();
      const session = new DebugSession(undefined, {
        provider,
        model,
        analysisTemperature: cfg.analysisTemperature,
        followUpTemperature: cfg.followUpTemperature,
        maxHistory: cfg.maxHistory,
      });

      let lastOutcome: AnalysisOutcome | undefined;
      let lastScreenshots: string[] = [];
      let runDir: string | undefined;

      const ensureRunDir = async (): Promise<string> => {
        if (runDir) return runDir;
        runDir = await makeRunDir(cfg.outdir ?? "runs");
        console.log(chalk.cyan(`Run directory: ${runDir}`));
        return runDir;
      };

      const save = async () => {
        const dir = await ensureRunDir();
        const written = [
          ...(lastOutcome ? await saveAnalysis(dir, lastOutcome, { provider, model, screenshots: lastScreenshots }) : []),
          ...(await saveTranscript(dir, session.transcript, { provider, model })),
        ];
        for (const f of written) console.log(chalk.green(`Saved: ${f}`));
      };

      const analyse = async (paths: string[], text: string) => {
        const attachments = toAttachments(paths);
        const pending = session.startAnalysis({ text, attachments, apiKey }, { logger });
        console.log(chalk.cyan(pending.status));
        const outcome = await pending.done;
        printOutcome(outcome);
        if (outcome.result) {
          lastOutcome = outcome;
          lastScreenshots = attachments.map(attachmentLabel);
        }
      };

      const ask = async (question: string) => {
        const outcome = await session.ask(question, apiKey, { logger });
        if (!outcome.ok) {
          console.log(chalk.yellow(outcome.status));
          return;
        }
        const last = outcome.transcript.exchanges[outcome.transcript.exchanges.length - 1];
        if (last) console.log(chalk.white(last.answer));
      };

      const printHelp = () => {
        console.log(chalk.cyan("Commands:"));
        console.log("  /help                    Show this help");
        console.log("  /exit | /quit            Exit chat");
        console.log("  /analyse <paths...>      Analyse screenshots (replaces the stored analysis on success)");
        console.log("  /paste                   Multi-line question (end with ---END---)");
        console.log("  /status                  Show provider/model and session state");
        console.log("  /transcript              Print the conversation so far");
        console.log("  /save                    Save analysis + transcript now");
      };

      if (!apiKey) console.log(chalk.yellow(`No API key given; set ${apiKeyEnvVar(provider)} or pass --api-key.`));

      const rl = createInterface({ input, output });
      try {
        if (images.length) await analyse(images, opts.text ?? "");
        console.log(chalk.cyan("Interactive session started."));
        console.log(chalk.dim("Type /help for commands. Use /exit to quit."));

        while (true) {
          const line = (await rl.question(chalk.green("you> "))).trim();
          if (!line) continue;

          if (line.startsWith("/")) {
            const [cmd, ...rest] = line.slice(1).split(/\s+/);
            if (cmd === "help") {
              printHelp();
              continue;
            }
            if (cmd === "exit" || cmd === "quit") break;
            if (cmd === "analyse" || cmd === "analyze") {
              if (!rest.length) {
                console.log(chalk.yellow("Usage: /analyse <path> [more paths...]"));
                continue;
              }
              const text = (await rl.question("Describe the issue (optional): ")).trim();
              await analyse(rest, text);
              continue;
            }
            if (cmd === "paste") {
              console.log(chalk.cyan("Paste question. End with a line containing only ---END---"));
              const pasted = await readPasted(rl);
              if (pasted) await ask(pasted);
              continue;
            }
            if (cmd === "status") {
              console.log(chalk.cyan(`Provider: ${provider}`));
              console.log(chalk.cyan(`Model: ${model}`));
              const a = session.lastAnalysis;
              console.log(chalk.cyan(`Analysis: ${a ? `yes (${a.screenshots_analysed ?? 1} screenshot(s))` : "no"}`));
              console.log(chalk.cyan(`Exchanges: ${session.transcript.exchanges.length}`));
              continue;
            }
            if (cmd === "transcript") {
              console.log(session.transcript.text);
              continue;
            }
            if (cmd === "save") {
              await save();
              continue;
            }
            console.log(chalk.yellow("Unknown command. Type /help."));
            continue;
          }

          await ask(line);
        }
      } finally {
        rl.close();
        session.close();
      }

      if (opts.save && (lastOutcome || session.transcript.exchanges.length)) await save();
    });

  program
    .command("ui")
    .description("Start a local web UI for analysing screenshots and asking follow-ups.")
    .option("--host <host>", "Host to bind", "127.0.0.1")
    .option("--port <n>", "Port to listen on", "3210")
    .option("--config <path>", "JSON config file")
    .option("--provider <name>", "Provider: openai|anthropic|google|xai")
    .option("--model <name>", "Model name (defaults per provider)")
    .option("--no-open", "Do not auto-open a browser")
    .action(async (opts: CommonOpts & { host?: string; port?: string; open: boolean }) => {
      try {
        const cfg = await loadConfig(opts);
        const port = Number.parseInt(String(opts.port ?? "3210"), 10) || 3210;
        const host = String(opts.host ?? "127.0.0.1");

        const started = await startUiServer({ host, port, openBrowser: opts.open, config: cfg, logger: defaultLogger() });
        console.log(chalk.cyan(`UI running at: ${started.url}`));
        console.log(chalk.dim("Press Ctrl+C to stop."));
      } catch (e) {
        console.error(chalk.red(e instanceof Error ? e.message : String(e)));
        process.exitCode = 2;
      }
    });

  return program;
}
