import Anthropic from "@anthropic-ai/sdk";
import type { ContentBlockParam } from "@anthropic-ai/sdk/resources/messages/messages";
import { errorAnswer } from "../errors.js";
import type { ModelAnswer, ModelRequest } from "../types.js";

const JSON_ONLY_SUFFIX = "\n\nRespond with the JSON object only: no Markdown fences, no text before or after it.";

export async function askClaude(req: ModelRequest, maxTokens = 1800): Promise<ModelAnswer> {
  try {
    const client = new Anthropic({ apiKey: req.apiKey });

    const content = req.content.map((p) =>
      p.type === "text"
        ? { type: "text" as const, text: p.text || "(no description provided)" }
        : {
            type: "image" as const,
            source: {
              type: "base64" as const,
              media_type: p.image.mimeType,
              data: p.image.base64,
            },
          },
    ) satisfies ContentBlockParam[];

    // No JSON mode on this API; the instruction carries the constraint.
    const msg = await client.messages.create(
      {
        model: req.model,
        max_tokens: maxTokens,
        temperature: req.temperature,
        system: req.jsonOnly ? req.system + JSON_ONLY_SUFFIX : req.system,
        messages: [{ role: "user", content }],
      },
      { signal: req.signal },
    );

    const text = msg.content
      .flatMap((b) => (b.type === "text" ? [b.text] : []))
      .join("\n")
      .trim();

    return { provider: req.provider, model: req.model, text };
  } catch (e) {
    return errorAnswer(req, e);
  }
}
