import OpenAI from "openai";
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { errorAnswer } from "../errors.js";
import { toDataUrl } from "../util/image.js";
import type { ContentPart, ModelAnswer, ModelRequest } from "../types.js";

function toOpenAIContent(parts: ContentPart[]): ChatCompletionContentPart[] {
  return parts.map((p) =>
    p.type === "text"
      ? { type: "text" as const, text: p.text }
      : { type: "image_url" as const, image_url: { url: toDataUrl(p.image), detail: "auto" as const } },
  );
}

/** Shared by the OpenAI and xAI providers; both speak chat completions. */
export async function askChatCompletions(req: ModelRequest, baseURL?: string): Promise<ModelAnswer> {
  try {
    const client = new OpenAI({ apiKey: req.apiKey, baseURL });

    const messages = [
      { role: "system" as const, content: req.system },
      { role: "user" as const, content: toOpenAIContent(req.content) },
    ] satisfies ChatCompletionMessageParam[];

    const resp = await client.chat.completions.create(
      {
        model: req.model,
        messages,
        temperature: req.temperature,
        ...(req.jsonOnly ? { response_format: { type: "json_object" as const } } : {}),
      },
      { signal: req.signal },
    );

    return { provider: req.provider, model: req.model, text: resp.choices[0]?.message.content ?? "" };
  } catch (e) {
    return errorAnswer(req, e);
  }
}

export async function askOpenAI(req: ModelRequest): Promise<ModelAnswer> {
  return askChatCompletions(req);
}
