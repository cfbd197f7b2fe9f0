import { askChatCompletions } from "./openai.js";
import type { ModelAnswer, ModelRequest } from "../types.js";

export async function askGrok(req: ModelRequest): Promise<ModelAnswer> {
  return askChatCompletions(req, "https://api.x.ai/v1");
}
