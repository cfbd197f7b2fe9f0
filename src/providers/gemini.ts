import { GoogleGenAI } from "@google/genai";
import { errorAnswer } from "../errors.js";
import type { ModelAnswer, ModelRequest } from "../types.js";

export async function askGemini(req: ModelRequest): Promise<ModelAnswer> {
  try {
    const client = new GoogleGenAI({ apiKey: req.apiKey });

    const parts = req.content.map((p) =>
      p.type === "text"
        ? { text: p.text }
        : {
            inlineData: {
              mimeType: p.image.mimeType,
              data: p.image.base64,
            },
          },
    );

    const resp = await client.models.generateContent({
      model: req.model,
      contents: [{ role: "user", parts }],
      config: {
        systemInstruction: req.system,
        temperature: req.temperature,
        abortSignal: req.signal,
        ...(req.jsonOnly ? { responseMimeType: "application/json" } : {}),
      },
    });

    return { provider: req.provider, model: req.model, text: resp.text ?? "" };
  } catch (e) {
    return errorAnswer(req, e);
  }
}
