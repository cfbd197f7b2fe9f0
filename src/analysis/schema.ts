import { z } from "zod";

const optionalText = z.string().nullish();

export const AnalysisResultSchema = z
  .object({
    screenshots_analysed: z.coerce.number().int().min(1).optional(),
    extracted_text: optionalText,
    error_analysis: z
      .object({
        error_type: optionalText,
        severity: optionalText,
        location: optionalText,
        language: optionalText,
      })
      .passthrough()
      .nullish(),
    environment: z
      .object({
        ide: optionalText,
        framework: optionalText,
      })
      .passthrough()
      .nullish(),
    screenshot_breakdown: z.record(z.string(), optionalText).nullish(),
    solution: optionalText,
    // Models sometimes quote it ("0.8"); anything that isn't a number fails.
    confidence: z.coerce.number().optional(),
  })
  .passthrough();

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export type ParseOutcome = { ok: true; result: AnalysisResult } | { ok: false; reason: string };

function extractFencedJson(text: string): string | undefined {
  const m = /```(?:json)?[^\n`]*\n([\s\S]*?)\n```/i.exec(text);
  const body = m?.[1]?.trim();
  return body ? body : undefined;
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
}

/**
 * Parses a model completion into an AnalysisResult. A fenced ```json block is
 * accepted when the whole text is not JSON; nothing is read from text that
 * fails the schema.
 */
export function parseAnalysisResult(raw: string): ParseOutcome {
  let parsed = tryJson(raw.trim());
  if (!parsed.ok) {
    const fenced = extractFencedJson(raw);
    if (!fenced) return parsed;
    parsed = tryJson(fenced);
    if (!parsed.ok) return parsed;
  }

  const checked = AnalysisResultSchema.safeParse(parsed.value);
  if (!checked.success) {
    const msg = checked.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    return { ok: false, reason: msg };
  }
  return { ok: true, result: checked.data };
}
