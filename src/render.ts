import type { AnalysisResult } from "./analysis/schema.js";

const SEVERITY_ICONS = new Map<string, string>([
  ["critical", "🔴"],
  ["warning", "🟡"],
  ["info", "🔵"],
]);
const UNKNOWN_SEVERITY_ICON = "⚪";

const BREAKDOWN_KEY_RE = /^screenshot_(\d+)$/;

/** Upper-cases the first letter of every alphabetic run, lower-cases the rest. */
export function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, before: string, c: string) => before + c.toUpperCase());
}

function orPlaceholder(v: string | null | undefined, placeholder: string): string {
  if (v == null) return placeholder;
  const s = String(v).trim();
  return s ? s : placeholder;
}

function breakdownLabel(key: string): string {
  return titleCase(key.replace("screenshot_", "").replace(/_/g, " "));
}

type BreakdownLine = { label: string; ordinal: number; description: string };

function breakdownLines(breakdown: Record<string, string | null | undefined> | null | undefined): BreakdownLine[] {
  if (!breakdown) return [];
  const lines: BreakdownLine[] = [];
  for (const [key, description] of Object.entries(breakdown)) {
    if (!description?.trim()) continue;
    const m = BREAKDOWN_KEY_RE.exec(key);
    lines.push({
      label: breakdownLabel(key),
      ordinal: m?.[1] ? Number(m[1]) : Number.POSITIVE_INFINITY,
      description: description.trim(),
    });
  }
  // Stable sort keeps unnumbered keys in their original order, after the numbered ones.
  return lines.sort((a, b) => (a.ordinal === b.ordinal ? 0 : a.ordinal < b.ordinal ? -1 : 1));
}

function confidencePercent(v: number | undefined): string {
  const n = Number(v ?? 0);
  if (!Number.isFinite(n)) throw new Error(`confidence is not a number: ${String(v)}`);
  return `${Math.round(n * 100)}%`;
}

export function renderAnalysis(data: AnalysisResult): string {
  try {
    const errorAnalysis = data.error_analysis;
    const environment = data.environment;

    const severity = orPlaceholder(errorAnalysis?.severity, "unknown");
    const icon = SEVERITY_ICONS.get(severity.toLowerCase()) ?? UNKNOWN_SEVERITY_ICON;

    const sections: string[] = [
      [
        `## ${icon} Error Analysis`,
        "",
        `**Type:** ${titleCase(orPlaceholder(errorAnalysis?.error_type, "Unknown"))} Error  `,
        `**Severity:** ${titleCase(severity)}  `,
        `**Location:** ${orPlaceholder(errorAnalysis?.location, "Not specified")}  `,
        `**Language:** ${orPlaceholder(errorAnalysis?.language, "Not detected")}  `,
        `**Screenshots Analysed:** ${data.screenshots_analysed ?? 1}`,
      ].join("\n"),
      [
        "## 🖥️ Environment",
        "",
        `**IDE:** ${orPlaceholder(environment?.ide, "Not detected")}  `,
        `**Framework:** ${orPlaceholder(environment?.framework, "Not detected")}`,
      ].join("\n"),
    ];

    const breakdown = breakdownLines(data.screenshot_breakdown);
    if (breakdown.length) {
      sections.push(
        ["## Screenshot Analysis", "", ...breakdown.map((b) => `**Screenshot ${b.label}:** ${b.description}  `)].join("\n"),
      );
    }

    sections.push(
      `## 📝 Extracted Text\n\n${orPlaceholder(data.extracted_text, "No text extracted")}`,
      `## 💡 Solution\n\n${orPlaceholder(data.solution, "No solution provided")}`,
      `**Confidence:** ${confidencePercent(data.confidence)}`,
    );

    return sections.join("\n\n");
  } catch (e) {
    return `Error formatting the display: ${e instanceof Error ? e.message : String(e)}`;
  }
}
