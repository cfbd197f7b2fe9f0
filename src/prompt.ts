import type { AnalysisRequest, InputImage } from "./types.js";

/**
 * Bump when a field name or its meaning changes; the renderer and the result
 * schema read exactly these keys.
 */
export const ANALYSIS_PROMPT_VERSION = 2;

export const SYSTEM_PREAMBLE = "You are a helpful software and code debugging assistant.";

function breakdownShape(count: number): string {
  return Array.from({ length: count }, (_, i) => {
    const n = i + 1;
    const suffix = n > 1 ? " (if applicable)" : "";
    return `      "screenshot_${n}": "brief description of what screenshot ${n} shows${suffix}"`;
  }).join(",\n");
}

export function buildAnalysisSystemPrompt(images: Pick<InputImage, "filename">[]): string {
  const count = images.length;
  const order = images.map((img, i) => `  ${i + 1}. ${img.filename}`).join("\n");

  return `${SYSTEM_PREAMBLE} Analyse the ${count} screenshot(s) and text description, then respond with a JSON object containing:
  {
    "screenshots_analysed": ${count},
    "extracted_text": "main error messages and code snippets visible across all screenshots which likely relate to the issue",
    "error_analysis": {
      "error_type": "syntax|runtime|compilation|network|linting|other",
      "severity": "critical|warning|info",
      "location": "file and line information if visible across screenshots",
      "language": "the detected programming language used in the screenshots"
    },
    "environment": {
      "ide": "IDE type if recognisable (VS Code, PyCharm, etc.)",
      "framework": "detected framework/library (React, Flask, Spring Boot, etc.)"
    },
    "screenshot_breakdown": {
${breakdownShape(count)}
    },
    "solution": "step-by-step debugging advice considering information from all screenshots. Provide each step on a new line (use actual line breaks between numbered steps)",
    "confidence": 0.0
  }

"confidence" is a number from 0.0 to 1.0. Use the screenshot_breakdown keys screenshot_1 to screenshot_${count}, numbered in the order the screenshots are attached:
${order}

When analysing multiple screenshots, look for connections between them (e.g. code in one screenshot causing the error in another).
If no text description is given, look for lines of code with visible error markers (red or yellow underlines, highlighted lines) or clear error descriptions from a terminal or console if one is shown.
Be honest in your confidence score. Be as specific as possible in your solution. Always return valid JSON only.`;
}

export function buildAnalysisRequest(userText: string, images: InputImage[]): AnalysisRequest {
  return {
    system: buildAnalysisSystemPrompt(images),
    content: [{ type: "text", text: userText }, ...images.map((image) => ({ type: "image" as const, image }))],
  };
}

export function buildFollowUpSystemPrompt(args: { analysisContext: string; conversation: string }): string {
  return `${SYSTEM_PREAMBLE} The user is asking a follow-up question about a previous code analysis:

${args.analysisContext}

Previous conversation:

${args.conversation}

Provide natural, conversational responses. Be helpful and detailed but don't repeat information unnecessarily. If referring to the previous analysis, be specific about what you're referencing.`;
}
