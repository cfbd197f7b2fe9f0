export type ProviderName = "openai" | "anthropic" | "google" | "xai";

export type ImageMimeType = "image/png" | "image/jpeg" | "image/webp" | "image/gif";

/** A screenshot as handed over by the caller (CLI path, uploaded file). */
export interface ImageAttachment {
  path: string;
  /** origin label shown to the model and in errors; defaults to the basename */
  label?: string;
}

export interface InputImage {
  mimeType: ImageMimeType;
  /** base64 (no data: prefix) */
  base64: string;
  /** original filename for traceability/logging */
  filename: string;
}

export type ContentPart = { type: "text"; text: string } | { type: "image"; image: InputImage };

export interface AnalysisRequest {
  system: string;
  content: ContentPart[];
}

export interface ModelRequest extends AnalysisRequest {
  provider: ProviderName;
  model: string;
  apiKey: string;
  temperature: number;
  /** ask the provider for a JSON-only completion where it supports one */
  jsonOnly: boolean;
  signal?: AbortSignal;
}

export type ModelErrorKind = "credential" | "rate_limit" | "other";

export interface ModelAnswer {
  provider: ProviderName;
  model: string;
  text: string;
  error?: string;
  errorKind?: ModelErrorKind;
}

export type AskModel = (request: ModelRequest) => Promise<ModelAnswer>;
