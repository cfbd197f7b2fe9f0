import fs from "fs-extra";
import path from "node:path";
import type { ImageAttachment, ImageMimeType, InputImage } from "../types.js";

export const DEFAULT_IMAGE_MIME: ImageMimeType = "image/jpeg";

export class ImageReadError extends Error {
  readonly label: string;

  constructor(label: string, cause: unknown) {
    super(`Could not read screenshot ${label}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "ImageReadError";
    this.label = label;
  }
}

function mimeFromExt(ext: string): ImageMimeType {
  const e = ext.toLowerCase();
  if (e === ".png") return "image/png";
  if (e === ".jpg" || e === ".jpeg") return "image/jpeg";
  if (e === ".webp") return "image/webp";
  if (e === ".gif") return "image/gif";
  return DEFAULT_IMAGE_MIME;
}

export function attachmentLabel(attachment: ImageAttachment): string {
  return attachment.label?.trim() || path.basename(attachment.path);
}

export function toDataUrl(image: InputImage): string {
  return `data:${image.mimeType};base64,${image.base64}`;
}

export async function encodeImage(attachment: ImageAttachment): Promise<InputImage> {
  const label = attachmentLabel(attachment);
  let buf: Buffer;
  try {
    buf = await fs.readFile(attachment.path);
  } catch (e) {
    throw new ImageReadError(label, e);
  }
  return {
    mimeType: mimeFromExt(path.extname(attachment.path)),
    base64: buf.toString("base64"),
    filename: label,
  };
}

/** Output order matches input order; the first unreadable file rejects the batch. */
export async function encodeImages(attachments: ImageAttachment[]): Promise<InputImage[]> {
  return Promise.all(attachments.map((a) => encodeImage(a)));
}
