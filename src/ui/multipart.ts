import http from "node:http";
import path from "node:path";
import fs from "fs-extra";
import Busboy from "busboy";

export type UploadedFile = {
  fieldname: string;
  filePath: string;
  filename: string;
  mimeType: string;
};

export type MultipartUpload = {
  fields: Record<string, string>;
  /** In the order the client sent them. */
  files: UploadedFile[];
};

export function sanitizeFileName(name: string): string {
  const base = path.basename(name || "file");
  const cleaned = base.replace(/[^a-zA-Z0-9._-]/g, "_");
  return cleaned || "file";
}

export async function parseMultipart(
  req: http.IncomingMessage,
  opts: { uploadDir: string; maxFiles?: number; maxFileBytes?: number },
): Promise<MultipartUpload> {
  const contentType = String(req.headers["content-type"] ?? "");
  if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
    throw new Error("Expected multipart/form-data");
  }

  await fs.mkdirp(opts.uploadDir);

  return new Promise((resolve, reject) => {
    const bb = Busboy({
      headers: req.headers,
      limits: { files: opts.maxFiles ?? 10, fileSize: opts.maxFileBytes ?? 20_000_000 },
    });

    const fields: Record<string, string> = {};
    const files: UploadedFile[] = [];
    const writes: Promise<void>[] = [];
    let failed = false;

    const fail = (err: Error) => {
      if (failed) return;
      failed = true;
      req.unpipe(bb);
      reject(err);
    };

    bb.on("field", (name, value) => {
      fields[name] = value;
    });

    bb.on("file", (fieldname, file, info) => {
      const safe = sanitizeFileName(info.filename || "upload");
      // Index prefix keeps same-named uploads apart.
      const filePath = path.join(opts.uploadDir, `${files.length + 1}_${safe}`);
      files.push({ fieldname, filePath, filename: safe, mimeType: info.mimeType || "application/octet-stream" });

      const out = fs.createWriteStream(filePath);
      writes.push(
        new Promise<void>((res, rej) => {
          out.on("finish", () => res());
          out.on("error", rej);
          file.on("error", rej);
        }),
      );
      file.on("limit", () => fail(new Error(`File too large: ${safe}`)));
      file.pipe(out);
    });

    bb.on("filesLimit", () => fail(new Error(`Too many files (max ${opts.maxFiles ?? 10})`)));
    bb.on("error", (err) => fail(err instanceof Error ? err : new Error(String(err))));
    bb.on("close", () => {
      Promise.all(writes).then(
        () => {
          if (!failed) resolve({ fields, files });
        },
        (err: unknown) => fail(err instanceof Error ? err : new Error(String(err))),
      );
    });

    req.pipe(bb);
  });
}
