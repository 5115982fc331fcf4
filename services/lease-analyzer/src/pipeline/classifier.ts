import { extname } from "node:path";

import { ValidationError } from "../errors.js";
import type { DocumentKind, InboundUpload, SourceDocument } from "../types.js";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".bmp", ".webp", ".gif"]);
const PDF_EXTENSION = ".pdf";

export function classifyFilename(filename: string): DocumentKind | undefined {
  const extension = extname(filename).toLowerCase();
  if (extension === PDF_EXTENSION) {
    return "pdf";
  }
  if (IMAGE_EXTENSIONS.has(extension)) {
    return "image";
  }
  return undefined;
}

const LATIN1_ONLY = /^[\u0000-\u00ff]*$/;

/**
 * The multipart parser reads header parameters as latin1, so a UTF-8 filename
 * arrives as one character per byte. Names that are already wider than latin1,
 * or whose bytes are not valid UTF-8, are returned unchanged.
 */
export function decodeMultipartFilename(name: string): string {
  if (!LATIN1_ONLY.test(name)) {
    return name;
  }
  const decoded = Buffer.from(name, "latin1").toString("utf8");
  return decoded.includes("\uFFFD") ? name : decoded;
}

/**
 * Tags every upload before any of them is transformed, so one bad entry
 * rejects the request without touching the others.
 */
export function classifyUploads(uploads: readonly InboundUpload[]): SourceDocument[] {
  if (uploads.length === 0) {
    throw new ValidationError("at least one file required");
  }

  return uploads.map((upload, index) => {
    const filename = upload.originalname?.trim();
    if (!filename) {
      throw new ValidationError(`file #${index + 1} has no name`);
    }
    const kind = classifyFilename(filename);
    if (!kind) {
      throw new ValidationError(
        `unsupported file type: ${filename}. only PDF or image files (jpg, jpeg, png, bmp, webp, gif) are accepted`,
      );
    }
    return { index, filename, kind, bytes: upload.buffer };
  });
}
