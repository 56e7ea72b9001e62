import path from "path";
import type { AttachmentKind } from "../../types/dispatch.js";
import type { TelegramMethod } from "../telegram/types.js";

const MB = 1024 * 1024;

export interface AttachmentSpec {
  /** Bot API method the upload goes to. */
  method: TelegramMethod;
  /** multipart field carrying the file. */
  field: string;
  maxBytes: number;
  label: string;
}

/**
 * Per-kind upload rules. The limits are the Bot API upload ceilings and
 * are enforced locally before any byte is sent.
 */
export const ATTACHMENT_SPECS = {
  document: {
    method: "sendDocument",
    field: "document",
    maxBytes: 50 * MB,
    label: "document",
  },
  photo: {
    method: "sendPhoto",
    field: "photo",
    maxBytes: 10 * MB,
    label: "photo",
  },
} as const satisfies Record<AttachmentKind, AttachmentSpec>;

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < MB) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / MB).toFixed(1)} MB`;
}

export function guessMimeType(fileName: string): string | undefined {
  const ext = (path.extname(fileName) || "").toLowerCase();
  switch (ext) {
    case ".png":
      return "image/png";
    case ".jpg":
    case ".jpeg":
      return "image/jpeg";
    case ".webp":
      return "image/webp";
    case ".gif":
      return "image/gif";
    case ".pdf":
      return "application/pdf";
    case ".zip":
      return "application/zip";
    case ".txt":
    case ".log":
      return "text/plain";
    case ".csv":
      return "text/csv";
    case ".json":
      return "application/json";
    default:
      return undefined;
  }
}

/** Captions that are blank after trimming are not sent. */
export function normalizeCaption(caption: string | undefined): string | undefined {
  const text = typeof caption === "string" ? caption.trim() : "";
  return text || undefined;
}
