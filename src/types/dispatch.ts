import type { DispatchError } from "../core/dispatcher/errors.js";

/**
 * Bot credentials for one invocation.
 * Resolved once (flag > env), never persisted or logged.
 */
export interface Credentials {
  botToken: string;
  chatId: string;
}

export type AttachmentKind = "document" | "photo";

export type TextPayload = {
  kind: "text";
  text: string;
};

export type AttachmentPayload = {
  kind: AttachmentKind;
  path: string;
  caption?: string;
};

export type OutboundPayload = TextPayload | AttachmentPayload;

export type DispatchSuccess = {
  success: true;
  kind: OutboundPayload["kind"];
  chatId: string;
  messageId: number;
  durationMs: number;
};

export type DispatchFailure = {
  success: false;
  error: DispatchError;
};

export type DispatchResult = DispatchSuccess | DispatchFailure;
