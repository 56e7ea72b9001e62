import type { Stats } from "fs";
import type { FileHandle } from "fs/promises";
import fs from "fs-extra";
import path from "path";
import { logger as defaultLogger, type Logger } from "../../telemetry/index.js";
import { formatDuration } from "../../process/utils/time.js";
import { TelegramApiClient } from "../telegram/api-client.js";
import { telegramMessageSchema, type TelegramMessage } from "../telegram/types.js";
import type {
  AttachmentPayload,
  Credentials,
  DispatchResult,
  OutboundPayload,
  TextPayload,
} from "../../types/dispatch.js";
import { DispatchError } from "./errors.js";
import {
  ATTACHMENT_SPECS,
  formatBytes,
  guessMimeType,
  normalizeCaption,
  type AttachmentSpec,
} from "./payload.js";

export type DispatcherOptions = {
  apiBaseUrl?: string;
  timeoutMs?: number;
  /** Transport override; tests stub this instead of touching the network. */
  fetch?: typeof fetch;
  logger?: Logger;
};

/**
 * Dispatcher：一次调用 = 校验 + 单次请求 + 结果映射。
 *
 * 关键点（中文）
 * - 校验顺序固定：credentials → payload → 本地文件约束 → 网络请求
 * - 预期内的失败不抛出，统一返回 `{ success: false, error }`
 * - 非 DispatchError 的异常视为程序错误，原样抛给调用方
 */
export class Dispatcher {
  private readonly options: DispatcherOptions;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? defaultLogger;
  }

  async sendText(credentials: Credentials, text: string): Promise<DispatchResult> {
    return this.dispatch(credentials, { kind: "text", text });
  }

  async sendFile(
    credentials: Credentials,
    filePath: string,
    caption?: string,
  ): Promise<DispatchResult> {
    return this.dispatch(credentials, { kind: "document", path: filePath, caption });
  }

  async sendPhoto(
    credentials: Credentials,
    filePath: string,
    caption?: string,
  ): Promise<DispatchResult> {
    return this.dispatch(credentials, { kind: "photo", path: filePath, caption });
  }

  async dispatch(
    credentials: Credentials,
    payload: OutboundPayload,
  ): Promise<DispatchResult> {
    const startedAt = Date.now();
    try {
      const resolved = requireCredentials(credentials);
      this.logger.registerSecret(resolved.botToken);
      this.logger.debug(`dispatching ${payload.kind} to chat ${resolved.chatId}`);

      const client = new TelegramApiClient({
        botToken: resolved.botToken,
        apiBaseUrl: this.options.apiBaseUrl,
        timeoutMs: this.options.timeoutMs,
        fetch: this.options.fetch,
        logger: this.logger,
      });

      const message =
        payload.kind === "text"
          ? await this.deliverText(client, resolved.chatId, payload)
          : await this.deliverAttachment(client, resolved.chatId, payload);

      const durationMs = Date.now() - startedAt;
      this.logger.info(`${payload.kind} delivered`, {
        chatId: resolved.chatId,
        messageId: message.message_id,
        duration: formatDuration(durationMs),
      });
      return {
        success: true,
        kind: payload.kind,
        chatId: resolved.chatId,
        messageId: message.message_id,
        durationMs,
      };
    } catch (error) {
      if (!(error instanceof DispatchError)) throw error;
      this.logger.info(`${payload.kind} not delivered: ${error.kind}`, {
        reason: error.message,
        duration: formatDuration(Date.now() - startedAt),
      });
      return { success: false, error };
    }
  }

  private async deliverText(
    client: TelegramApiClient,
    chatId: string,
    payload: TextPayload,
  ): Promise<TelegramMessage> {
    if (!payload.text.trim()) {
      throw new DispatchError("EmptyMessage", "Message text is empty");
    }
    return client.sendMessage(chatId, payload.text);
  }

  private async deliverAttachment(
    client: TelegramApiClient,
    chatId: string,
    payload: AttachmentPayload,
  ): Promise<TelegramMessage> {
    const spec = ATTACHMENT_SPECS[payload.kind];
    const resolvedPath = await inspectAttachment(payload.path, spec);
    const blob = await readAttachment(resolvedPath, payload.path, spec);

    const form = new FormData();
    form.set("chat_id", chatId);
    const caption = normalizeCaption(payload.caption);
    if (caption) form.set("caption", caption);
    form.set(spec.field, blob, path.basename(resolvedPath));

    this.logger.debug(`uploading ${spec.label} ${path.basename(resolvedPath)}`, {
      size: formatBytes(blob.size),
    });
    return client.requestForm(spec.method, form, telegramMessageSchema);
  }
}

/**
 * Fails with `MissingCredentials` when either value is blank.
 * Token is checked first so the message names the first missing piece.
 */
export function requireCredentials(credentials: Credentials): Credentials {
  const botToken = String(credentials.botToken || "").trim();
  const chatId = String(credentials.chatId || "").trim();
  if (!botToken) {
    throw new DispatchError(
      "MissingCredentials",
      "Bot token is required. Use --token or set TELEGRAM_BOT_TOKEN",
    );
  }
  if (!chatId) {
    throw new DispatchError(
      "MissingCredentials",
      "Chat ID is required. Use --chat-id or set TELEGRAM_CHAT_ID",
    );
  }
  return { botToken, chatId };
}

/**
 * Resolves the attachment path and enforces the local constraints:
 * an existing, readable regular file no larger than `spec.maxBytes`.
 */
export async function inspectAttachment(
  filePath: string,
  spec: AttachmentSpec,
): Promise<string> {
  const src = String(filePath || "");
  if (!src.trim()) {
    throw new DispatchError("FileNotFound", "File not found: (empty path)");
  }
  const resolved = path.resolve(src);

  let stat: Stats;
  try {
    stat = await fs.stat(resolved);
    await fs.access(resolved, fs.constants.R_OK);
  } catch (error) {
    throw new DispatchError("FileNotFound", `File not found: ${src}`, {
      cause: error,
    });
  }
  if (!stat.isFile()) {
    throw new DispatchError("FileNotFound", `File not found: ${src}`);
  }

  if (stat.size > spec.maxBytes) throw fileTooLarge(src, stat.size, spec);
  return resolved;
}

function fileTooLarge(src: string, size: number, spec: AttachmentSpec): DispatchError {
  return new DispatchError(
    "FileTooLarge",
    `File too large: ${src} is ${size} bytes, ${spec.label} limit is ${spec.maxBytes} bytes (${formatBytes(spec.maxBytes)})`,
  );
}

/**
 * Reads the attachment into a Blob through one file handle.
 *
 * 关键点（中文）
 * - 以打开后的 fstat 为准再校验一次大小，文件在 inspect 之后变大也不会超限上传
 * - 最多读取 size 字节，读到的内容直接进 Blob，不再额外复制
 * - 打开/读取失败（文件被删、权限变化）统一映射为 FileNotFound
 */
export async function readAttachment(
  resolvedPath: string,
  src: string,
  spec: AttachmentSpec,
): Promise<Blob> {
  let handle: FileHandle;
  try {
    handle = await fs.promises.open(resolvedPath, "r");
  } catch (error) {
    throw new DispatchError("FileNotFound", `File not found: ${src}`, { cause: error });
  }

  try {
    const { size } = await handle.stat();
    if (size > spec.maxBytes) throw fileTooLarge(src, size, spec);

    const bytes = new Uint8Array(size);
    let offset = 0;
    while (offset < size) {
      const { bytesRead } = await handle.read(bytes, offset, size - offset, offset);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }

    const mime = guessMimeType(resolvedPath);
    return new Blob(
      [offset < size ? bytes.subarray(0, offset) : bytes],
      mime ? { type: mime } : undefined,
    );
  } catch (error) {
    if (error instanceof DispatchError) throw error;
    throw new DispatchError("FileNotFound", `File not found: ${src}`, { cause: error });
  } finally {
    await handle.close();
  }
}
