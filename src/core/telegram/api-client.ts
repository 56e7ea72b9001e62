import type { z } from "zod";
import { DispatchError } from "../dispatcher/errors.js";
import { logger as defaultLogger, type Logger } from "../../telemetry/index.js";
import {
  telegramApiResponseSchema,
  telegramMessageSchema,
  type TelegramApiResponse,
  type TelegramMessage,
  type TelegramMethod,
} from "./types.js";

export const DEFAULT_API_BASE_URL = "https://api.telegram.org";
export const DEFAULT_TIMEOUT_MS = 30_000;
// Largest delay Node timers accept; AbortSignal.timeout misfires above it.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type TelegramApiClientOptions = {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

/**
 * Telegram Bot API transport.
 *
 * This module centralizes:
 * - JSON & multipart/form-data requests to the Bot API
 * - a bounded timeout per request
 * - mapping transport failures to `NetworkError` and everything the API
 *   answered (ok:false, non-2xx, malformed body) to `ApiError`
 *
 * One call = one attempt. There is no retry here.
 */
export class TelegramApiClient {
  private readonly botToken: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(opts: TelegramApiClientOptions) {
    this.botToken = opts.botToken;
    this.apiBaseUrl = (opts.apiBaseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger ?? defaultLogger;
    this.logger.registerSecret(this.botToken);
  }

  methodUrl(method: string): string {
    return `${this.apiBaseUrl}/bot${this.botToken}/${method}`;
  }

  async requestJson<T>(
    method: TelegramMethod,
    data: Record<string, unknown>,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    return this.request(
      method,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(data),
      },
      resultSchema,
    );
  }

  async requestForm<T>(
    method: TelegramMethod,
    form: FormData,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    return this.request(method, { method: "POST", body: form }, resultSchema);
  }

  async sendMessage(chatId: string, text: string): Promise<TelegramMessage> {
    return this.requestJson(
      "sendMessage",
      { chat_id: chatId, text },
      telegramMessageSchema,
    );
  }

  private async request<T>(
    method: TelegramMethod,
    init: RequestInit,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = this.methodUrl(method);
    this.logger.debug(`POST ${url}`, { timeoutMs: this.timeoutMs });

    let response: Response;
    let bodyText: string;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      bodyText = await response.text();
    } catch (error) {
      throw new DispatchError(
        "NetworkError",
        this.logger.redact(describeNetworkError(error, this.timeoutMs)),
        { cause: error },
      );
    }

    const payload = parseEnvelope(bodyText);
    if (!payload) {
      throw new DispatchError(
        "ApiError",
        `malformed response from ${method} (HTTP ${response.status})`,
        { api: { method, httpStatus: response.status } },
      );
    }

    if (!payload.ok || !response.ok) {
      const description =
        payload.description || `HTTP ${response.status} ${response.statusText}`.trim();
      throw new DispatchError("ApiError", description, {
        api: {
          method,
          httpStatus: response.status,
          errorCode: payload.error_code,
          description: payload.description,
        },
      });
    }

    const parsed = resultSchema.safeParse(payload.result);
    if (!parsed.success) {
      throw new DispatchError(
        "ApiError",
        `unexpected result shape from ${method}`,
        { cause: parsed.error, api: { method, httpStatus: response.status } },
      );
    }
    return parsed.data;
  }
}

function parseEnvelope(bodyText: string): TelegramApiResponse | null {
  let raw: unknown;
  try {
    raw = JSON.parse(bodyText);
  } catch {
    return null;
  }
  const parsed = telegramApiResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * 把 fetch 的异常整理成一句可读原因。
 *
 * 关键点（中文）
 * - undici 的错误通常是 `TypeError("fetch failed")`，真正原因在 `cause` 上（ENOTFOUND / ECONNREFUSED ...）
 * - 超时来自 AbortSignal.timeout，name 为 TimeoutError
 */
export function describeNetworkError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `request timed out after ${timeoutMs}ms`;
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return cause.message;
    }
    return error.message || error.name;
  }
  return String(error);
}
