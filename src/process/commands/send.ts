/**
 * Delivery commands: `send` / `send-file-cmd` / `send-photo-cmd`.
 *
 * 关键点（中文）
 * - 三个命令只负责把参数组装成一个 OutboundPayload，校验与请求都交给 Dispatcher
 * - credentials 解析优先级：`--token/--chat-id` > `TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID`
 * - DispatchResult → 一行输出 + 退出码
 */

import { InvalidArgumentError, type Command } from "commander";
import { Dispatcher } from "../../core/dispatcher/dispatcher.js";
import { EXIT_CODES } from "../../core/dispatcher/errors.js";
import { MAX_TIMEOUT_MS } from "../../core/telegram/api-client.js";
import { logger } from "../../telemetry/index.js";
import type { DispatchFailure, OutboundPayload } from "../../types/dispatch.js";
import { resolveCredentials, CHAT_ID_ENV, TOKEN_ENV } from "../config/credentials.js";
import { ConfigError, resolveRuntimeSettings } from "../config/settings.js";
import { printResult } from "../utils/cli-output.js";
import type {
  CliContext,
  DeliveryCliOptions,
  SendAttachmentCliOptions,
  SendCliOptions,
} from "./types/send.js";

function parseTimeoutOption(value: string): number {
  const ms = Number.parseInt(value, 10);
  if (!Number.isFinite(ms) || !Number.isInteger(ms) || ms <= 0 || String(ms) !== value.trim()) {
    throw new InvalidArgumentError(`Invalid timeout: ${value}`);
  }
  if (ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Invalid timeout: ${value} (at most ${MAX_TIMEOUT_MS})`);
  }
  return ms;
}

function withDeliveryOptions(command: Command): Command {
  return command
    .option("--token <token>", `Telegram bot token (or set ${TOKEN_ENV})`)
    .option("--chat-id <chatId>", `Target chat ID (or set ${CHAT_ID_ENV})`)
    .option("--timeout <ms>", "Request timeout in milliseconds (default 30000)", parseTimeoutOption)
    .option("--json", "Print the result as JSON", false)
    .option("--verbose", "Print debug logs to stderr", false);
}

function successTitle(payload: OutboundPayload): string {
  switch (payload.kind) {
    case "text":
      return "Message sent successfully!";
    case "document":
      return `File '${payload.path}' sent successfully!`;
    case "photo":
      return `Photo '${payload.path}' sent successfully!`;
  }
}

function failureTitle(result: DispatchFailure): string {
  const { error } = result;
  switch (error.kind) {
    case "NetworkError":
      return `Network error: ${error.message}`;
    case "ApiError":
      return `Telegram API error: ${error.message}`;
    default:
      return error.message;
  }
}

/**
 * Runs one delivery: settings → credentials → Dispatcher → output.
 */
export async function runDelivery(
  options: DeliveryCliOptions,
  payload: OutboundPayload,
  ctx: CliContext,
): Promise<void> {
  try {
    const settings = resolveRuntimeSettings(options, ctx.env);
    logger.setLevel(settings.logLevel);
    logger.bindLogFile(settings.logFile);

    const credentials = resolveCredentials(options, ctx.env);
    logger.debug("credentials resolved", {
      tokenSource: credentials.sources.botToken,
      chatIdSource: credentials.sources.chatId,
    });

    const dispatcher = new Dispatcher({
      apiBaseUrl: settings.apiBaseUrl,
      timeoutMs: settings.timeoutMs,
      fetch: ctx.fetch,
      logger,
    });
    const result = await dispatcher.dispatch(credentials, payload);

    if (result.success) {
      printResult({
        asJson: options.json,
        success: true,
        title: successTitle(payload),
        payload: {
          kind: result.kind,
          chatId: result.chatId,
          messageId: result.messageId,
          durationMs: result.durationMs,
        },
      });
      ctx.setExitCode(EXIT_CODES.success);
      return;
    }

    const { error } = result;
    printResult({
      asJson: options.json,
      success: false,
      title: failureTitle(result),
      payload: {
        kind: error.kind,
        error: error.message,
        ...(error.api?.errorCode !== undefined ? { errorCode: error.api.errorCode } : {}),
        ...(error.api?.httpStatus !== undefined ? { httpStatus: error.api.httpStatus } : {}),
      },
    });
    ctx.setExitCode(error.exitCode);
  } catch (error) {
    if (error instanceof ConfigError) {
      printResult({
        asJson: options.json,
        success: false,
        title: error.message,
        payload: { kind: "ConfigError", error: error.message },
      });
      ctx.setExitCode(EXIT_CODES.usage);
      return;
    }
    const message = logger.redact(error instanceof Error ? error.message : String(error));
    printResult({
      asJson: options.json,
      success: false,
      title: `Unexpected error: ${message}`,
      payload: { kind: "Unexpected", error: message },
    });
    ctx.setExitCode(EXIT_CODES.unexpected);
  }
}

export function registerSendCommands(program: Command, ctx: CliContext): void {
  withDeliveryOptions(
    program
      .command("send")
      .description("Send a text message to a Telegram chat")
      .requiredOption("--message <text>", "Message text to send"),
  ).action(async (opts: SendCliOptions) => {
    await runDelivery(opts, { kind: "text", text: opts.message }, ctx);
  });

  withDeliveryOptions(
    program
      .command("send-file-cmd")
      .description("Send a file (document, up to 50 MB) to a Telegram chat")
      .requiredOption("--file <path>", "Path to the file to send")
      .option("--caption <text>", "Optional caption for the file"),
  ).action(async (opts: SendAttachmentCliOptions) => {
    await runDelivery(
      opts,
      { kind: "document", path: opts.file, caption: opts.caption },
      ctx,
    );
  });

  withDeliveryOptions(
    program
      .command("send-photo-cmd")
      .description("Send a photo (up to 10 MB) to a Telegram chat")
      .requiredOption("--file <path>", "Path to the image to send")
      .option("--caption <text>", "Optional caption for the photo"),
  ).action(async (opts: SendAttachmentCliOptions) => {
    await runDelivery(
      opts,
      { kind: "photo", path: opts.file, caption: opts.caption },
      ctx,
    );
  });
}
