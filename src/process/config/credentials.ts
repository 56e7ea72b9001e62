/**
 * Credential resolution.
 *
 * 关键点（中文）
 * - 解析优先级：CLI 参数 > 环境变量 > 失败
 * - 空白参数视为未提供，继续向下回退
 * - 这里只负责“取值”，缺失与否由 Dispatcher 统一判定（MissingCredentials）
 */

import type { Credentials } from "../../types/dispatch.js";

export const TOKEN_ENV = "TELEGRAM_BOT_TOKEN";
export const CHAT_ID_ENV = "TELEGRAM_CHAT_ID";

export type CredentialSource = "flag" | "env" | "missing";

export type CredentialInput = {
  token?: string;
  chatId?: string;
};

export type ResolvedCredentials = Credentials & {
  sources: { botToken: CredentialSource; chatId: CredentialSource };
};

function pickFirst(
  explicit: string | undefined,
  envValue: string | undefined,
): { value: string; source: CredentialSource } {
  const flag = typeof explicit === "string" ? explicit.trim() : "";
  if (flag) return { value: flag, source: "flag" };
  const fromEnv = typeof envValue === "string" ? envValue.trim() : "";
  if (fromEnv) return { value: fromEnv, source: "env" };
  return { value: "", source: "missing" };
}

export function resolveCredentials(
  input: CredentialInput,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedCredentials {
  const token = pickFirst(input.token, env[TOKEN_ENV]);
  const chatId = pickFirst(input.chatId, env[CHAT_ID_ENV]);
  return {
    botToken: token.value,
    chatId: chatId.value,
    sources: { botToken: token.source, chatId: chatId.source },
  };
}
