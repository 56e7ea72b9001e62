import { z } from "zod";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
} from "../../core/telegram/api-client.js";

export const TIMEOUT_ENV = "TG_NOTIFY_TIMEOUT_MS";
export const API_BASE_URL_ENV = "TELEGRAM_API_BASE_URL";
export const LOG_LEVEL_ENV = "TG_NOTIFY_LOG_LEVEL";
export const LOG_FILE_ENV = "TG_NOTIFY_LOG_FILE";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const runtimeSettingsSchema = z.object({
  timeoutMs: z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .positive("must be greater than 0")
    .max(MAX_TIMEOUT_MS, `must be at most ${MAX_TIMEOUT_MS}`),
  apiBaseUrl: z.string().url("must be an absolute URL"),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  logFile: z.string().optional(),
});

export type RuntimeSettings = z.infer<typeof runtimeSettingsSchema>;

export type RuntimeSettingsInput = {
  timeout?: number;
  verbose?: boolean;
};

function nonBlank(value: string | undefined): string | undefined {
  const s = typeof value === "string" ? value.trim() : "";
  return s || undefined;
}

/**
 * Runtime settings: CLI flag > environment > default.
 * Invalid values raise `ConfigError` naming where they came from.
 */
export function resolveRuntimeSettings(
  input: RuntimeSettingsInput,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeSettings {
  const envLevel = nonBlank(env[LOG_LEVEL_ENV])?.toLowerCase();
  const logLevel = input.verbose ? "debug" : envLevel ?? "warn";

  const raw = {
    timeoutMs: input.timeout ?? nonBlank(env[TIMEOUT_ENV]) ?? DEFAULT_TIMEOUT_MS,
    apiBaseUrl: nonBlank(env[API_BASE_URL_ENV]) ?? DEFAULT_API_BASE_URL,
    logLevel,
    logFile: nonBlank(env[LOG_FILE_ENV]),
  };

  const parsed = runtimeSettingsSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const field = String(issue?.path[0] ?? "");
  const origin =
    field === "timeoutMs"
      ? input.timeout !== undefined
        ? "--timeout"
        : TIMEOUT_ENV
      : field === "apiBaseUrl"
        ? API_BASE_URL_ENV
        : field === "logLevel"
          ? LOG_LEVEL_ENV
          : field;
  throw new ConfigError(`Invalid ${origin}: ${issue?.message ?? "invalid value"}`);
}
