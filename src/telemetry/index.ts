/**
 * Telemetry (cross-cutting observability).
 *
 * Stable entrypoint for the process-level logger used by the dispatcher,
 * the Telegram client and the CLI commands.
 */

export type { LogEntry, LogLevel } from "./logging/logger.js";
export { Logger, logger } from "./logging/logger.js";
