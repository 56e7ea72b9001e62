import fs from "fs-extra";
import path from "path";

/**
 * Unified process logger for tg-notify.
 *
 * Design goals:
 * - Keep stdout reserved for the single result line scripts parse; every
 *   console entry goes to stderr.
 * - Optionally persist entries as JSONL (one line per entry) when a log file
 *   is bound, e.g. via `TG_NOTIFY_LOG_FILE`.
 * - Never leak registered secrets (the bot token) into console or disk logs.
 *
 * Notes:
 * - `info/warn/error/debug` are sync and fire-and-forget; file writes are
 *   chained, so call `flush()` before the process exits.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  message: string;
  details?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACTED = "***";

export class Logger {
  private logLevel: LogLevel;
  private writeChain: Promise<void> = Promise.resolve();
  private logFile: string | null = null;
  private writeFailureReported = false;
  private readonly secrets = new Set<string>();

  constructor(logLevel: LogLevel = "warn") {
    this.logLevel = logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * 绑定 JSONL 落盘文件。
   *
   * 关键点（中文）
   * - 未绑定时只输出到 stderr
   * - 传入空值即解绑
   */
  bindLogFile(filePath: string | undefined): void {
    const file = String(filePath || "").trim();
    this.logFile = file ? path.resolve(file) : null;
    this.writeFailureReported = false;
  }

  /**
   * Registers a value that must never appear in log output.
   * Empty values are ignored.
   */
  registerSecret(secret: string): void {
    const value = secret.trim();
    if (value) this.secrets.add(value);
  }

  redact(text: string): string {
    let out = text;
    for (const secret of this.secrets) {
      out = out.split(secret).join(REDACTED);
    }
    return out;
  }

  info(message: string, details?: Record<string, unknown>): void {
    void this.emit("info", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    void this.emit("warn", message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    void this.emit("error", message, details);
  }

  debug(message: string, details?: Record<string, unknown>): void {
    void this.emit("debug", message, details);
  }

  private redactDetails(
    details: Record<string, unknown> | undefined,
  ): Record<string, unknown> | undefined {
    if (!details) return undefined;
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(details)) {
      out[key] = typeof value === "string" ? this.redact(value) : value;
    }
    return out;
  }

  private async emit(
    level: LogLevel,
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: new Date().toISOString(),
      level,
      message: this.redact(message),
      details: this.redactDetails(details),
    };

    this.printLog(entry);

    const logFile = this.logFile;
    if (!logFile) return;
    this.writeChain = this.writeChain.then(() =>
      this.saveToFile(logFile, entry).catch((error: unknown) =>
        this.reportWriteFailure(logFile, error),
      ),
    );
    await this.writeChain;
  }

  private printLog(entry: LogEntry): void {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.logLevel]) return;
    const time = new Date(entry.timestamp).toLocaleTimeString("en-GB");
    const level = entry.level.toUpperCase().padEnd(5);
    const suffix =
      entry.details && Object.keys(entry.details).length > 0
        ? ` ${JSON.stringify(entry.details)}`
        : "";
    const line = `[${time}] [${level}] ${entry.message}${suffix}`;
    if (!process.stderr.isTTY) {
      console.error(line);
      return;
    }

    switch (entry.level) {
      case "error":
        console.error(`\x1b[31m${line}\x1b[0m`);
        break;
      case "warn":
        console.error(`\x1b[33m${line}\x1b[0m`);
        break;
      case "debug":
        console.error(`\x1b[90m${line}\x1b[0m`);
        break;
      default:
        console.error(line);
    }
  }

  private async saveToFile(logFile: string, entry: LogEntry): Promise<void> {
    await fs.ensureDir(path.dirname(logFile));
    await fs.appendFile(logFile, JSON.stringify(entry) + "\n");
  }

  private reportWriteFailure(logFile: string, error: unknown): void {
    // 只提示一次，避免每条日志都刷屏
    if (this.writeFailureReported) return;
    this.writeFailureReported = true;
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[logger] cannot write ${logFile}: ${reason}`);
  }

  private generateId(): string {
    return Date.now().toString(36) + Math.random().toString(36).slice(2, 8);
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }
}

export const logger = new Logger();
