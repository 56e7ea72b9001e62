import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { Logger } from "../logger.js";

describe("Logger", () => {
  let errorSpy: MockInstance<typeof console.error>;
  let tmpDir: string;

  beforeEach(async () => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "tg-notify-log-"));
  });

  afterEach(async () => {
    errorSpy.mockRestore();
    await fs.remove(tmpDir);
  });

  function stderrLines(): string[] {
    return errorSpy.mock.calls.map((call) => String(call[0]));
  }

  it("prints entries at or above the level to stderr only", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.info("quiet");
    logger.warn("loud");
    await logger.flush();

    expect(stderrLines()).toHaveLength(1);
    expect(stderrLines()[0]).toContain("[WARN ] loud");
    expect(logSpy).not.toHaveBeenCalled();
    logSpy.mockRestore();
  });

  it("follows setLevel for later entries", async () => {
    const logger = new Logger("warn");

    logger.debug("hidden");
    logger.setLevel("debug");
    logger.debug("trace me", { attempt: 1 });
    await logger.flush();

    expect(stderrLines()).toHaveLength(1);
    expect(stderrLines()[0]).toContain('[DEBUG] trace me {"attempt":1}');
  });

  it("redacts registered secrets in messages and string details", async () => {
    const logger = new Logger("debug");
    logger.registerSecret("test-secret");

    logger.info("POST https://api.telegram.org/bottest-secret/sendMessage", {
      url: "/bottest-secret/x",
      attempt: 1,
    });
    await logger.flush();

    expect(stderrLines()).toHaveLength(1);
    expect(stderrLines()[0]).toContain(
      'POST https://api.telegram.org/bot***/sendMessage {"url":"/bot***/x","attempt":1}',
    );
    expect(stderrLines()[0]).not.toContain("test-secret");
  });

  it("ignores blank secrets", () => {
    const logger = new Logger("error");
    logger.registerSecret("   ");

    expect(logger.redact("a   b")).toBe("a   b");
  });

  it("appends JSON lines to the bound log file", async () => {
    const logFile = path.join(tmpDir, "nested", "run.jsonl");
    const logger = new Logger("error");
    logger.bindLogFile(logFile);
    logger.registerSecret("test-secret");

    logger.info("first", { chatId: "1" });
    logger.debug("second test-secret");
    await logger.flush();

    const lines = (await fs.readFile(logFile, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    const entries = lines.map((line) => JSON.parse(line));
    expect(entries[0]).toMatchObject({ level: "info", message: "first", details: { chatId: "1" } });
    expect(entries[1]).toMatchObject({ level: "debug", message: "second ***" });
  });

  it("stops writing once unbound", async () => {
    const logFile = path.join(tmpDir, "run.jsonl");
    const logger = new Logger("error");
    logger.bindLogFile(logFile);
    logger.info("kept");
    await logger.flush();
    logger.bindLogFile(undefined);
    logger.info("dropped");
    await logger.flush();

    const content = await fs.readFile(logFile, "utf-8");
    expect(content.trim().split("\n")).toHaveLength(1);
  });

  it("reports a failing log file once and keeps going", async () => {
    const blocker = path.join(tmpDir, "file");
    await fs.writeFile(blocker, "");
    const logger = new Logger("error");
    logger.bindLogFile(path.join(blocker, "sub", "run.jsonl"));

    logger.info("one");
    logger.info("two");
    await logger.flush();

    expect(stderrLines()).toEqual([
      expect.stringMatching(/^\[logger\] cannot write .*run\.jsonl: /),
    ]);
  });
});
