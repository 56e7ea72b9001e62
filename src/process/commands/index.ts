/**
 * CLI 程序组装模块。
 *
 * 职责说明：
 * 1. 组装所有一级命令（send / send-file-cmd / send-photo-cmd）。
 * 2. 统一处理 commander 的退出：帮助与版本号退出码 0，用法错误退出码 64。
 * 3. 不直接调用 process.exit，退出码由调用方（bin 或测试）决定。
 */
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { Command, CommanderError } from "commander";
import { EXIT_CODES } from "../../core/dispatcher/errors.js";
import { logger } from "../../telemetry/index.js";
import { registerSendCommands } from "./send.js";

// 在 ES 模块中获取 __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// 读取 package.json 版本号（src 与 dist 下相对路径一致）
const packageJson = JSON.parse(
  readFileSync(join(__dirname, "../../../package.json"), "utf-8"),
) as { version: string };

export const VERSION = packageJson.version;

export type RunCliOptions = {
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
};

export function createProgram(
  opts: RunCliOptions,
  setExitCode: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name("tg-notify")
    .description(
      "Telegram Notifier - send messages, documents and photos to a Telegram chat from the command line",
    )
    .version(VERSION, "-v, --version")
    .helpOption("--help", "display help for command")
    .exitOverride()
    .configureOutput({
      writeOut: opts.writeOut ?? ((text: string) => process.stdout.write(text)),
      writeErr: opts.writeErr ?? ((text: string) => process.stderr.write(text)),
    });

  registerSendCommands(program, {
    env: opts.env ?? process.env,
    fetch: opts.fetch,
    setExitCode,
  });

  return program;
}

/**
 * Parses `argv` (node-style: `[node, script, ...args]`), runs at most one
 * command and resolves to the process exit code.
 */
export async function runCli(argv: string[], opts: RunCliOptions = {}): Promise<number> {
  let exitCode: number = EXIT_CODES.success;
  const program = createProgram(opts, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    exitCode = error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage;
  } finally {
    await logger.flush();
  }
  return exitCode;
}
