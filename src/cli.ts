#!/usr/bin/env node

import { loadProjectDotenv } from "./process/config/env.js";
import { runCli } from "./process/commands/index.js";

// `.env` 只补充未设置的变量，命令行参数仍然优先
loadProjectDotenv(process.cwd());

process.exitCode = await runCli(process.argv);
