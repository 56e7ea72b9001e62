/**
 * 配置读取工具模块。
 *
 * 职责说明：
 * 1. 从当前目录加载 `.env`，仅加载当前目录，不向上级目录递归查找。
 * 2. 已存在的环境变量优先，`.env` 只做补充。
 */
import dotenv from "dotenv";
import path from "path";

export function loadProjectDotenv(projectRoot: string): void {
  dotenv.config({ path: path.join(projectRoot, ".env") });
}
