/**
 * CLI 输出工具。
 *
 * 关键点（中文）
 * - 成功 → stdout，失败 → stderr；脚本可以只看退出码，也可以解析输出
 * - 默认输出一行可读文本；`--json` 时输出单个 JSON 对象
 */

/**
 * 标准化输出结果。
 *
 * 输出策略（中文）
 * - 文本模式：成功打印 `title`，失败打印 `Error: <title>`。
 * - JSON 模式：`{ success, ...payload }`，格式化缩进 2。
 */
export function printResult(params: {
  asJson?: boolean;
  success: boolean;
  title: string;
  payload: Record<string, unknown>;
}): void {
  const write = params.success ? console.log : console.error;

  if (params.asJson) {
    write(JSON.stringify({ success: params.success, ...params.payload }, null, 2));
    return;
  }

  write(params.success ? params.title : `Error: ${params.title}`);
}
