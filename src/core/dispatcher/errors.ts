/**
 * Dispatch error taxonomy.
 *
 * 关键点（中文）
 * - 每种失败对应唯一 kind 与退出码，脚本可按退出码分支
 * - 所有失败对本次调用都是终态：不重试、不部分成功
 */

export type DispatchErrorKind =
  | "MissingCredentials"
  | "EmptyMessage"
  | "FileNotFound"
  | "FileTooLarge"
  | "NetworkError"
  | "ApiError";

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  MissingCredentials: 2,
  EmptyMessage: 3,
  FileNotFound: 4,
  FileTooLarge: 5,
  NetworkError: 6,
  ApiError: 7,
  usage: 64,
} as const;

export interface ApiErrorDetails {
  method: string;
  httpStatus?: number;
  errorCode?: number;
  description?: string;
}

export class DispatchError extends Error {
  readonly kind: DispatchErrorKind;
  readonly exitCode: number;
  readonly api?: ApiErrorDetails;

  constructor(
    kind: DispatchErrorKind,
    message: string,
    opts?: { cause?: unknown; api?: ApiErrorDetails },
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "DispatchError";
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
    this.api = opts?.api;
  }
}

export function isDispatchError(
  error: unknown,
  kind?: DispatchErrorKind,
): error is DispatchError {
  if (!(error instanceof DispatchError)) return false;
  return kind === undefined || error.kind === kind;
}
