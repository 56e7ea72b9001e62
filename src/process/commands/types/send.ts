/**
 * Options shared by every delivery command.
 */
export interface DeliveryCliOptions {
  token?: string;
  chatId?: string;
  timeout?: number;
  json?: boolean;
  verbose?: boolean;
}

export interface SendCliOptions extends DeliveryCliOptions {
  message: string;
}

export interface SendAttachmentCliOptions extends DeliveryCliOptions {
  file: string;
  caption?: string;
}

/**
 * Collaborators injected into the command layer.
 * `bin` passes the real process env; tests pass their own env and a stubbed fetch.
 */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  setExitCode(code: number): void;
}
