export { Dispatcher, type DispatcherOptions } from "./core/dispatcher/dispatcher.js";
export {
  DispatchError,
  EXIT_CODES,
  isDispatchError,
  type DispatchErrorKind,
} from "./core/dispatcher/errors.js";
export { ATTACHMENT_SPECS } from "./core/dispatcher/payload.js";
export { TelegramApiClient } from "./core/telegram/api-client.js";
export { resolveCredentials } from "./process/config/credentials.js";
export { runCli } from "./process/commands/index.js";
export type {
  Credentials,
  DispatchResult,
  OutboundPayload,
} from "./types/dispatch.js";
