export * from "./types.js";
export { loadConfig, ensureDirs } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { HistoryBuffer, HISTORY_CAPACITY } from "./history.js";
export type { HistorySlice } from "./history.js";
export {
  formatLog,
  formatState,
  formatDone,
  formatError,
  parseMessage,
} from "./protocol.js";
export type { ChannelMessage } from "./protocol.js";
export {
  NotFoundError,
  InvalidInputError,
  LaunchResolutionError,
  errorMessage,
} from "./errors.js";
