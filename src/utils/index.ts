/**
 * Utilities barrel export
 */

export { logger, setLogLevel } from "./logger.js";
export {
  sanitizeShellArg,
  validatePath,
  isCommandBlocked,
  redactSecrets,
  redactToolArgs,
  sanitizePromptInput,
  truncateText,
} from "./sanitizer.js";
export {
  getScriptloomHome,
  getUserConfigPath,
  getUserToolsDir,
  getProjectConfigDir,
  getProjectConfigPath,
  getProjectToolsDir,
  findProjectRoot,
} from "./pathResolver.js";
export {
  withRetry,
  sleep,
  RetryExhaustedError,
} from "./retry.js";
export type { IRetryOptions } from "./retry.js";
