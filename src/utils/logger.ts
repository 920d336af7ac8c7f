/**
 * Structured logging via pino with automatic credential redaction.
 */

import pino from "pino";

// Redaction paths for credentials
const REDACT_PATHS = [
  "apiKey",
  "token",
  "password",
  "secret",
  "authorization",
  "headers.authorization",
  "headers[\"x-api-key\"]",
  "headers[\"x-goog-api-key\"]",
  "*.apiKey",
  "*.token",
  "*.password",
  "*.secret",
];

const logFile = process.env["SCRIPTLOOM_LOG_FILE"];

const logger = pino({
  name: "scriptloom",
  level: process.env["SCRIPTLOOM_LOG_LEVEL"] ?? "error",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  ...(logFile !== undefined && logFile.length > 0
    ? {
        transport: {
          target: "pino/file",
          options: { destination: logFile, mkdir: true },
        },
      }
    : {}),
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Raise the log level at run time (used by `--verbose`).
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}

export { logger };
