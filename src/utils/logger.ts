/**
 * Structured logging with pino. Logs go to stderr so command output on stdout stays clean.
 */

import pino from "pino";

function resolveLevel(): string {
  const fromEnv = process.env.LOG_LEVEL?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger: pino.Logger = pino(
  {
    name: "specloop",
    level: resolveLevel(),
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({ dest: 2, sync: true })
);

export function createModuleLogger(module: string): pino.Logger {
  return logger.child({ module });
}
