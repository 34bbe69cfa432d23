import pino from "pino";

// stdout is reserved for answers and rendered history
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || "warn",
    base: null,
  },
  pino.destination({ dest: 2, sync: true }),
);

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
