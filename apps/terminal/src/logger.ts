import { appendFileSync } from "node:fs";

import type { LogContext, Logger } from "@sprig/outline-commands";

type LogLevel = "info" | "warn" | "error";

const toStructuredLogArgs = (message: string, context?: LogContext): [string, LogContext] => {
  if (context && Object.keys(context).length > 0) {
    return [message, context];
  }
  return [message, {}];
};

export const createConsoleLogger = (): Logger => {
  return {
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(msg, ctx);
    }
  };
};

/**
 * Appends one JSON line per entry to `path`. Nothing goes to stdout, which belongs to the
 * full-screen editor.
 */
export const createFileLogger = (path: string, now: () => Date = () => new Date()): Logger => {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    const [msg, ctx] = toStructuredLogArgs(message, context);
    const entry = { time: now().toISOString(), level, message: msg, context: ctx };
    appendFileSync(path, `${JSON.stringify(entry)}\n`, "utf8");
  };

  return {
    info(message, context) {
      write("info", message, context);
    },
    warn(message, context) {
      write("warn", message, context);
    },
    error(message, context) {
      write("error", message, context);
    }
  };
};
