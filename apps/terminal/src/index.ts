import terminalKit from "terminal-kit";

import { noopLogger } from "@sprig/outline-commands";

import { loadConfig } from "./config";
import { createConsoleLogger, createFileLogger } from "./logger";
import { LatencyStats } from "./latency";
import { createEditorShell, type EditorShell } from "./shell";
import { surfaceFromTerminal, TerminalWindow } from "./terminalWindow";

export { loadConfig, type TerminalConfig } from "./config";
export { createConsoleLogger, createFileLogger } from "./logger";
export { toEditorKeyStroke } from "./keys";
export { LatencyStats };
export { createEditorShell, type EditorShell, type EditorShellOptions } from "./shell";
export { surfaceFromTerminal, TerminalWindow, type TerminalRegion, type TerminalSurface } from "./terminalWindow";

const runEditor = async (): Promise<void> => {
  const config = loadConfig();
  const logger = config.logFile ? createFileLogger(config.logFile) : noopLogger;
  const term = terminalKit.terminal;
  const surface = surfaceFromTerminal(term);
  const rows = term.height;
  const cols = term.width;

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });
  let failure: unknown = null;
  let shellLatency: Pick<EditorShell, "editorLatency" | "loopLatency"> | null = null;

  term.fullscreen(true);
  term.grabInput(true);

  try {
    const shell = createEditorShell({
      editorWindow: new TerminalWindow(surface, { top: 0, rows: rows - 1, cols }),
      statusWindow: new TerminalWindow(surface, { top: rows - 1, rows: 1, cols }),
      config,
      logger
    });
    shellLatency = shell;

    const onKey = (name: string): void => {
      try {
        if (shell.handleTerminalKey(name)) {
          resolveExit?.();
        }
      } catch (error) {
        failure = error;
        resolveExit?.();
      }
    };

    term.on("key", onKey);
    await exitPromise;
  } finally {
    term.grabInput(false);
    term.fullscreen(false);
  }

  if (shellLatency !== null) {
    const consoleLogger = createConsoleLogger();
    const report = (message: string, stats: LatencyStats): void => {
      const average = stats.average();
      consoleLogger.info(message, {
        milliseconds: average === null ? null : Number(average.toFixed(2)),
        keys: stats.count
      });
    };
    report("average editor latency", shellLatency.editorLatency);
    report("average loop latency", shellLatency.loopLatency);
  }

  if (failure !== null) {
    throw failure;
  }
};

if (process.env.NODE_ENV !== "test") {
  runEditor().then(
    () => {
      terminalKit.terminal.processExit(0);
    },
    (error: unknown) => {
      console.error("Editor stopped unexpectedly", error);
      terminalKit.terminal.processExit(1);
    }
  );
}
