import {
  EditorSession,
  modeLabel,
  noopLogger,
  type EditorUpdate,
  type Logger
} from "@sprig/outline-commands";
import { renderStatusLine, type OutlineWindow } from "@sprig/outline-render";

import type { TerminalConfig } from "./config";
import { toEditorKeyStroke } from "./keys";
import { LatencyStats } from "./latency";

export interface EditorShellOptions {
  readonly editorWindow: OutlineWindow;
  readonly statusWindow: OutlineWindow;
  readonly config: Omit<TerminalConfig, "logFile">;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export interface EditorShell {
  readonly session: EditorSession;
  /** Time spent inside the session for each handled key. */
  readonly editorLatency: LatencyStats;
  /** Time from a handled key to the repainted status line. */
  readonly loopLatency: LatencyStats;
  /** Handles one terminal-kit key name. Returns `true` once the editor asks to quit. */
  handleTerminalKey(name: string): boolean;
}

/**
 * Connects an editor session to its two windows: the outline above and the status line on
 * the last row.
 */
export const createEditorShell = (options: EditorShellOptions): EditorShell => {
  const { editorWindow, statusWindow, config } = options;
  const now = options.now ?? (() => performance.now());
  const editorLatency = new LatencyStats();
  const loopLatency = new LatencyStats();
  const session = new EditorSession({
    window: editorWindow,
    logger: options.logger ?? noopLogger,
    indentWidth: config.indentWidth,
    bulletGlyph: config.bulletGlyph,
    debugCells: config.debugCells
  });

  const paintStatus = (update: Pick<EditorUpdate, "mode" | "statusMessage">): void => {
    renderStatusLine(statusWindow, modeLabel(update.mode), update.statusMessage);
    session.focus();
  };

  paintStatus({ mode: session.mode, statusMessage: "" });

  return {
    session,
    editorLatency,
    loopLatency,
    handleTerminalKey(name) {
      const stroke = toEditorKeyStroke(name);
      if (stroke === null) {
        return false;
      }
      const started = now();
      const update = editorLatency.measure(() => session.handleKey(stroke), now);
      if (update.quit) {
        return true;
      }
      paintStatus(update);
      loopLatency.record(now() - started);
      return false;
    }
  };
};
