import type { EditorKeyStrokeInit } from "@sprig/outline-commands";

const NAMED_KEYS: Readonly<Record<string, EditorKeyStrokeInit>> = {
  ENTER: { key: "Enter" },
  KP_ENTER: { key: "Enter" },
  TAB: { key: "Tab" },
  SHIFT_TAB: { key: "Tab", shiftKey: true },
  BACKSPACE: { key: "Backspace" },
  ESCAPE: { key: "Escape" },
  CTRL_C: { key: "c", ctrlKey: true },
  CTRL_Q: { key: "q", ctrlKey: true },
  SPACE: { key: " " }
};

/**
 * Maps a terminal-kit key name to an editor keystroke. Printable characters arrive as their
 * own name; other named keys the editor has no use for map to `null`.
 */
export const toEditorKeyStroke = (name: string): EditorKeyStrokeInit | null => {
  const named = NAMED_KEYS[name];
  if (named !== undefined) {
    return named;
  }
  return Array.from(name).length === 1 ? { key: name } : null;
};
