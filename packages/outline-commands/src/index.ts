/**
 * Sprig outline-commands turns keystrokes into outline edits and cursor motions over the
 * rendered grid. Shells feed it normalised keystrokes and paint the status it reports.
 */
export {
  editorCommandDescriptors,
  matchEditorCommand,
  normaliseStroke,
  textInputFor,
  type EditorCommandBinding,
  type EditorCommandCategory,
  type EditorCommandDescriptor,
  type EditorCommandId,
  type EditorCommandMatch,
  type EditorKeyStroke,
  type EditorKeyStrokeInit,
  type EditorMode
} from "./keymap";

export {
  commandCursor,
  insertCursor,
  modeLabel,
  type CommandCursor,
  type EditorCursor,
  type InsertCursor
} from "./cursor";

export {
  WORD_SEPARATORS,
  findLeftText,
  findSeparator,
  moveByWord,
  moveHorizontal,
  moveVertical,
  notBrowsable,
  type VerticalDirection,
  type WordMotion
} from "./motions";

export { Clipboard, UndoLog, restoreSubtree, type HistoryEntry } from "./history";
export { noopLogger, type LogContext, type Logger } from "./logger";
export {
  EditorSession,
  createEditorSession,
  type EditorSessionOptions,
  type EditorUpdate
} from "./session";
