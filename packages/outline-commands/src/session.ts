/**
 * One modal editing session over an outline. The session owns the tree, the grid of the last
 * render, the cursor, the clipboard, the undo log and the pending operator. Every handled key
 * re-renders the outline and replaces the grid; browsers never outlive the key they were made
 * for.
 *
 * Structural and grid errors raised by a command are reported through the returned status
 * message and leave the tree and cursor as they were. Anything else is a bug and is rethrown.
 */
import {
  createOutlineTree,
  isOutlineError,
  type OutlineTree,
  type SiblingPlacement
} from "@sprig/outline-core";
import { renderOutline, type OutlineWindow, type RenderResult } from "@sprig/outline-render";
import {
  EMPTY_CELL,
  describeCell,
  isBrowsable,
  isRasterError,
  PredicateUnsatisfiedError,
  type PlaceholderCell,
  type Raster,
  type TextCell
} from "@sprig/raster";

import {
  commandCursor,
  insertCursor,
  type CommandCursor,
  type EditorCursor,
  type InsertCursor
} from "./cursor";
import { Clipboard, restoreSubtree, UndoLog } from "./history";
import {
  matchEditorCommand,
  textInputFor,
  type EditorCommandId,
  type EditorCommandMatch,
  type EditorKeyStrokeInit,
  type EditorMode
} from "./keymap";
import { noopLogger, type Logger } from "./logger";
import { findLeftText, moveByWord, moveHorizontal, moveVertical, type WordMotion } from "./motions";

export interface EditorSessionOptions {
  readonly window: OutlineWindow;
  readonly tree?: OutlineTree;
  readonly logger?: Logger;
  readonly indentWidth?: number;
  readonly bulletGlyph?: string;
  /** Show the cell under the command cursor in the status line. */
  readonly debugCells?: boolean;
}

export interface EditorUpdate {
  readonly mode: EditorMode;
  readonly statusMessage: string;
  readonly quit: boolean;
}

const WORD_MOTION_BY_COMMAND: Partial<Record<EditorCommandId, WordMotion>> = {
  "cursor.wordBack": "back",
  "cursor.wordNext": "next",
  "cursor.wordEnd": "end"
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class EditorSession {
  private readonly tree: OutlineTree;
  private readonly window: OutlineWindow;
  private readonly logger: Logger;
  private readonly indentWidth: number | undefined;
  private readonly bulletGlyph: string | undefined;
  private readonly debugCells: boolean;
  private readonly clipboard = new Clipboard();
  private readonly history = new UndoLog();
  private raster: Raster;
  private cursorState: EditorCursor;
  private pendingOperator: EditorCommandId | null = null;

  constructor(options: EditorSessionOptions) {
    this.tree = options.tree ?? createOutlineTree();
    this.window = options.window;
    this.logger = options.logger ?? noopLogger;
    this.indentWidth = options.indentWidth;
    this.bulletGlyph = options.bulletGlyph;
    this.debugCells = options.debugCells ?? false;

    const { raster, activePosition } = this.render(0);
    this.raster = raster;
    this.cursorState = activePosition === null ? this.fallbackCursor() : insertCursor(activePosition, 0);
    this.window.placeCursor(this.cursorState.position);
    this.logger.info("Editor session started", { ...this.window.bounds, mode: this.cursorState.mode });
  }

  get cursor(): EditorCursor {
    return this.cursorState;
  }

  get mode(): EditorMode {
    return this.cursorState.mode;
  }

  get outline(): OutlineTree {
    return this.tree;
  }

  get pendingCommand(): EditorCommandId | null {
    return this.pendingOperator;
  }

  get clipboardContents(): Clipboard["contents"] {
    return this.clipboard.contents;
  }

  get undoDepth(): number {
    return this.history.size;
  }

  /** Puts the window cursor back on the editor cursor, e.g. after another window was drawn. */
  focus(): void {
    this.window.placeCursor(this.cursorState.position);
  }

  handleKey(stroke: EditorKeyStrokeInit): EditorUpdate {
    const cursor = this.cursorState;
    const match = matchEditorCommand(cursor.mode, stroke);
    const commandId = match?.descriptor.id ?? null;
    if (commandId === "editor.quit") {
      return { mode: cursor.mode, statusMessage: "", quit: true };
    }

    const pending = this.pendingOperator;
    this.pendingOperator = null;
    const activeBefore = this.tree.activeId;

    let message: string | null;
    try {
      message = cursor.mode === "command"
        ? this.handleCommandKey(cursor, match, pending)
        : this.handleInsertKey(cursor, match, stroke);
    } catch (error) {
      if (isOutlineError(error) || isRasterError(error)) {
        this.logger.warn("Command rejected", {
          key: stroke.key,
          command: commandId,
          kind: error.kind,
          message: error.message
        });
        if (this.tree.hasNode(activeBefore)) {
          this.tree.activate(activeBefore);
        }
        this.cursorState = cursor;
        message = error.message;
      } else {
        this.logger.error("Unexpected failure while handling a key", {
          key: stroke.key,
          command: commandId,
          error: describeError(error)
        });
        throw error;
      }
    }

    this.redraw();
    return {
      mode: this.cursorState.mode,
      statusMessage: message ?? this.idleStatus(),
      quit: false
    };
  }

  private handleCommandKey(
    cursor: CommandCursor,
    match: EditorCommandMatch | null,
    pending: EditorCommandId | null
  ): string | null {
    if (match === null) {
      return null;
    }
    const { id } = match.descriptor;
    if (match.descriptor.operator && pending !== id) {
      this.pendingOperator = id;
      return null;
    }

    const wordMotion = WORD_MOTION_BY_COMMAND[id];
    if (wordMotion !== undefined) {
      const position = moveByWord(this.raster, cursor.position, wordMotion, (nodeId) => this.tree.getContent(nodeId));
      this.cursorState = commandCursor(position);
      return null;
    }

    switch (id) {
      case "cursor.left":
      case "cursor.right": {
        const position = moveHorizontal(this.raster, cursor.position, id === "cursor.left" ? "left" : "right");
        this.cursorState = commandCursor(position);
        return null;
      }
      case "cursor.down":
      case "cursor.up": {
        const position = moveVertical(this.raster, cursor, id === "cursor.down" ? "down" : "up");
        this.cursorState = commandCursor(position, cursor.column);
        return null;
      }
      case "mode.insertBefore": {
        const cell = this.activateUnderCursor(cursor);
        const offset = cell.kind === "text" ? this.tree.getActiveContent().length - cell.offset : 0;
        this.cursorState = insertCursor(cursor.position, offset);
        return null;
      }
      case "mode.appendToEnd":
        this.activateUnderCursor(cursor);
        this.cursorState = insertCursor(cursor.position, 0);
        return null;
      case "bullet.openBelow":
      case "bullet.openAbove":
        this.activateUnderCursor(cursor);
        this.tree.createSibling(id === "bullet.openBelow" ? "below" : "above");
        this.cursorState = insertCursor(cursor.position, 0);
        return null;
      case "bullet.delete":
        return this.deleteUnderCursor(cursor);
      case "bullet.yank":
        this.activateUnderCursor(cursor);
        this.clipboard.set(this.tree.getSubtree());
        return null;
      case "bullet.pasteBelow":
      case "bullet.pasteAbove":
        return this.paste(cursor, id === "bullet.pasteBelow" ? "below" : "above");
      case "bullet.indent":
        this.activateUnderCursor(cursor);
        this.tree.indent("last");
        this.cursorState = this.commandCursorOnActive(cursor.column);
        return null;
      case "bullet.unindent":
        this.activateUnderCursor(cursor);
        this.tree.unindent();
        this.cursorState = this.commandCursorOnActive(cursor.column);
        return null;
      case "history.undo":
        return this.undo();
      default:
        return null;
    }
  }

  private handleInsertKey(
    cursor: InsertCursor,
    match: EditorCommandMatch | null,
    stroke: EditorKeyStrokeInit
  ): string | null {
    if (match === null) {
      const text = textInputFor(stroke);
      if (text !== null) {
        const content = this.tree.getActiveContent();
        const index = content.length - cursor.offset;
        this.tree.setActiveContent(content.slice(0, index) + text + content.slice(index));
      }
      return null;
    }

    switch (match.descriptor.id) {
      case "insert.indent":
        this.tree.indent("last");
        return null;
      case "insert.unindent":
        this.tree.unindent();
        return null;
      case "insert.newBullet":
        this.tree.createSibling("below");
        this.cursorState = insertCursor(cursor.position, 0);
        return null;
      case "insert.backspace":
        this.backspace(cursor);
        return null;
      case "insert.exit":
        this.cursorState = this.leaveInsertMode(cursor);
        return null;
      default:
        return null;
    }
  }

  private deleteUnderCursor(cursor: CommandCursor): string | null {
    this.activateUnderCursor(cursor);
    const subtree = this.tree.getSubtree();
    const removedId = this.tree.activeId;
    this.tree.delete();
    this.history.push({ subtree, cursor });
    this.clipboard.set(subtree);
    this.logger.info("Bullet deleted", { nodeId: removedId, nodes: subtree.size });
    this.cursorState = this.commandCursorOnActive(cursor.column);
    return null;
  }

  private paste(cursor: CommandCursor, placement: SiblingPlacement): string | null {
    const contents = this.clipboard.contents;
    if (contents === null) {
      return "nothing to paste";
    }
    this.activateUnderCursor(cursor);
    this.tree.insertSubtree(contents, placement);
    this.cursorState = this.commandCursorOnActive(cursor.column);
    return null;
  }

  private undo(): string | null {
    const entry = this.history.pop();
    if (entry === null) {
      return "nothing to undo";
    }
    const restoredId = restoreSubtree(this.tree, entry.subtree);
    this.logger.info("Bullet restored", { nodeId: restoredId, nodes: entry.subtree.size });
    this.cursorState = this.commandCursorOnActive(entry.cursor.column);
    return null;
  }

  /**
   * Deletes the character before the insertion point. At the start of an empty, childless
   * bullet the bullet itself goes and editing continues at the end of its successor.
   */
  private backspace(cursor: InsertCursor): void {
    const content = this.tree.getActiveContent();
    const removeIndex = content.length - cursor.offset - 1;
    if (removeIndex >= 0) {
      this.tree.setActiveContent(content.slice(0, removeIndex) + content.slice(removeIndex + 1));
      return;
    }
    if (content.length > 0 || this.tree.getChildIds(this.tree.activeId).length > 0) {
      return;
    }
    this.tree.delete();
    this.cursorState = insertCursor(cursor.position, 0);
  }

  /** Command mode resumes on the character the insertion point was in front of. */
  private leaveInsertMode(cursor: InsertCursor): CommandCursor {
    const content = this.tree.getActiveContent();
    const insertOffset = content.length === 0 ? 0 : Math.max(cursor.offset, 1);
    const { activePosition } = this.renderNow(insertOffset);
    return activePosition === null ? this.fallbackCursor() : commandCursor(activePosition);
  }

  private activateUnderCursor(cursor: EditorCursor): TextCell | PlaceholderCell {
    const cell = this.raster.get(cursor.position);
    if (cell === null || !isBrowsable(cell)) {
      throw new PredicateUnsatisfiedError("no bullet under the cursor");
    }
    this.tree.activate(cell.nodeId);
    return cell;
  }

  /**
   * Command cursor on the first row of the active bullet, as close to `column` as that row's
   * text allows.
   */
  private commandCursorOnActive(column: number): CommandCursor {
    const { activePosition } = this.renderNow(this.tree.getActiveContent().length);
    if (activePosition === null) {
      return this.fallbackCursor();
    }
    const col = Math.min(column, this.raster.bounds.cols - 1);
    try {
      return commandCursor(findLeftText(this.raster.browser({ row: activePosition.row, col })), column);
    } catch (error) {
      if (error instanceof PredicateUnsatisfiedError) {
        return commandCursor(activePosition, column);
      }
      throw error;
    }
  }

  private fallbackCursor(): CommandCursor {
    return commandCursor(this.raster.findFirst(isBrowsable) ?? { row: 0, col: 0 });
  }

  private redraw(): void {
    const cursor = this.cursorState;
    if (cursor.mode === "insert") {
      const { activePosition } = this.renderNow(cursor.offset);
      if (activePosition === null) {
        this.logger.info("Insertion point left the window; back to command mode");
        this.cursorState = this.fallbackCursor();
      } else {
        this.cursorState = insertCursor(activePosition, cursor.offset);
      }
    } else {
      this.renderNow(0);
      const cell = this.raster.get(cursor.position);
      if (cell === null || !isBrowsable(cell)) {
        this.cursorState = this.fallbackCursor();
      }
    }
    this.window.placeCursor(this.cursorState.position);
  }

  private idleStatus(): string {
    if (!this.debugCells || this.cursorState.mode !== "command") {
      return "";
    }
    return describeCell(this.raster.get(this.cursorState.position) ?? EMPTY_CELL);
  }

  private render(insertOffset: number): RenderResult {
    return renderOutline(this.tree, this.window, {
      activeId: this.tree.activeId,
      insertOffset,
      indentWidth: this.indentWidth,
      bulletGlyph: this.bulletGlyph
    });
  }

  private renderNow(insertOffset: number): RenderResult {
    const result = this.render(insertOffset);
    this.raster = result.raster;
    return result;
  }
}

export const createEditorSession = (options: EditorSessionOptions): EditorSession => new EditorSession(options);
