import type { GridPoint } from "@sprig/raster";

import type { EditorMode } from "./keymap";

export interface CommandCursor {
  readonly mode: "command";
  readonly position: GridPoint;
  /** Column of the last horizontal move, kept across vertical moves. */
  readonly column: number;
}

export interface InsertCursor {
  readonly mode: "insert";
  readonly position: GridPoint;
  /** Characters between the insertion point and the end of the active content. */
  readonly offset: number;
}

export type EditorCursor = CommandCursor | InsertCursor;

export const commandCursor = (position: GridPoint, column: number = position.col): CommandCursor => ({
  mode: "command",
  position,
  column
});

export const insertCursor = (position: GridPoint, offset: number): InsertCursor => ({
  mode: "insert",
  position,
  offset
});

const MODE_LABELS: Record<EditorMode, string> = {
  command: "COMMAND",
  insert: "INSERT"
};

export const modeLabel = (mode: EditorMode): string => MODE_LABELS[mode];
