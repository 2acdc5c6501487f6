/**
 * Classification of one screen cell produced by the render pass. Every non-empty cell names
 * the node it was drawn for.
 */
export interface EmptyCell {
  readonly kind: "empty";
}

export interface BulletCell {
  readonly kind: "bullet";
  readonly nodeId: number;
}

/** Indentation, the gap after a bullet and hanging indents of wrapped rows. */
export interface FillerCell {
  readonly kind: "filler";
  readonly nodeId: number;
}

export interface TextCell {
  readonly kind: "text";
  readonly nodeId: number;
  /** Character index into the node's content. */
  readonly offset: number;
}

/** Stands in for the content of a node whose text is empty. */
export interface PlaceholderCell {
  readonly kind: "placeholder";
  readonly nodeId: number;
}

export type RasterCell = EmptyCell | BulletCell | FillerCell | TextCell | PlaceholderCell;

export type RasterCellKind = RasterCell["kind"];

export type CellPredicate = (cell: RasterCell) => boolean;

export const EMPTY_CELL: EmptyCell = Object.freeze({ kind: "empty" });

export const bulletCell = (nodeId: number): BulletCell => ({ kind: "bullet", nodeId });

export const fillerCell = (nodeId: number): FillerCell => ({ kind: "filler", nodeId });

export const textCell = (nodeId: number, offset: number): TextCell => ({ kind: "text", nodeId, offset });

export const placeholderCell = (nodeId: number): PlaceholderCell => ({ kind: "placeholder", nodeId });

export const isText = (cell: RasterCell): cell is TextCell => cell.kind === "text";

/** Cells the cursor may rest on in command mode. */
export const isBrowsable = (cell: RasterCell): cell is TextCell | PlaceholderCell =>
  cell.kind === "text" || cell.kind === "placeholder";

export const describeCell = (cell: RasterCell): string => {
  switch (cell.kind) {
    case "empty":
      return "Empty";
    case "bullet":
      return `Bullet(${cell.nodeId})`;
    case "filler":
      return `Filler(${cell.nodeId})`;
    case "text":
      return `Text(${cell.nodeId}, ${cell.offset})`;
    case "placeholder":
      return `Placeholder(${cell.nodeId})`;
  }
};
