/**
 * Grid coordinates. Rows grow downwards, columns to the right; both are zero based.
 */
export interface GridPoint {
  readonly row: number;
  readonly col: number;
}

export interface GridBounds {
  readonly rows: number;
  readonly cols: number;
}

export type HorizontalDirection = "left" | "right";

export type GridDirection = HorizontalDirection | "up" | "down";

export const isWithinBounds = (point: GridPoint, bounds: GridBounds): boolean =>
  Number.isInteger(point.row)
  && Number.isInteger(point.col)
  && point.row >= 0
  && point.row < bounds.rows
  && point.col >= 0
  && point.col < bounds.cols;

/**
 * Moves `offset` cells along the grid read as one line, wrapping between rows. Returns `null`
 * when the target falls outside the grid, which is always the case for a grid without
 * columns or an offset that is not a whole number of cells.
 */
export const linearMove = (point: GridPoint, bounds: GridBounds, offset: number): GridPoint | null => {
  if (!Number.isInteger(offset) || bounds.cols <= 0 || !isWithinBounds(point, bounds)) {
    return null;
  }
  const linear = point.row * bounds.cols + point.col + offset;
  const row = Math.floor(linear / bounds.cols);
  if (row < 0 || row >= bounds.rows) {
    return null;
  }
  return { row, col: linear - row * bounds.cols };
};

export const formatPoint = (point: GridPoint): string => `(${point.row}, ${point.col})`;
