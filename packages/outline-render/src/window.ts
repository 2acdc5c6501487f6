import type { GridBounds, GridPoint } from "@sprig/raster";

/**
 * Drawing surface the outline is painted into. Positions are relative to the window, whose
 * size is fixed for the duration of one render pass.
 */
export interface OutlineWindow {
  readonly bounds: GridBounds;
  writeCell(point: GridPoint, glyph: string): void;
  placeCursor(point: GridPoint): void;
  /** Makes everything written since the last refresh visible. */
  refresh(): void;
}

/**
 * Window backed by an array of rows. Used by tests and by headless sessions.
 */
export class MemoryWindow implements OutlineWindow {
  readonly bounds: GridBounds;
  private readonly rows: string[][];
  private cursorPoint: GridPoint | null = null;
  private refreshes = 0;

  constructor(bounds: GridBounds) {
    this.bounds = { rows: bounds.rows, cols: bounds.cols };
    this.rows = Array.from({ length: bounds.rows }, () => new Array<string>(bounds.cols).fill(" "));
  }

  get cursor(): GridPoint | null {
    return this.cursorPoint;
  }

  get refreshCount(): number {
    return this.refreshes;
  }

  writeCell(point: GridPoint, glyph: string): void {
    const row = this.rows[point.row];
    if (row === undefined || point.col < 0 || point.col >= this.bounds.cols) {
      return;
    }
    row[point.col] = glyph;
  }

  placeCursor(point: GridPoint): void {
    this.cursorPoint = { row: point.row, col: point.col };
  }

  refresh(): void {
    this.refreshes += 1;
  }

  /** Painted rows with trailing blanks removed. */
  lines(): string[] {
    return this.rows.map((row) => row.join("").trimEnd());
  }
}
