/**
 * Read-only grid of classified screen cells, and the writer the render pass fills it with.
 * A grid is never patched: every layout change produces a new one.
 */
import { Browser } from "./browser";
import { describeCell, EMPTY_CELL, type CellPredicate, type RasterCell } from "./cells";
import { OutOfBoundsError } from "./errors";
import { isWithinBounds, type GridBounds, type GridPoint } from "./point";

const assertBounds = (bounds: GridBounds): void => {
  const valid = (value: number) => Number.isInteger(value) && value >= 0;
  if (!valid(bounds.rows) || !valid(bounds.cols)) {
    throw new RangeError(`Invalid grid size ${bounds.rows}x${bounds.cols}`);
  }
};

export class Raster {
  readonly bounds: GridBounds;
  private readonly cells: ReadonlyArray<RasterCell>;

  constructor(bounds: GridBounds, cells: ReadonlyArray<RasterCell>) {
    assertBounds(bounds);
    if (cells.length !== bounds.rows * bounds.cols) {
      throw new RangeError(`Expected ${bounds.rows * bounds.cols} cells, received ${cells.length}`);
    }
    this.bounds = { rows: bounds.rows, cols: bounds.cols };
    this.cells = cells;
  }

  contains(point: GridPoint): boolean {
    return isWithinBounds(point, this.bounds);
  }

  get(point: GridPoint): RasterCell | null {
    if (!this.contains(point)) {
      return null;
    }
    return this.cells[point.row * this.bounds.cols + point.col];
  }

  /** Starts a cursor at `point`; the position must lie inside the grid. */
  browser(point: GridPoint): Browser {
    return new Browser(this, point);
  }

  row(index: number): ReadonlyArray<RasterCell> {
    if (!Number.isInteger(index) || index < 0 || index >= this.bounds.rows) {
      throw new OutOfBoundsError(`Row ${index} is outside the grid`);
    }
    const start = index * this.bounds.cols;
    return this.cells.slice(start, start + this.bounds.cols);
  }

  /** First position in reading order whose cell satisfies `predicate`. */
  findFirst(predicate: CellPredicate): GridPoint | null {
    const index = this.cells.findIndex(predicate);
    if (index === -1) {
      return null;
    }
    return { row: Math.floor(index / this.bounds.cols), col: index % this.bounds.cols };
  }

  describe(): string {
    const lines: string[] = [];
    for (let row = 0; row < this.bounds.rows; row += 1) {
      lines.push(this.row(row).map(describeCell).join(" "));
    }
    return lines.join("\n");
  }
}

/**
 * Fills a grid in reading order. Unwritten cells stay `Empty`.
 */
export class RasterWriter {
  readonly bounds: GridBounds;
  private readonly cells: RasterCell[];
  private cursor = 0;

  constructor(bounds: GridBounds) {
    assertBounds(bounds);
    this.bounds = { rows: bounds.rows, cols: bounds.cols };
    this.cells = new Array<RasterCell>(bounds.rows * bounds.cols).fill(EMPTY_CELL);
  }

  get isFull(): boolean {
    return this.cursor >= this.cells.length;
  }

  /** Where the next pushed cell lands; `null` once the grid is full. */
  get position(): GridPoint | null {
    if (this.isFull) {
      return null;
    }
    return { row: Math.floor(this.cursor / this.bounds.cols), col: this.cursor % this.bounds.cols };
  }

  push(cell: RasterCell): GridPoint {
    const point = this.position;
    if (point === null) {
      const last = this.cells.length > 0 ? { row: this.bounds.rows - 1, col: this.bounds.cols - 1 } : null;
      throw new OutOfBoundsError("Cannot add to a full grid", last);
    }
    this.cells[this.cursor] = cell;
    this.cursor += 1;
    return point;
  }

  pushMany(cell: RasterCell, count: number): void {
    for (let index = 0; index < count; index += 1) {
      this.push(cell);
    }
  }

  /**
   * Fills the rest of the current row. Does nothing at the start of a row or on a full grid,
   * so a row that was filled exactly is never followed by a blank one.
   */
  padRow(cell: RasterCell = EMPTY_CELL): void {
    const point = this.position;
    if (point === null || point.col === 0) {
      return;
    }
    this.pushMany(cell, this.bounds.cols - point.col);
  }

  finish(): Raster {
    return new Raster(this.bounds, [...this.cells]);
  }
}

export const createRasterWriter = (bounds: GridBounds): RasterWriter => new RasterWriter(bounds);
