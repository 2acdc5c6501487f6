import type terminalKit from "terminal-kit";

import type { OutlineWindow } from "@sprig/outline-render";
import type { GridBounds, GridPoint } from "@sprig/raster";

type Terminal = typeof terminalKit.terminal;

/** Screen operations a window needs. Coordinates are 1-based, as terminal-kit counts them. */
export interface TerminalSurface {
  writeAt(x: number, y: number, text: string): void;
  moveCursorTo(x: number, y: number): void;
}

export interface TerminalRegion extends GridBounds {
  /** Zero-based screen row the region starts on. */
  readonly top: number;
}

export const surfaceFromTerminal = (term: Terminal): TerminalSurface => ({
  writeAt(x, y, text) {
    term.moveTo(x, y);
    term.noFormat(text);
  },
  moveCursorTo(x, y) {
    term.moveTo(x, y);
  }
});

/**
 * A band of terminal rows. Cells are buffered and a refresh rewrites only the rows that
 * changed since the previous one.
 */
export class TerminalWindow implements OutlineWindow {
  readonly bounds: GridBounds;
  private readonly surface: TerminalSurface;
  private readonly top: number;
  private readonly rows: string[][];
  private readonly painted: string[];
  private readonly dirty = new Set<number>();

  constructor(surface: TerminalSurface, region: TerminalRegion) {
    this.surface = surface;
    this.top = region.top;
    this.bounds = { rows: Math.max(0, region.rows), cols: Math.max(0, region.cols) };
    this.rows = Array.from({ length: this.bounds.rows }, () => new Array<string>(this.bounds.cols).fill(" "));
    this.painted = new Array<string>(this.bounds.rows).fill("");
  }

  writeCell(point: GridPoint, glyph: string): void {
    const row = this.rows[point.row];
    if (row === undefined || point.col < 0 || point.col >= this.bounds.cols) {
      return;
    }
    row[point.col] = glyph;
    this.dirty.add(point.row);
  }

  placeCursor(point: GridPoint): void {
    this.surface.moveCursorTo(point.col + 1, this.top + point.row + 1);
  }

  refresh(): void {
    for (const rowIndex of [...this.dirty].sort((a, b) => a - b)) {
      const text = this.rows[rowIndex].join("");
      if (text !== this.painted[rowIndex]) {
        this.surface.writeAt(1, this.top + rowIndex + 1, text);
        this.painted[rowIndex] = text;
      }
    }
    this.dirty.clear();
  }
}
