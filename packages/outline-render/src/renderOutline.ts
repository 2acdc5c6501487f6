/**
 * Render pass: lays the outline out as a cell grid in document order and paints that grid
 * into a window. Layout per node at depth d (top-level bullets have depth 0):
 *
 * ```
 * <d * indentWidth fillers><bullet><filler><text...>
 * <hanging-indent fillers>            <text continued...>
 * ```
 */
import type { NodeId, OutlineView } from "@sprig/outline-core";
import {
  bulletCell,
  createRasterWriter,
  fillerCell,
  placeholderCell,
  textCell,
  type GridPoint,
  type Raster,
  type RasterCell,
  type RasterWriter
} from "@sprig/raster";

import type { OutlineWindow } from "./window";

export const DEFAULT_INDENT_WIDTH = 2;
export const DEFAULT_BULLET_GLYPH = "•";

export interface RenderOptions {
  /** Node whose insertion point is reported back; `null` when nothing is active. */
  readonly activeId: NodeId | null;
  /** Characters back from the end of the active content. */
  readonly insertOffset?: number;
  readonly indentWidth?: number;
  readonly bulletGlyph?: string;
}

export interface RenderResult {
  readonly raster: Raster;
  /**
   * Grid position of the active insertion point, `null` when none of the active node's text
   * fits in the grid.
   */
  readonly activePosition: GridPoint | null;
}

const pushWhileRoom = (writer: RasterWriter, cell: RasterCell, count: number): void => {
  for (let index = 0; index < count && !writer.isFull; index += 1) {
    writer.push(cell);
  }
};

export const layoutOutline = (
  view: OutlineView,
  bounds: OutlineWindow["bounds"],
  options: RenderOptions
): RenderResult => {
  const writer = createRasterWriter(bounds);
  const indentWidth = Math.max(1, options.indentWidth ?? DEFAULT_INDENT_WIDTH);
  let activePosition: GridPoint | null = null;

  const layoutNode = (id: NodeId, depth: number): void => {
    if (writer.isFull) {
      return;
    }
    const content = view.getContent(id);
    const isActive = id === options.activeId;
    const indent = depth * indentWidth;
    const hanging = Math.max(0, Math.min(indent + 2, bounds.cols - 1));

    pushWhileRoom(writer, fillerCell(id), indent);
    pushWhileRoom(writer, bulletCell(id), 1);
    pushWhileRoom(writer, fillerCell(id), 1);

    if (content.length === 0) {
      if (!writer.isFull) {
        const point = writer.push(placeholderCell(id));
        if (isActive) {
          activePosition = point;
        }
      }
    } else {
      const insertOffset = Math.min(Math.max(options.insertOffset ?? 0, 0), content.length);
      const activeIndex = content.length - insertOffset;
      let lastTextPoint: GridPoint | null = null;
      for (let index = 0; index < content.length && !writer.isFull; index += 1) {
        if (index > 0 && writer.position?.col === 0) {
          pushWhileRoom(writer, fillerCell(id), hanging);
          if (writer.isFull) {
            break;
          }
        }
        const point = writer.push(textCell(id, index));
        lastTextPoint = point;
        if (isActive && index === activeIndex) {
          activePosition = point;
        }
      }
      // A grid that fills up before the insertion point is reached keeps it on the last
      // text cell drawn for the node.
      if (isActive && activePosition === null) {
        activePosition = writer.position ?? lastTextPoint;
      }
    }

    writer.padRow();
    for (const childId of view.getChildIds(id)) {
      layoutNode(childId, depth + 1);
    }
  };

  for (const childId of view.getChildIds(view.rootId)) {
    layoutNode(childId, 0);
  }

  return { raster: writer.finish(), activePosition };
};

const glyphFor = (cell: RasterCell, view: OutlineView, bulletGlyph: string): string => {
  switch (cell.kind) {
    case "bullet":
      return bulletGlyph;
    case "text":
      return view.getContent(cell.nodeId).charAt(cell.offset);
    default:
      return " ";
  }
};

export const paintRaster = (
  raster: Raster,
  view: OutlineView,
  window: OutlineWindow,
  bulletGlyph: string = DEFAULT_BULLET_GLYPH
): void => {
  for (let row = 0; row < raster.bounds.rows; row += 1) {
    raster.row(row).forEach((cell, col) => {
      window.writeCell({ row, col }, glyphFor(cell, view, bulletGlyph));
    });
  }
  window.refresh();
};

/**
 * Lays out `view` for the window's current size, paints it and reports where the active
 * insertion point landed.
 */
export const renderOutline = (
  view: OutlineView,
  window: OutlineWindow,
  options: RenderOptions
): RenderResult => {
  const result = layoutOutline(view, window.bounds, options);
  paintRaster(result.raster, view, window, options.bulletGlyph ?? DEFAULT_BULLET_GLYPH);
  return result;
};
