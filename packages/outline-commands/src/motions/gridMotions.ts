/**
 * Cursor motions over the rendered grid. Every motion starts from a browsable cell and either
 * returns the new position or throws a raster error; none of them touches the tree.
 */
import {
  isBrowsable,
  PredicateUnsatisfiedError,
  type Browser,
  type GridPoint,
  type HorizontalDirection,
  type Raster,
  type RasterCell
} from "@sprig/raster";

import type { CommandCursor } from "../cursor";

export type VerticalDirection = "up" | "down";

export const notBrowsable = (cell: RasterCell): boolean => !isBrowsable(cell);

/**
 * The browser's own position when it rests on a browsable cell, otherwise the nearest
 * browsable cell to its left on the same row.
 */
export const findLeftText = (browser: Browser): GridPoint => {
  if (isBrowsable(browser.state)) {
    return browser.position;
  }
  const reached = browser.goWhileOrCount("left", browser.position.col, notBrowsable);
  if (!isBrowsable(reached.state)) {
    throw new PredicateUnsatisfiedError("no text on target line");
  }
  return reached.position;
};

export const moveHorizontal = (raster: Raster, position: GridPoint, direction: HorizontalDirection): GridPoint =>
  raster.browser(position).goWhile(direction, notBrowsable).position;

/**
 * One grid row up or down at the remembered column. Lands on the nearest text to the left of
 * that column, or on the first text to its right when the row starts further in.
 */
export const moveVertical = (raster: Raster, cursor: CommandCursor, direction: VerticalDirection): GridPoint => {
  const moved = raster.browser(cursor.position).goNoWrap(direction, 1);
  const column = Math.min(cursor.column, raster.bounds.cols - 1);
  const shift = column - moved.position.col;
  const aligned = shift >= 0 ? moved.goNoWrap("right", shift) : moved.goNoWrap("left", -shift);
  if (isBrowsable(aligned.state)) {
    return aligned.position;
  }

  const left = aligned.goWhileOrCount("left", aligned.position.col, notBrowsable);
  if (isBrowsable(left.state)) {
    return left.position;
  }
  const right = aligned.goWhileOrCount("right", raster.bounds.cols - 1 - aligned.position.col, notBrowsable);
  if (isBrowsable(right.state)) {
    return right.position;
  }
  throw new PredicateUnsatisfiedError("no text on target line");
};
