/**
 * Word motions (`b`, `w`, `e`). Distances inside a bullet are counted in text cells, so a
 * motion crosses the hanging indent of wrapped content without counting it.
 */
import {
  isText,
  type Browser,
  type GridPoint,
  type HorizontalDirection,
  type Raster
} from "@sprig/raster";

import { notBrowsable } from "./gridMotions";

export type WordMotion = "back" | "next" | "end";

export const WORD_SEPARATORS: readonly string[] = [" "];

interface WordMotionShape {
  readonly direction: HorizontalDirection;
  /** Where the motion settles relative to the separator it found. */
  readonly separatorOffset: number;
}

const WORD_MOTIONS: Record<WordMotion, WordMotionShape> = {
  back: { direction: "left", separatorOffset: 1 },
  next: { direction: "right", separatorOffset: 1 },
  end: { direction: "right", separatorOffset: -1 }
};

/**
 * Index of the nearest separator strictly before (`left`) or after (`right`) `index`, or
 * `null` when there is none or `index` is outside `text`.
 */
export const findSeparator = (
  text: string,
  index: number,
  direction: HorizontalDirection,
  separators: readonly string[] = WORD_SEPARATORS
): number | null => {
  if (index < 0 || index >= text.length) {
    return null;
  }
  const step = direction === "left" ? -1 : 1;
  for (let current = index + step; current >= 0 && current < text.length; current += step) {
    if (separators.includes(text.charAt(current))) {
      return current;
    }
  }
  return null;
};

const stepText = (browser: Browser, direction: HorizontalDirection, count: number): Browser =>
  browser.goUntilCount(direction, count, isText);

const jumpToSeparator = (
  start: Browser,
  text: string,
  startIndex: number,
  shape: WordMotionShape,
  separators: readonly string[]
): Browser => {
  let browser = start;
  let index = startIndex;
  let separator = findSeparator(text, index, shape.direction, separators);
  // Already at the spot this separator leads to: continue from the separator itself.
  while (separator !== null && separator + shape.separatorOffset === index) {
    browser = stepText(browser, shape.direction, 1);
    index = separator;
    separator = findSeparator(text, index, shape.direction, separators);
  }

  let target: number;
  if (separator === null) {
    target = shape.direction === "left" ? 0 : text.length - 1;
  } else {
    target = separator + shape.separatorOffset;
  }
  target = Math.min(Math.max(target, 0), Math.max(text.length - 1, 0));
  return stepText(browser, shape.direction, Math.abs(target - index));
};

/**
 * Applies a word motion from `position`. At the first (`b`) or last (`w`, `e`) character of
 * a bullet the motion continues into the neighbouring bullet; `w` then stops on its first
 * character.
 */
export const moveByWord = (
  raster: Raster,
  position: GridPoint,
  motion: WordMotion,
  contentOf: (nodeId: number) => string,
  separators: readonly string[] = WORD_SEPARATORS
): GridPoint => {
  const shape = WORD_MOTIONS[motion];
  let browser = raster.browser(position);
  let cell = browser.state;

  const atEdge = !isText(cell)
    || cell.offset === (shape.direction === "left" ? 0 : contentOf(cell.nodeId).length - 1);
  if (atEdge) {
    browser = browser.goWhile(shape.direction, notBrowsable);
    cell = browser.state;
    if (!isText(cell) || motion === "next") {
      return browser.position;
    }
  }
  if (!isText(cell)) {
    return browser.position;
  }
  return jumpToSeparator(browser, contentOf(cell.nodeId), cell.offset, shape, separators).position;
};
