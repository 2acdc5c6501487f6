import type { OutlineWindow } from "./window";

/**
 * Paints the first row of `window`: the mode label on the left and `message` right-aligned.
 * A message too long for the space beside the label is cut at its end.
 */
export const renderStatusLine = (window: OutlineWindow, modeLabel: string, message: string): void => {
  const width = window.bounds.cols;
  if (window.bounds.rows === 0 || width === 0) {
    return;
  }
  const label = modeLabel.slice(0, width);
  const room = Math.max(0, width - label.length - 1);
  const shown = message.slice(0, room);
  const line = label + " ".repeat(width - label.length - shown.length) + shown;

  Array.from(line).forEach((glyph, col) => {
    window.writeCell({ row: 0, col }, glyph);
  });
  window.refresh();
};
