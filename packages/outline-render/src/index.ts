export { MemoryWindow, type OutlineWindow } from "./window";
export {
  DEFAULT_BULLET_GLYPH,
  DEFAULT_INDENT_WIDTH,
  layoutOutline,
  paintRaster,
  renderOutline,
  type RenderOptions,
  type RenderResult
} from "./renderOutline";
export { renderStatusLine } from "./statusLine";
