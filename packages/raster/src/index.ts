/**
 * Sprig raster: the addressable screen image of a rendered outline and the bounded,
 * predicate-driven cursor that searches it. Knows nothing about trees beyond node ids.
 */
export {
  formatPoint,
  isWithinBounds,
  linearMove,
  type GridBounds,
  type GridDirection,
  type GridPoint,
  type HorizontalDirection
} from "./point";

export {
  EMPTY_CELL,
  bulletCell,
  describeCell,
  fillerCell,
  isBrowsable,
  isText,
  placeholderCell,
  textCell,
  type BulletCell,
  type CellPredicate,
  type EmptyCell,
  type FillerCell,
  type PlaceholderCell,
  type RasterCell,
  type RasterCellKind,
  type TextCell
} from "./cells";

export {
  OutOfBoundsError,
  PredicateUnsatisfiedError,
  RasterError,
  isRasterError,
  type RasterErrorKind
} from "./errors";

export { Raster, RasterWriter, createRasterWriter } from "./raster";
export { Browser } from "./browser";
