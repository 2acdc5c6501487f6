import { formatPoint, type GridPoint } from "./point";

export type RasterErrorKind = "out-of-bounds" | "predicate-unsatisfied";

export class RasterError extends Error {
  readonly kind: RasterErrorKind;

  constructor(kind: RasterErrorKind, message: string) {
    super(message);
    this.name = "RasterError";
    this.kind = kind;
  }
}

/**
 * A motion, lookup or write left the grid. `lastValid` is the last in-bounds position the
 * operation reached, when it reached one.
 */
export class OutOfBoundsError extends RasterError {
  readonly lastValid: GridPoint | null;

  constructor(message: string, lastValid: GridPoint | null = null) {
    super("out-of-bounds", message);
    this.name = "OutOfBoundsError";
    this.lastValid = lastValid;
  }

  static at(point: GridPoint, lastValid: GridPoint | null = null): OutOfBoundsError {
    return new OutOfBoundsError(`Position ${formatPoint(point)} is outside the grid`, lastValid);
  }
}

export class PredicateUnsatisfiedError extends RasterError {
  constructor(message: string) {
    super("predicate-unsatisfied", message);
    this.name = "PredicateUnsatisfiedError";
  }
}

export const isRasterError = (error: unknown): error is RasterError => error instanceof RasterError;
