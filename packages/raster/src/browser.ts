/**
 * Immutable cursor over a {@link Raster}. Every motion returns a new browser or throws; the
 * browser a motion was called on is never changed.
 */
import type { CellPredicate, RasterCell } from "./cells";
import { OutOfBoundsError, PredicateUnsatisfiedError } from "./errors";
import {
  formatPoint,
  linearMove,
  type GridDirection,
  type GridPoint,
  type HorizontalDirection
} from "./point";
import type { Raster } from "./raster";

const offsetPoint = (point: GridPoint, direction: GridDirection, count: number): GridPoint => {
  switch (direction) {
    case "left":
      return { row: point.row, col: point.col - count };
    case "right":
      return { row: point.row, col: point.col + count };
    case "up":
      return { row: point.row - count, col: point.col };
    case "down":
      return { row: point.row + count, col: point.col };
  }
};

export class Browser {
  readonly raster: Raster;
  readonly position: GridPoint;
  /** The cell under the cursor. */
  readonly state: RasterCell;

  constructor(raster: Raster, position: GridPoint) {
    const cell = raster.get(position);
    if (cell === null) {
      throw OutOfBoundsError.at(position);
    }
    this.raster = raster;
    this.position = { row: position.row, col: position.col };
    this.state = cell;
  }

  /**
   * Plain coordinate move; never wraps between rows.
   */
  goNoWrap(direction: GridDirection, count = 1): Browser {
    const target = offsetPoint(this.position, direction, count);
    if (!this.raster.contains(target)) {
      throw OutOfBoundsError.at(target, this.position);
    }
    return new Browser(this.raster, target);
  }

  /**
   * Moves `count` cells along the grid read as one line: past the last column of a row
   * continues at column 0 of the next.
   */
  goWrap(direction: HorizontalDirection, count: number): Browser {
    const signed = direction === "left" ? -count : count;
    const target = linearMove(this.position, this.raster.bounds, signed);
    if (target === null) {
      throw new OutOfBoundsError(
        `Moving ${count} cells ${direction} of ${formatPoint(this.position)} leaves the grid`,
        this.position
      );
    }
    return new Browser(this.raster, target);
  }

  /**
   * Takes one step, then keeps stepping while the reached cell satisfies `predicate`. Returns
   * the first reached cell that does not.
   */
  goWhile(direction: HorizontalDirection, predicate: CellPredicate): Browser {
    let current = this.goWrap(direction, 1);
    while (predicate(current.state)) {
      current = current.goWrap(direction, 1);
    }
    return current;
  }

  /**
   * {@link goWhile} limited to `maxCount` steps. Running out of steps is not an error: the
   * browser reached after the last step is returned.
   */
  goWhileOrCount(direction: HorizontalDirection, maxCount: number, predicate: CellPredicate): Browser {
    let current: Browser = this;
    for (let taken = 0; taken < maxCount; taken += 1) {
      current = current.goWrap(direction, 1);
      if (!predicate(current.state)) {
        break;
      }
    }
    return current;
  }

  /**
   * Steps until `count` cells satisfying `predicate` have been crossed and returns the last
   * of them. At most `maxSteps` raw steps are taken.
   */
  goUntilCount(
    direction: HorizontalDirection,
    count: number,
    predicate: CellPredicate,
    maxSteps = Number.POSITIVE_INFINITY
  ): Browser {
    if (count <= 0) {
      return this;
    }
    let current: Browser = this;
    let matched = 0;
    for (let steps = 0; steps < maxSteps; steps += 1) {
      current = current.goWrap(direction, 1);
      if (predicate(current.state)) {
        matched += 1;
        if (matched === count) {
          return current;
        }
      }
    }
    throw new PredicateUnsatisfiedError(
      `Found ${matched} of ${count} matching cells within ${maxSteps} steps`
    );
  }

  map<T>(fn: (browser: Browser) => T): T {
    return fn(this);
  }
}
