import { CellCoord, ClickKind } from "@picross/core";

/** Result of asking a board for a hint. */
export type HintOutcome =
  | { status: "hinted"; column: number; row: number }
  | { status: "solved" }
  | { status: "budget-exhausted" }
  | { status: "lines-exhausted" };

/**
 * The board contract a host drives once per update tick.
 *
 * Every call runs to completion synchronously; the host serializes ticks.
 */
export interface IPuzzleBoard {
  /** Side length of the square grid; 0 before a puzzle is loaded */
  readonly size: number;

  /** Derived after every accepted input */
  readonly isSolved: boolean;

  /** Logical frame counter used to timestamp replay moves */
  readonly frame: number;

  /** Apply one click. Returns false when the board ignored it (already solved). */
  handleInput(column: number, row: number, kind: ClickKind): boolean;

  /** Undo the most recent move or hint. Returns false when there is nothing to undo. */
  restoreState(): boolean;

  /** Reveal one row and one column of the solution. */
  hint(): HintOutcome;

  /** Move the hover crosshair, or clear it with null. */
  hover(cell: CellCoord | null): void;

  /** Advance the frame counter by one tick and return the new value. */
  advanceFrame(): number;
}
