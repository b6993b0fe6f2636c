/** Primary (left) or secondary (right) click on a cell. */
export type ClickKind = "left" | "right";

export interface CellCoord {
  column: number;
  row: number;
}

export interface ReplayMove extends CellCoord {
  kind: ClickKind;
}

export interface ReplayEntry {
  sequence: number;
  move: ReplayMove;
  /** Logical frame index the move was accepted on */
  frame: number;
  prevHash: string;
}

/** A persisted solving session, hash-chained from the board size. */
export interface ReplayRecord {
  label: string;
  size: number;
  entries: ReplayEntry[];
  rootHash: string;
}

export function isClickKind(value: unknown): value is ClickKind {
  return value === "left" || value === "right";
}
