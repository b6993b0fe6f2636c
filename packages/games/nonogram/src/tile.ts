import { ClickKind } from "@picross/core";

export enum TileState {
  Empty = "empty",
  Filled = "filled",
  Cross = "cross",
}

/** A single grid cell. Hover and hint-flash flags are presentation hints only. */
export interface Tile {
  readonly state: TileState;
  readonly isHoveredX: boolean;
  readonly isHoveredY: boolean;
  readonly hintFlash: boolean;
}

export function emptyTile(): Tile {
  return { state: TileState.Empty, isHoveredX: false, isHoveredY: false, hintFlash: false };
}

/** Full-field copy; the unit of undo snapshotting. */
export function copyTile(tile: Tile): Tile {
  return {
    state: tile.state,
    isHoveredX: tile.isHoveredX,
    isHoveredY: tile.isHoveredY,
    hintFlash: tile.hintFlash,
  };
}

export function withState(tile: Tile, state: TileState): Tile {
  return { ...tile, state };
}

/** Left click fills, or empties an already filled tile. */
export function leftClick(state: TileState): TileState {
  return state === TileState.Filled ? TileState.Empty : TileState.Filled;
}

/** Right click crosses, or empties an already crossed tile. */
export function rightClick(state: TileState): TileState {
  return state === TileState.Cross ? TileState.Empty : TileState.Cross;
}

export function applyClick(state: TileState, kind: ClickKind): TileState {
  return kind === "left" ? leftClick(state) : rightClick(state);
}

/**
 * Tile states compare equal once a cross is read as empty on both sides.
 */
export function compareSolutionTile(a: TileState, b: TileState): boolean {
  const left = a === TileState.Cross ? TileState.Empty : a;
  const right = b === TileState.Cross ? TileState.Empty : b;
  return left === right;
}
