import { Grid } from "./grid";
import { Tile, TileState, compareSolutionTile } from "./tile";

/**
 * Decides whether the player grid counts as solved. Variant boards swap the
 * policy instead of subclassing Board.
 */
export interface BoardPolicy {
  readonly name: string;
  matchesSolution(tiles: Grid<Tile>, solution: Grid<TileState>): boolean;
}

/** Row-major comparison against the solution; the first mismatch fails. */
export const solutionPolicy: BoardPolicy = {
  name: "solution",
  matchesSolution(tiles, solution) {
    if (solution.size === 0 || tiles.size !== solution.size) return false;
    return !tiles.some(
      (tile, column, row) => !compareSolutionTile(tile.state, solution.get(column, row))
    );
  },
};

/** Puzzle editing: the drawn grid is the puzzle, so it is never "solved". */
export const editorPolicy: BoardPolicy = {
  name: "editor",
  matchesSolution() {
    return false;
  },
};
