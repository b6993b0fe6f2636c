import { Grid } from "./grid";
import { TileState } from "./tile";

/** Ordered run lengths for every row and column. A line with no filled cells is `[]`. */
export interface Clues {
  rows: number[][];
  columns: number[][];
}

/** Lengths of the maximal runs of filled cells in one line. */
export function lineClue(cells: readonly TileState[]): number[] {
  const runs: number[] = [];
  let run = 0;
  for (const cell of cells) {
    if (cell === TileState.Filled) {
      run++;
    } else if (run > 0) {
      runs.push(run);
      run = 0;
    }
  }
  if (run > 0) runs.push(run);
  return runs;
}

export function computeClues(solution: Grid<TileState>): Clues {
  const rows: number[][] = [];
  const columns: number[][] = [];
  for (let i = 0; i < solution.size; i++) {
    rows.push(lineClue(solution.row(i)));
    columns.push(lineClue(solution.column(i)));
  }
  return { rows, columns };
}

/** Display text for a clue; an empty clue reads as "0". */
export function clueLabel(clue: readonly number[]): string {
  return clue.length === 0 ? "0" : clue.join(" ");
}
