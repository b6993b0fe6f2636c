import { Board } from "./board";
import { clueLabel } from "./clues";
import { TileState } from "./tile";

const SYMBOLS: Record<TileState, string> = {
  [TileState.Empty]: ".",
  [TileState.Filled]: "#",
  [TileState.Cross]: "x",
};

/**
 * Plain-text view of a board: column clues stacked above the grid, row clues
 * to the left. Empty clues read as "0".
 */
export function renderBoard(board: Board): string {
  const size = board.size;
  if (size === 0) return "(no puzzle loaded)";

  const { rows, columns } = board.clues;
  const columnLabels = columns.map((clue) => (clue.length === 0 ? ["0"] : clue.map(String)));
  const depth = Math.max(...columnLabels.map((labels) => labels.length));
  const cellWidth = Math.max(...columnLabels.flat().map((label) => label.length));

  const rowLabels = rows.map(clueLabel);
  const labelWidth = Math.max(...rowLabels.map((label) => label.length));
  const indent = " ".repeat(labelWidth + 3);

  const lines: string[] = [];
  for (let level = 0; level < depth; level++) {
    const slots = columnLabels.map((labels) => {
      const label = labels[level - (depth - labels.length)] ?? "";
      return label.padStart(cellWidth);
    });
    lines.push((indent + slots.join(" ")).trimEnd());
  }

  for (let row = 0; row < size; row++) {
    const cells: string[] = [];
    for (let column = 0; column < size; column++) {
      cells.push(SYMBOLS[board.tileAt(column, row).state].padStart(cellWidth));
    }
    lines.push(`${rowLabels[row].padStart(labelWidth)} | ${cells.join(" ")}`);
  }

  return lines.join("\n");
}

/** One-line summary for hosts. */
export function renderStatus(board: Board): string {
  if (board.size === 0) return "No puzzle loaded";
  if (board.isSolved) return "Solved!";
  const hints =
    board.maxHints < 0 ? `${board.hintsUsed} hints used` : `${board.hintsRemaining} of ${board.maxHints} hints left`;
  return `${board.size}x${board.size}, frame ${board.frame}, ${hints}`;
}
