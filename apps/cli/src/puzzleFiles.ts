import { readFileSync } from "fs";
import { Board, BoardOptions, TileState, decodePuzzle } from "@picross/game-nonogram";

export function readPuzzle(filePath: string, options: BoardOptions = {}): Board {
  return Board.fromText(readFileSync(filePath, "utf-8"), options);
}

/**
 * Lay an answer grid (puzzle-format text, "#" = filled) over a freshly loaded
 * board, then check it. Returns the solved flag.
 */
export function applyAnswer(board: Board, answerText: string): boolean {
  const answer = decodePuzzle(answerText);
  if (answer.size !== board.size) {
    throw new Error(`Answer is ${answer.size}x${answer.size} but the puzzle is ${board.size}x${board.size}`);
  }

  answer.solution.forEach((state, column, row) => {
    if (state === TileState.Filled && board.tileAt(column, row).state !== TileState.Filled) {
      board.doReplayMove({ kind: "left", column, row });
    }
  });
  return board.checkSolution();
}
