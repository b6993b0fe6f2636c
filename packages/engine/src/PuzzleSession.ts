import { IPuzzleBoard, HintOutcome } from "./interfaces/IPuzzleBoard";
import { InputFrame, InputTracker } from "./InputTracker";

export interface SessionTick {
  /** Frame counter after this tick */
  frame: number;
  /** Clicks the board accepted */
  moves: number;
  undone: boolean;
  hint: HintOutcome | null;
  solved: boolean;
}

/**
 * Drives a board from per-tick host input: hover, undo, hint, clicks,
 * then one frame advance. Once the board is solved the session is inert.
 */
export class PuzzleSession {
  private board: IPuzzleBoard;
  private tracker = new InputTracker();

  constructor(board: IPuzzleBoard) {
    this.board = board;
  }

  getBoard(): IPuzzleBoard {
    return this.board;
  }

  /** Swap in a freshly loaded board; held buttons do not carry over. */
  setBoard(board: IPuzzleBoard): void {
    this.board = board;
    this.tracker.reset();
  }

  update(input: InputFrame): SessionTick {
    const board = this.board;
    const edges = this.tracker.update(input);

    if (board.isSolved) {
      return { frame: board.frame, moves: 0, undone: false, hint: null, solved: true };
    }

    board.hover(edges.cell);

    const undone = edges.undo ? board.restoreState() : false;
    const hint = edges.hint ? board.hint() : null;

    let moves = 0;
    if (edges.cell) {
      const { column, row } = edges.cell;
      if (edges.left && board.handleInput(column, row, "left")) moves++;
      if (edges.right && board.handleInput(column, row, "right")) moves++;
    }

    const frame = board.advanceFrame();
    return { frame, moves, undone, hint, solved: board.isSolved };
  }
}
