import { CellCoord, ClickKind, Logger, ReplayMove, ReplayRecord, createLogger } from "@picross/core";
import { IPuzzleBoard, HintOutcome } from "@picross/engine";
import { Grid } from "./grid";
import { Clues, computeClues } from "./clues";
import { PuzzleDefinition, decodePuzzle, encodeBoard } from "./codec";
import { BoardPolicy, editorPolicy, solutionPolicy } from "./policy";
import { MathRandomRng, Rng } from "./prng";
import { ReplayLog } from "./replay";
import { ReplaySink } from "./sinks";
import { Tile, TileState, applyClick, copyTile, emptyTile, withState } from "./tile";

export type HintResult = HintOutcome;

export interface BoardOptions {
  /** Solution-check strategy; defaults to solutionPolicy (editorPolicy for blank boards) */
  policy?: BoardPolicy;
  /** Randomness for hint selection */
  rng?: Rng;
  /** Receives the replay once the board is solved */
  replaySink?: ReplaySink;
  /** Label the replay is saved under */
  replayLabel?: string;
  logger?: Logger;
}

export const DEFAULT_REPLAY_LABEL = "replay";

let defaultLogger: Logger | null = null;

function getDefaultLogger(): Logger {
  if (!defaultLogger) defaultLogger = createLogger("picross-board");
  return defaultLogger;
}

function lineKey(column: number, row: number): string {
  return `${column},${row}`;
}

/**
 * Puzzle state for one nonogram: the player grid, the hidden solution, undo
 * history, hint bookkeeping and the replay of the solving session.
 */
export class Board implements IPuzzleBoard {
  private tiles: Grid<Tile> = Grid.empty();
  private solution: Grid<TileState> = Grid.empty();
  private clueCache: Clues = { rows: [], columns: [] };
  private undoStack: Grid<Tile>[] = [];
  private hintedLines = new Set<string>();
  private replayLog = new ReplayLog(0);
  private solved = false;
  private replayFlushed = false;
  private frameCounter = 0;
  private hintBudget = -1;

  private readonly policy: BoardPolicy;
  private readonly rng: Rng;
  private readonly replaySink?: ReplaySink;
  private readonly replayLabel: string;
  private readonly log: Logger;

  constructor(options: BoardOptions = {}) {
    this.policy = options.policy ?? solutionPolicy;
    this.rng = options.rng ?? new MathRandomRng();
    this.replaySink = options.replaySink;
    this.replayLabel = options.replayLabel ?? DEFAULT_REPLAY_LABEL;
    this.log = options.logger ?? getDefaultLogger();
  }

  static fromText(text: string, options: BoardOptions = {}): Board {
    const board = new Board(options);
    board.load(text);
    return board;
  }

  static fromDefinition(definition: PuzzleDefinition, options: BoardOptions = {}): Board {
    const board = new Board(options);
    board.install(definition, true);
    return board;
  }

  /** An all-empty puzzle for drawing a new one; zero lines are left alone. */
  static blank(size: number, options: BoardOptions = {}, maxHints = -1): Board {
    const board = new Board({ ...options, policy: options.policy ?? editorPolicy });
    const solution = Grid.create(size, () => TileState.Empty);
    board.install({ size, maxHints, solution }, false);
    return board;
  }

  // ---------------------------------------------------------------------------
  // Loading and teardown
  // ---------------------------------------------------------------------------

  /**
   * Replace the puzzle with one decoded from `text`. The file is fully
   * validated first, so a PuzzleFormatError leaves the current puzzle intact.
   */
  load(text: string): void {
    const definition = decodePuzzle(text);
    this.install(definition, true);
  }

  /** Drop the puzzle, its history and its hint bookkeeping. */
  reset(): void {
    this.tiles = Grid.empty();
    this.solution = Grid.empty();
    this.clueCache = { rows: [], columns: [] };
    this.solved = false;
    this.replayFlushed = false;
    this.undoStack = [];
    this.hintedLines.clear();
    this.replayLog = new ReplayLog(0);
    this.frameCounter = 0;
    this.hintBudget = -1;
  }

  private install(definition: PuzzleDefinition, crossZeroLines: boolean): void {
    const { size, maxHints, solution } = definition;
    if (solution.size !== size) {
      throw new RangeError(`Solution is ${solution.size}x${solution.size}, expected ${size}x${size}`);
    }

    this.reset();
    this.solution = solution.clone();
    this.tiles = Grid.create(size, () => emptyTile());
    this.hintBudget = maxHints;
    this.clueCache = computeClues(this.solution);
    this.replayLog = new ReplayLog(size);
    if (crossZeroLines) this.crossZeroLines();

    this.log.info({ size, maxHints, policy: this.policy.name }, "Board loaded");
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.tiles.size;
  }

  get maxHints(): number {
    return this.hintBudget;
  }

  get isSolved(): boolean {
    return this.solved;
  }

  get frame(): number {
    return this.frameCounter;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get hintsUsed(): number {
    return this.hintedLines.size;
  }

  /** Hints left under the budget; Infinity when unlimited. */
  get hintsRemaining(): number {
    if (this.hintBudget < 0) return Infinity;
    return Math.max(0, this.hintBudget - this.hintedLines.size);
  }

  get clues(): Clues {
    return {
      rows: this.clueCache.rows.map((clue) => [...clue]),
      columns: this.clueCache.columns.map((clue) => [...clue]),
    };
  }

  tileAt(column: number, row: number): Tile {
    return copyTile(this.tiles.get(column, row));
  }

  /** Deep copy of the player grid. */
  snapshot(): Grid<Tile> {
    return this.tiles.clone(copyTile);
  }

  replayRecord(): ReplayRecord {
    return this.replayLog.toRecord(this.replayLabel);
  }

  serialize(): string {
    return encodeBoard(this.size, this.hintBudget, this.tiles);
  }

  // ---------------------------------------------------------------------------
  // Player input
  // ---------------------------------------------------------------------------

  /**
   * Apply a click: snapshot for undo, change the tile, record the move at the
   * current frame, then re-check the solution. Ignored once solved.
   */
  handleInput(column: number, row: number, kind: ClickKind): boolean {
    this.assertCell(column, row);
    if (this.solved) return false;

    this.saveState();
    this.applyMove({ kind, column, row });
    this.replayLog.addMove({ kind, column, row }, this.frameCounter);
    this.checkSolution();
    return true;
  }

  /** Re-apply a recorded move without touching undo history or the replay log. */
  doReplayMove(move: ReplayMove): void {
    this.assertCell(move.column, move.row);
    this.applyMove(move);
    this.solved = this.policy.matchesSolution(this.tiles, this.solution);
  }

  /**
   * Compare the player grid to the solution. Whenever it matches, hover flags
   * are cleared; the replay is handed to the sink once per loaded puzzle.
   */
  checkSolution(): boolean {
    this.solved = this.policy.matchesSolution(this.tiles, this.solution);
    if (this.solved) this.finishSolved();
    return this.solved;
  }

  restoreState(): boolean {
    const previous = this.undoStack.pop();
    if (!previous) return false;

    this.tiles = previous;
    this.solved = this.policy.matchesSolution(this.tiles, this.solution);
    return true;
  }

  advanceFrame(): number {
    return ++this.frameCounter;
  }

  /** Highlight the hovered tile's column and row. Frozen once solved. */
  hover(cell: CellCoord | null): void {
    if (this.solved) return;
    if (cell) this.assertCell(cell.column, cell.row);

    this.tiles.forEach((tile, column, row) => {
      const isHoveredX = cell !== null && column === cell.column;
      const isHoveredY = cell !== null && row === cell.row;
      if (tile.isHoveredX !== isHoveredX || tile.isHoveredY !== isHoveredY) {
        this.tiles.set(column, row, { ...tile, isHoveredX, isHoveredY });
      }
    });
  }

  clearHintFlash(): void {
    this.tiles.forEach((tile, column, row) => {
      if (tile.hintFlash) this.tiles.set(column, row, { ...tile, hintFlash: false });
    });
  }

  /** Every tile back to empty; undo, replay and hints are untouched. */
  clear(): void {
    this.tiles.forEach((tile, column, row) => {
      this.tiles.set(column, row, { ...tile, state: TileState.Empty });
    });
  }

  // ---------------------------------------------------------------------------
  // Hints
  // ---------------------------------------------------------------------------

  /**
   * Reveal a random, not yet hinted (column, row) pair. Pairs are drawn
   * without replacement; budget or pair exhaustion is reported, not looped on.
   */
  hint(): HintResult {
    if (this.solved) return { status: "solved" };
    if (this.hintBudget >= 0 && this.hintedLines.size >= this.hintBudget) {
      return { status: "budget-exhausted" };
    }

    const remaining: CellCoord[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let column = 0; column < this.size; column++) {
        if (!this.hintedLines.has(lineKey(column, row))) remaining.push({ column, row });
      }
    }
    if (remaining.length === 0) return { status: "lines-exhausted" };

    this.saveState();
    const { column, row } = remaining[this.rng.nextInt(remaining.length)];
    this.hintedLines.add(lineKey(column, row));
    this.log.info({ column, row, used: this.hintedLines.size }, "Hint given");
    this.solveLine(column, row);
    return { status: "hinted", column, row };
  }

  /**
   * Copy the solution into one row and one column. Empty cells become crosses
   * and every touched tile flashes. Does not check the solution.
   */
  solveLine(column: number, row: number): void {
    this.assertCell(column, row);
    this.tiles.forEach((tile, c, r) => {
      if (c !== column && r !== row) return;
      const solved = this.solution.get(c, r);
      const state = solved === TileState.Empty ? TileState.Cross : solved;
      this.tiles.set(c, r, { ...tile, state, hintFlash: true });
    });
  }

  /** Cross every row and column whose solution has no filled cell. */
  crossZeroLines(): void {
    for (let i = 0; i < this.size; i++) {
      if (!this.solution.row(i).includes(TileState.Filled)) {
        for (let column = 0; column < this.size; column++) this.setState(column, i, TileState.Cross);
      }
      if (!this.solution.column(i).includes(TileState.Filled)) {
        for (let row = 0; row < this.size; row++) this.setState(i, row, TileState.Cross);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private applyMove(move: ReplayMove): void {
    const tile = this.tiles.get(move.column, move.row);
    this.tiles.set(move.column, move.row, withState(tile, applyClick(tile.state, move.kind)));
  }

  private setState(column: number, row: number, state: TileState): void {
    this.tiles.set(column, row, withState(this.tiles.get(column, row), state));
  }

  private saveState(): void {
    this.undoStack.push(this.tiles.clone(copyTile));
  }

  private finishSolved(): void {
    this.tiles.forEach((tile, column, row) => {
      if (tile.isHoveredX || tile.isHoveredY) {
        this.tiles.set(column, row, { ...tile, isHoveredX: false, isHoveredY: false });
      }
    });
    if (this.replayFlushed) return;
    this.replayFlushed = true;
    this.log.info({ frame: this.frameCounter, moves: this.replayLog.length }, "Board is solved");

    if (this.replaySink) {
      this.replaySink.save(this.replayLog.toRecord(this.replayLabel));
      this.log.info({ label: this.replayLabel }, "Replay saved");
    }
  }

  private assertCell(column: number, row: number): void {
    if (!this.tiles.inBounds(column, row)) {
      throw new RangeError(`Cell (${column}, ${row}) is outside a ${this.size}x${this.size} board`);
    }
  }
}
