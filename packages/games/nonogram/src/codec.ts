import { Grid } from "./grid";
import { Tile, TileState } from "./tile";

export class PuzzleFormatError extends Error {
  /** 1-based line number the problem was found on, when known */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "PuzzleFormatError";
    this.line = line;
  }
}

/** A decoded puzzle file. `maxHints` of -1 means unlimited. */
export interface PuzzleDefinition {
  size: number;
  maxHints: number;
  solution: Grid<TileState>;
}

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

function parseInteger(line: string | undefined): number | null {
  if (line === undefined || !INTEGER_RE.test(line)) return null;
  const value = Number(line.trim());
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Decode the line-oriented puzzle format:
 *
 *   size
 *   maxHints      (optional; when not an integer it is the first solution row)
 *   <size rows, "#" = filled, anything else = empty>
 *
 * Throws PuzzleFormatError on malformed input.
 */
export function decodePuzzle(text: string): PuzzleDefinition {
  const lines = text.split(/\r?\n/);

  const size = parseInteger(lines[0]);
  if (size === null) {
    throw new PuzzleFormatError(`expected an integer board size, got "${lines[0]}"`, 1);
  }
  if (size < 1) {
    throw new PuzzleFormatError(`board size must be at least 1, got ${size}`, 1);
  }

  let offset = 2;
  let maxHints = parseInteger(lines[1]);
  if (maxHints === null) {
    maxHints = -1;
    offset = 1;
  } else if (maxHints < -1) {
    throw new PuzzleFormatError(`hint budget must be -1 or more, got ${maxHints}`, 2);
  }

  const rows: string[] = [];
  for (let row = 0; row < size; row++) {
    const line = lines[offset + row];
    const lineNumber = offset + row + 1;
    if (line === undefined) {
      throw new PuzzleFormatError(`missing solution row ${row + 1} of ${size}`, lineNumber);
    }
    if (line.length < size) {
      throw new PuzzleFormatError(
        `solution row has ${line.length} cells, expected ${size}`,
        lineNumber
      );
    }
    rows.push(line);
  }

  const solution = Grid.create(size, (column, row) =>
    rows[row][column] === "#" ? TileState.Filled : TileState.Empty
  );
  return { size, maxHints, solution };
}

function encodeGrid(size: number, maxHints: number, isFilled: (column: number, row: number) => boolean): string {
  let result = `${size}\n${maxHints}\n`;
  for (let row = 0; row < size; row++) {
    for (let column = 0; column < size; column++) {
      result += isFilled(column, row) ? "#" : ".";
    }
    result += "\n";
  }
  return result;
}

/**
 * Encode a player grid in the puzzle format. Crosses collapse to ".",
 * so decoding the result never yields a cross.
 */
export function encodeBoard(size: number, maxHints: number, tiles: Grid<Tile>): string {
  return encodeGrid(size, maxHints, (column, row) => tiles.get(column, row).state === TileState.Filled);
}

/** Encode a puzzle definition back into its file text. */
export function encodePuzzle(definition: PuzzleDefinition): string {
  const { size, maxHints, solution } = definition;
  return encodeGrid(size, maxHints, (column, row) => solution.get(column, row) === TileState.Filled);
}
