import { readFileSync } from "fs";
import { Command } from "commander";
import {
  Board,
  clueLabel,
  decodePuzzle,
  encodePuzzle,
  renderBoard,
  renderStatus,
} from "@picross/game-nonogram";
import { createContext, run } from "../context";
import { applyAnswer, readPuzzle } from "../puzzleFiles";

function parseSize(raw: string, name: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return Number(raw);
}

export function registerPuzzleCommands(program: Command): void {
  program
    .command("clues <puzzle>")
    .description("Print the row and column clues of a puzzle file")
    .action((puzzle: string) =>
      run(() => {
        const ctx = createContext();
        const { rows, columns } = readPuzzle(puzzle, { logger: ctx.log }).clues;
        console.log("Rows:");
        rows.forEach((clue, i) => console.log(`  ${i + 1}: ${clueLabel(clue)}`));
        console.log("Columns:");
        columns.forEach((clue, i) => console.log(`  ${i + 1}: ${clueLabel(clue)}`));
      })
    );

  program
    .command("show <puzzle>")
    .description("Draw a puzzle, optionally with an answer grid laid over it")
    .option("-a, --answer <file>", "Answer grid in puzzle format")
    .action((puzzle: string, opts: { answer?: string }) =>
      run(() => {
        const ctx = createContext();
        const board = readPuzzle(puzzle, { logger: ctx.log });
        if (opts.answer) applyAnswer(board, readFileSync(opts.answer, "utf-8"));
        console.log(renderBoard(board));
        console.log(renderStatus(board));
      })
    );

  program
    .command("check <puzzle> <answer>")
    .description("Check an answer grid against a puzzle's solution")
    .action((puzzle: string, answer: string) =>
      run(() => {
        const ctx = createContext();
        const board = readPuzzle(puzzle, { logger: ctx.log });
        if (applyAnswer(board, readFileSync(answer, "utf-8"))) {
          console.log("Solved");
        } else {
          console.log("Not solved");
          process.exitCode = 1;
        }
      })
    );

  program
    .command("format <puzzle>")
    .description("Print a puzzle file in canonical form")
    .action((puzzle: string) =>
      run(() => {
        process.stdout.write(encodePuzzle(decodePuzzle(readFileSync(puzzle, "utf-8"))));
      })
    );

  program
    .command("new <size>")
    .description("Print an empty puzzle file to draw on")
    .option("-m, --max-hints <count>", "Hint budget (-1 for unlimited)", "-1")
    .action((size: string, opts: { maxHints: string }) =>
      run(() => {
        const ctx = createContext();
        const n = parseSize(size, "size");
        const maxHints = parseSize(opts.maxHints, "max-hints");
        if (n < 1) throw new Error("size must be at least 1");
        if (maxHints < -1) throw new Error("max-hints must be -1 or more");
        process.stdout.write(Board.blank(n, { logger: ctx.log }, maxHints).serialize());
      })
    );
}
