import { Command } from "commander";
import { ReplayRecord } from "@picross/core";
import { PuzzleSession } from "@picross/engine";
import {
  DatabaseReplaySink,
  FileReplaySink,
  MathRandomRng,
  ReplaySink,
  SeededRng,
  readReplayFile,
  loadReplayFromDatabase,
  renderBoard,
  renderStatus,
  replayOnto,
} from "@picross/game-nonogram";
import { CliContext, createContext, run, withDatabase } from "../context";
import { readPuzzle } from "../puzzleFiles";
import { parseScript, replayReproducesSession, runScript } from "../script";

function play(ctx: CliContext, puzzle: string, moves: string, sink: ReplaySink): boolean {
  const { config, log } = ctx;
  const rng = config.hintSeed ? new SeededRng(config.hintSeed) : new MathRandomRng();
  const board = readPuzzle(puzzle, { logger: log, rng, replaySink: sink, replayLabel: config.replayLabel });

  const result = runScript(new PuzzleSession(board), parseScript(moves));
  for (const hint of result.hints) {
    console.log(hint.status === "hinted" ? `Hint: column ${hint.column + 1}, row ${hint.row + 1}` : `Hint: ${hint.status}`);
  }
  console.log(renderBoard(board));
  console.log(renderStatus(board));
  if (result.solved && !replayReproducesSession(result)) {
    console.warn("Warning: undo and hints are not recorded, so this replay will not reproduce the session");
  }
  return result.solved;
}

export function registerReplayCommands(program: Command): void {
  program
    .command("play <puzzle>")
    .description("Play a scripted session; the replay is saved when the puzzle is solved")
    .requiredOption("-m, --moves <script>", 'Moves, e.g. "L 0 0; R 1 2; U; H; W 10"')
    .option("-l, --label <label>", "Replay label")
    .option("-s, --seed <seed>", "Hint seed")
    .action((puzzle: string, opts: { moves: string; label?: string; seed?: string }) =>
      run(async () => {
        const ctx = createContext({ replayLabel: opts.label, hintSeed: opts.seed });
        const { config } = ctx;

        if (config.databaseUrl) {
          await withDatabase(ctx, async (db) => {
            const sink = new DatabaseReplaySink(db, ctx.log);
            const solved = play(ctx, puzzle, opts.moves, sink);
            await sink.flush();
            if (solved) console.log(`Replay stored in the database as "${config.replayLabel}"`);
          });
          return;
        }

        const sink = new FileReplaySink(config.replayDir);
        if (play(ctx, puzzle, opts.moves, sink)) {
          console.log(`Replay saved to ${sink.pathFor(config.replayLabel)}`);
        }
      })
    );

  program
    .command("replay <puzzle> [replayFile]")
    .description("Verify a stored replay and play it back onto the puzzle")
    .option("-l, --label <label>", "Replay label to look up when no file is given")
    .action((puzzle: string, replayFile: string | undefined, opts: { label?: string }) =>
      run(async () => {
        const ctx = createContext({ replayLabel: opts.label });
        const { config } = ctx;

        let record: ReplayRecord | undefined;
        if (replayFile) {
          record = readReplayFile(replayFile);
        } else if (config.databaseUrl) {
          record = await withDatabase(ctx, (db) => loadReplayFromDatabase(db, config.replayLabel));
          if (!record) throw new Error(`No replay stored under "${config.replayLabel}"`);
        } else {
          record = readReplayFile(new FileReplaySink(config.replayDir).pathFor(config.replayLabel));
        }

        const board = readPuzzle(puzzle, { logger: ctx.log });
        const solved = replayOnto(board, record);
        console.log(renderBoard(board));
        console.log(`${record.entries.length} moves replayed, ${solved ? "solved" : "not solved"}`);
        if (!solved) process.exitCode = 1;
      })
    );
}
