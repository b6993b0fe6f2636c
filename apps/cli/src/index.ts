import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerPuzzleCommands } from "./commands/puzzle";
import { registerReplayCommands } from "./commands/replay";

program
  .name("picross")
  .description("Nonogram puzzle engine: clues, checking, hints and replays")
  .version("0.1.0", "-v, --version");

registerPuzzleCommands(program);
registerReplayCommands(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
