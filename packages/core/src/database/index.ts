export { createDatabase, getPoolConfig } from "./database";
export { getDatabaseUrl } from "./config";
export { migrateToLatest } from "./migrate";
export type { MigrateOptions } from "./migrate";

export type {
  Database,
  ReplaysTable,
  Replay,
  NewReplay,
  ReplayMovesTable,
  ReplayMoveRow,
  NewReplayMoveRow,
} from "./types";

export {
  createReplay,
  findReplayByLabel,
  findMovesByReplayId,
} from "./models/replays";
