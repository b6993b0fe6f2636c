import { Generated, Selectable, Insertable } from "kysely";

// ---- replays ----

export interface ReplaysTable {
  id: Generated<number>;
  label: string;
  size: number;
  root_hash: string;
  created_at: Generated<Date>;
}

export type Replay = Selectable<ReplaysTable>;
export type NewReplay = Insertable<ReplaysTable>;

// ---- replay_moves ----

export interface ReplayMovesTable {
  id: Generated<number>;
  replay_id: number;
  sequence: number;
  kind: string; // "left" | "right"
  tile_column: number;
  tile_row: number;
  frame: number;
  prev_hash: string;
}

export type ReplayMoveRow = Selectable<ReplayMovesTable>;
export type NewReplayMoveRow = Insertable<ReplayMovesTable>;

// ---- master Database interface ----

export interface Database {
  replays: ReplaysTable;
  replay_moves: ReplayMovesTable;
}
