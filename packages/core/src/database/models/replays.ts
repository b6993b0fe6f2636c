import { Kysely } from "kysely";
import {
  Database,
  NewReplay,
  NewReplayMoveRow,
  Replay,
  ReplayMoveRow,
} from "../types";

/**
 * Insert a replay header and its moves in one transaction. Returns the new replay id.
 */
export async function createReplay(
  db: Kysely<Database>,
  replay: NewReplay,
  moves: Omit<NewReplayMoveRow, "replay_id">[]
): Promise<number> {
  return db.transaction().execute(async (trx) => {
    const { id } = await trx
      .insertInto("replays")
      .values(replay)
      .returning("id")
      .executeTakeFirstOrThrow();

    if (moves.length > 0) {
      await trx
        .insertInto("replay_moves")
        .values(moves.map((m) => ({ ...m, replay_id: id })))
        .execute();
    }
    return id;
  });
}

/** Most recent replay stored under `label`. */
export async function findReplayByLabel(
  db: Kysely<Database>,
  label: string
): Promise<Replay | undefined> {
  return db
    .selectFrom("replays")
    .where("label", "=", label)
    .selectAll()
    .orderBy("created_at", "desc")
    .orderBy("id", "desc")
    .executeTakeFirst();
}

export async function findMovesByReplayId(
  db: Kysely<Database>,
  replayId: number
): Promise<ReplayMoveRow[]> {
  return db
    .selectFrom("replay_moves")
    .where("replay_id", "=", replayId)
    .selectAll()
    .orderBy("sequence", "asc")
    .execute();
}
