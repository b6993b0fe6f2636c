import { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("replay_moves")
    .ifNotExists()
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("replay_id", "integer", (col) =>
      col.notNull().references("replays.id").onDelete("cascade")
    )
    .addColumn("sequence", "integer", (col) => col.notNull())
    .addColumn("kind", "varchar(5)", (col) => col.notNull())
    .addColumn("tile_column", "integer", (col) => col.notNull())
    .addColumn("tile_row", "integer", (col) => col.notNull())
    .addColumn("frame", "integer", (col) => col.notNull())
    .addColumn("prev_hash", "varchar(66)", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_replay_moves_replay_id")
    .ifNotExists()
    .on("replay_moves")
    .column("replay_id")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex("idx_replay_moves_replay_id").execute();
  await db.schema.dropTable("replay_moves").execute();
}
