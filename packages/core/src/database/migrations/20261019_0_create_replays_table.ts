import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("replays")
    .ifNotExists()
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("label", "varchar(128)", (col) => col.notNull())
    .addColumn("size", "integer", (col) => col.notNull())
    .addColumn("root_hash", "varchar(66)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex("idx_replays_label")
    .ifNotExists()
    .on("replays")
    .column("label")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex("idx_replays_label").execute();
  await db.schema.dropTable("replays").execute();
}
