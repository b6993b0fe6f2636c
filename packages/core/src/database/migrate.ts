import { Kysely, Migration, MigrationProvider, Migrator } from "kysely";
import { Database } from "./types";
import * as createReplays from "./migrations/20261019_0_create_replays_table";
import * as createReplayMoves from "./migrations/20261019_1_create_replay_moves_table";

export interface MigrateOptions {
  /** Optional log function; defaults to console.log */
  log?: (message: string) => void;
}

const migrations: Record<string, Migration> = {
  "20261019_0_create_replays_table": createReplays,
  "20261019_1_create_replay_moves_table": createReplayMoves,
};

const provider: MigrationProvider = {
  async getMigrations() {
    return migrations;
  },
};

export async function migrateToLatest(
  db: Kysely<Database>,
  options: MigrateOptions = {}
): Promise<void> {
  const log = options.log ?? console.log;
  const migrator = new Migrator({ db, provider });

  log("Running database migrations...");

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((it) => {
    if (it.status === "Success") {
      log(`Migration "${it.migrationName}" executed successfully`);
    } else if (it.status === "Error") {
      log(`Migration "${it.migrationName}" failed`);
    }
  });

  if (error) {
    throw error;
  }

  log("Database migrations complete");
}
