import { Kysely } from "kysely";
import {
  Database,
  Logger,
  createDatabase,
  createLogger,
  migrateToLatest,
} from "@picross/core";
import { CliConfig, resolveConfig } from "./config";

export interface CliContext {
  config: CliConfig;
  log: Logger;
}

export function createContext(overrides: Partial<CliConfig> = {}): CliContext {
  const config = resolveConfig(process.env, overrides);
  return { config, log: createLogger("picross-cli", config.logLevel) };
}

/**
 * Open the replay database, migrate it, run `work`, and always close the pool.
 */
export async function withDatabase<T>(
  ctx: CliContext,
  work: (db: Kysely<Database>) => Promise<T>
): Promise<T> {
  const db = createDatabase(ctx.config.databaseUrl);
  try {
    await migrateToLatest(db, { log: (msg) => ctx.log.info(msg) });
    return await work(db);
  } finally {
    await db.destroy();
  }
}

/** Command boundary: report the error and set a failing exit code. */
export async function run(action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}
