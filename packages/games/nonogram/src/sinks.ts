import { mkdirSync, readFileSync, writeFileSync } from "fs";
import * as path from "path";
import { Kysely } from "kysely";
import {
  Database,
  Logger,
  ReplayEntry,
  ReplayRecord,
  createReplay,
  findMovesByReplayId,
  findReplayByLabel,
  isClickKind,
} from "@picross/core";
import { ReplayIntegrityError } from "./replay";

/**
 * Receives the replay of a solved board. `save` is a synchronous handoff;
 * sinks backed by slow storage queue the write.
 */
export interface ReplaySink {
  save(record: ReplayRecord): void;
}

function cloneRecord(record: ReplayRecord): ReplayRecord {
  return {
    label: record.label,
    size: record.size,
    rootHash: record.rootHash,
    entries: record.entries.map((e) => ({ ...e, move: { ...e.move } })),
  };
}

export class MemoryReplaySink implements ReplaySink {
  readonly records: ReplayRecord[] = [];

  save(record: ReplayRecord): void {
    this.records.push(cloneRecord(record));
  }

  /** Most recently saved record under `label`. */
  latest(label: string): ReplayRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i].label === label) return this.records[i];
    }
    return undefined;
  }
}

/** File name a label is stored under, e.g. "replay test" -> "replay_test.replay.json". */
export function replayFileName(label: string): string {
  const safe = label.trim().replace(/[^A-Za-z0-9._-]+/g, "_") || "replay";
  return `${safe}.replay.json`;
}

/** One JSON file per label in `directory`; a later save overwrites the earlier one. */
export class FileReplaySink implements ReplaySink {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(label: string): string {
    return path.join(this.directory, replayFileName(label));
  }

  save(record: ReplayRecord): void {
    mkdirSync(this.directory, { recursive: true });
    writeFileSync(this.pathFor(record.label), JSON.stringify(record, null, 2) + "\n", "utf-8");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEntry(value: unknown, index: number): ReplayEntry {
  if (!isRecord(value) || !isRecord(value.move)) {
    throw new ReplayIntegrityError(`entry ${index} is not an object`);
  }
  const { sequence, frame, prevHash } = value;
  const { kind, column, row } = value.move;
  if (
    typeof sequence !== "number" ||
    typeof frame !== "number" ||
    typeof prevHash !== "string" ||
    typeof column !== "number" ||
    typeof row !== "number" ||
    !isClickKind(kind)
  ) {
    throw new ReplayIntegrityError(`entry ${index} is malformed`);
  }
  return { sequence, frame, prevHash, move: { kind, column, row } };
}

/** Validate the shape of a decoded replay document. */
export function parseReplayRecord(value: unknown): ReplayRecord {
  if (!isRecord(value)) {
    throw new ReplayIntegrityError("replay is not an object");
  }
  const { label, size, entries, rootHash } = value;
  if (typeof label !== "string" || typeof size !== "number" || typeof rootHash !== "string" || !Array.isArray(entries)) {
    throw new ReplayIntegrityError("replay is missing label, size, entries or rootHash");
  }
  return { label, size, rootHash, entries: entries.map(parseEntry) };
}

export function readReplayFile(filePath: string): ReplayRecord {
  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ReplayIntegrityError(`${filePath} is not valid JSON: ${reason}`);
  }
  return parseReplayRecord(parsed);
}

/**
 * Stores replays in Postgres. Writes are queued on `save`; `flush` waits for
 * them and rethrows the first failure.
 */
export class DatabaseReplaySink implements ReplaySink {
  private db: Kysely<Database>;
  private log: Logger;
  private pending: Promise<void>[] = [];
  private failures: Error[] = [];

  constructor(db: Kysely<Database>, log: Logger) {
    this.db = db;
    this.log = log;
  }

  save(record: ReplayRecord): void {
    const moves = record.entries.map((e) => ({
      sequence: e.sequence,
      kind: e.move.kind,
      tile_column: e.move.column,
      tile_row: e.move.row,
      frame: e.frame,
      prev_hash: e.prevHash,
    }));
    const task = createReplay(
      this.db,
      { label: record.label, size: record.size, root_hash: record.rootHash },
      moves
    ).then(
      (replayId) => {
        this.log.info({ replayId, label: record.label, moves: moves.length }, "Replay stored");
      },
      (err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        this.log.error({ label: record.label, err: error.message }, "Failed to store replay");
        this.failures.push(error);
      }
    );
    this.pending.push(task);
  }

  async flush(): Promise<void> {
    const pending = this.pending;
    this.pending = [];
    await Promise.all(pending);

    const [first] = this.failures;
    this.failures = [];
    if (first) throw first;
  }
}

/** Load the latest replay stored under `label`, or undefined. */
export async function loadReplayFromDatabase(
  db: Kysely<Database>,
  label: string
): Promise<ReplayRecord | undefined> {
  const replay = await findReplayByLabel(db, label);
  if (!replay) return undefined;

  const rows = await findMovesByReplayId(db, replay.id);
  const entries = rows.map((row, index): ReplayEntry => {
    if (!isClickKind(row.kind)) {
      throw new ReplayIntegrityError(`stored move ${index} has unknown kind "${row.kind}"`);
    }
    return {
      sequence: row.sequence,
      frame: row.frame,
      prevHash: row.prev_hash,
      move: { kind: row.kind, column: row.tile_column, row: row.tile_row },
    };
  });

  return { label: replay.label, size: replay.size, rootHash: replay.root_hash, entries };
}
