import { strict as assert } from "assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import {
  DummyDriver,
  Kysely,
  NoResultError,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from "kysely";
import { Database, ReplayRecord, createLogger, hashValue } from "@picross/core";
import { Board } from "./board";
import { ReplayIntegrityError, ReplayLog, ReplayPlayer, replayOnto, verifyReplay } from "./replay";
import {
  DatabaseReplaySink,
  FileReplaySink,
  MemoryReplaySink,
  parseReplayRecord,
  loadReplayFromDatabase,
  readReplayFile,
  replayFileName,
} from "./sinks";

const log = createLogger("replay-test", "fatal");

const SAMPLE = "3\n###\n...\n#.#\n";

function solveWithFrames(board: Board): void {
  board.handleInput(1, 2, "left"); // wrong, fixed below
  board.advanceFrame();
  board.handleInput(0, 0, "left");
  board.handleInput(1, 0, "left");
  board.advanceFrame();
  board.advanceFrame();
  board.handleInput(1, 2, "right"); // filled -> cross
  board.handleInput(2, 0, "left");
  board.advanceFrame();
  board.handleInput(0, 2, "left");
  board.handleInput(2, 2, "left");
}

function tamper(record: ReplayRecord, index: number, column: number): ReplayRecord {
  return {
    ...record,
    entries: record.entries.map((e, i) =>
      i === index ? { ...e, move: { ...e.move, column } } : e
    ),
  };
}

describe("ReplayLog", () => {
  it("numbers entries and chains them from the board size", () => {
    const replay = new ReplayLog(3);
    const first = replay.addMove({ kind: "left", column: 0, row: 1 }, 0);
    const second = replay.addMove({ kind: "right", column: 2, row: 2 }, 4);

    assert.equal(first.sequence, 0);
    assert.equal(first.prevHash, hashValue({ size: 3 }));
    assert.equal(second.sequence, 1);
    assert.notEqual(second.prevHash, first.prevHash);
    assert.notEqual(replay.rootHash, second.prevHash);
    assert.equal(replay.length, 2);
  });

  it("keeps moves from the same frame in order", () => {
    const replay = new ReplayLog(2);
    replay.addMove({ kind: "left", column: 0, row: 0 }, 3);
    replay.addMove({ kind: "right", column: 0, row: 0 }, 3);
    assert.deepEqual(
      replay.getEntries().map((e) => e.move.kind),
      ["left", "right"]
    );
  });

  it("rejects a frame earlier than the last one", () => {
    const replay = new ReplayLog(2);
    replay.addMove({ kind: "left", column: 0, row: 0 }, 5);
    assert.throws(() => replay.addMove({ kind: "left", column: 1, row: 0 }, 4), RangeError);
    assert.equal(replay.length, 1);
  });

  it("returns copies of its entries", () => {
    const replay = new ReplayLog(2);
    replay.addMove({ kind: "left", column: 0, row: 0 }, 0);
    const entries = replay.getEntries();
    entries[0].move.column = 1;
    assert.equal(replay.getEntries()[0].move.column, 0);
  });
});

describe("verifyReplay", () => {
  it("accepts an untouched record", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);
    verifyReplay(board.replayRecord());
  });

  it("detects an edited move", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);
    const record = board.replayRecord();

    assert.throws(() => verifyReplay(tamper(record, 2, 2)), ReplayIntegrityError);
    assert.throws(() => verifyReplay(tamper(record, 6, 0)), /root hash/);
  });

  it("detects dropped and reordered entries", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);
    const record = board.replayRecord();

    const dropped = { ...record, entries: record.entries.slice(1) };
    assert.throws(() => verifyReplay(dropped), /entry 0 has sequence 1/);

    const swapped = { ...record, entries: [record.entries[1], record.entries[0], ...record.entries.slice(2)] };
    assert.throws(() => verifyReplay(swapped), ReplayIntegrityError);
  });

  it("detects a size change", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);
    assert.throws(() => verifyReplay({ ...board.replayRecord(), size: 4 }), /does not link/);
  });
});

describe("ReplayPlayer", () => {
  it("reproduces the final grid and solved flag", () => {
    const sink = new MemoryReplaySink();
    const board = Board.fromText(SAMPLE, { logger: log, replaySink: sink });
    solveWithFrames(board);
    assert.equal(board.isSolved, true);

    const record = sink.latest("replay");
    assert.ok(record);
    assert.equal(record.entries.length, 7);

    const fresh = Board.fromText(SAMPLE, { logger: log });
    assert.equal(replayOnto(fresh, record), true);
    assert.deepStrictEqual(fresh.snapshot(), board.snapshot());
  });

  it("advances by frame", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);
    const record = board.replayRecord();
    assert.deepEqual(
      record.entries.map((e) => e.frame),
      [0, 1, 1, 3, 3, 4, 4]
    );

    const fresh = Board.fromText(SAMPLE, { logger: log });
    const player = new ReplayPlayer(fresh, record);

    assert.equal(player.advanceTo(0), 1);
    assert.equal(fresh.tileAt(1, 2).state, "filled");
    assert.equal(player.advanceTo(2), 2);
    assert.equal(player.advanceTo(2), 0);
    assert.equal(player.position, 3);
    assert.equal(fresh.isSolved, false);

    assert.equal(player.playAll(), 4);
    assert.equal(player.finished, true);
    assert.equal(fresh.isSolved, true);
  });

  it("refuses a board of another size", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    const other = Board.fromText("2\n#.\n.#\n", { logger: log });
    assert.throws(() => new ReplayPlayer(other, board.replayRecord()), ReplayIntegrityError);
  });

  it("does not write a replay while playing one back", () => {
    const board = Board.fromText(SAMPLE, { logger: log });
    solveWithFrames(board);

    const sink = new MemoryReplaySink();
    const fresh = Board.fromText(SAMPLE, { logger: log, replaySink: sink });
    replayOnto(fresh, board.replayRecord());

    assert.equal(sink.records.length, 0);
    assert.equal(fresh.replayRecord().entries.length, 0);
  });
});

describe("Replay sinks", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "picross-replay-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("derives a file name from the label", () => {
    assert.equal(replayFileName("replay test"), "replay_test.replay.json");
    assert.equal(replayFileName("daily/04"), "daily_04.replay.json");
    assert.equal(replayFileName("   "), "replay.replay.json");
  });

  it("writes the replay of a solved board to disk", () => {
    const sink = new FileReplaySink(path.join(dir, "nested"));
    const board = Board.fromText(SAMPLE, { logger: log, replaySink: sink, replayLabel: "replay test" });
    solveWithFrames(board);

    const file = path.join(dir, "nested", "replay_test.replay.json");
    assert.equal(sink.pathFor("replay test"), file);

    const stored = readReplayFile(file);
    assert.deepEqual(stored, board.replayRecord());
    verifyReplay(stored);
    assert.equal(readFileSync(file, "utf-8").endsWith("}\n"), true);
  });

  it("rejects files that are not replays", () => {
    const file = path.join(dir, "bad.json");
    writeFileSync(file, "{ not json", "utf-8");
    assert.throws(() => readReplayFile(file), /is not valid JSON/);

    writeFileSync(file, JSON.stringify({ label: "x", size: 2, rootHash: "0x", entries: [{ move: {} }] }), "utf-8");
    assert.throws(() => readReplayFile(file), /entry 0 is malformed/);
  });

  it("validates the record shape", () => {
    assert.throws(() => parseReplayRecord([]), /not an object/);
    assert.throws(() => parseReplayRecord({ label: "x" }), /missing label, size, entries or rootHash/);
    assert.deepEqual(parseReplayRecord({ label: "x", size: 1, rootHash: "0xab", entries: [] }), {
      label: "x",
      size: 1,
      rootHash: "0xab",
      entries: [],
    });
  });

  it("memory sink stores independent copies", () => {
    const sink = new MemoryReplaySink();
    const board = Board.fromText(SAMPLE, { logger: log, replaySink: sink });
    solveWithFrames(board);

    const saved = sink.latest("replay");
    assert.ok(saved);
    saved.entries[0].move.row = 1;
    assert.equal(sink.records[0].entries[0].move.row, 1);
    assert.equal(board.replayRecord().entries[0].move.row, 2);
    assert.equal(sink.latest("other"), undefined);
  });
});

// Compiles real Postgres queries but answers every one with no rows
function createOfflineDatabase(): Kysely<Database> {
  return new Kysely<Database>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });
}

describe("Database replay sink", () => {
  let db: Kysely<Database>;

  beforeEach(() => {
    db = createOfflineDatabase();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("queues the insert and reports its failure on flush, once", async () => {
    const sink = new DatabaseReplaySink(db, log);
    const board = Board.fromText(SAMPLE, { logger: log, replaySink: sink });

    solveWithFrames(board);
    assert.equal(board.isSolved, true);

    await assert.rejects(sink.flush(), NoResultError);
    await sink.flush();
  });

  it("flushes cleanly when nothing was saved", async () => {
    await new DatabaseReplaySink(db, log).flush();
  });

  it("loads nothing for an unknown label", async () => {
    assert.equal(await loadReplayFromDatabase(db, "missing"), undefined);
  });
});
