import {
  ReplayEntry,
  ReplayMove,
  ReplayRecord,
  chainHash,
  hashValue,
  isClickKind,
} from "@picross/core";

export class ReplayIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReplayIntegrityError";
  }
}

/** The board surface playback needs. */
export interface ReplayTarget {
  readonly size: number;
  readonly isSolved: boolean;
  doReplayMove(move: ReplayMove): void;
}

function genesisHash(size: number): string {
  return hashValue({ size });
}

function normalizeEntry(entry: ReplayEntry): ReplayEntry {
  const { kind, column, row } = entry.move;
  return {
    sequence: entry.sequence,
    move: { kind, column, row },
    frame: entry.frame,
    prevHash: entry.prevHash,
  };
}

/**
 * Append-only, frame-stamped record of player moves. Each entry is linked
 * to the previous one through chainHash, rooted at the board size.
 * Undo never removes entries.
 */
export class ReplayLog {
  readonly size: number;
  private entries: ReplayEntry[] = [];
  private currentHash: string;

  constructor(size: number) {
    this.size = size;
    this.currentHash = genesisHash(size);
  }

  addMove(move: ReplayMove, frame: number): ReplayEntry {
    const last = this.entries[this.entries.length - 1];
    if (last && frame < last.frame) {
      throw new RangeError(`Replay frame ${frame} precedes frame ${last.frame}`);
    }

    const entry = normalizeEntry({
      sequence: this.entries.length,
      move,
      frame,
      prevHash: this.currentHash,
    });
    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  get rootHash(): string {
    return this.currentHash;
  }

  getEntries(): ReplayEntry[] {
    return this.entries.map(normalizeEntry);
  }

  toRecord(label: string): ReplayRecord {
    return {
      label,
      size: this.size,
      entries: this.getEntries(),
      rootHash: this.currentHash,
    };
  }
}

/**
 * Recompute the hash chain of a stored replay. Throws ReplayIntegrityError
 * on a broken link, out-of-order entry or root mismatch.
 */
export function verifyReplay(record: ReplayRecord): void {
  let hash = genesisHash(record.size);
  let lastFrame = -Infinity;

  record.entries.forEach((raw, index) => {
    const entry = normalizeEntry(raw);
    if (entry.sequence !== index) {
      throw new ReplayIntegrityError(`entry ${index} has sequence ${entry.sequence}`);
    }
    if (!isClickKind(entry.move.kind)) {
      throw new ReplayIntegrityError(`entry ${index} has unknown move kind "${entry.move.kind}"`);
    }
    if (entry.frame < lastFrame) {
      throw new ReplayIntegrityError(`entry ${index} goes back to frame ${entry.frame}`);
    }
    if (entry.prevHash !== hash) {
      throw new ReplayIntegrityError(`entry ${index} does not link to the previous entry`);
    }
    hash = chainHash(hash, entry);
    lastFrame = entry.frame;
  });

  if (hash !== record.rootHash) {
    throw new ReplayIntegrityError("root hash does not match the recorded moves");
  }
}

/**
 * Frame-driven playback of a recorded session onto a board of the same size.
 */
export class ReplayPlayer {
  private target: ReplayTarget;
  private entries: ReplayEntry[];
  private cursor = 0;

  constructor(target: ReplayTarget, record: ReplayRecord) {
    if (target.size !== record.size) {
      throw new ReplayIntegrityError(
        `replay is for a ${record.size}x${record.size} board, got ${target.size}x${target.size}`
      );
    }
    this.target = target;
    this.entries = record.entries.map(normalizeEntry);
  }

  get position(): number {
    return this.cursor;
  }

  get finished(): boolean {
    return this.cursor >= this.entries.length;
  }

  /** Apply every pending move stamped at or before `frame`. Returns how many were applied. */
  advanceTo(frame: number): number {
    let applied = 0;
    while (!this.finished && this.entries[this.cursor].frame <= frame) {
      this.target.doReplayMove(this.entries[this.cursor].move);
      this.cursor++;
      applied++;
    }
    return applied;
  }

  playAll(): number {
    return this.advanceTo(Infinity);
  }
}

/**
 * Verify and play a whole replay onto `target`. Returns the final solved flag.
 */
export function replayOnto(target: ReplayTarget, record: ReplayRecord): boolean {
  verifyReplay(record);
  new ReplayPlayer(target, record).playAll();
  return target.isSolved;
}
