export { Board, DEFAULT_REPLAY_LABEL } from "./board";
export type { BoardOptions, HintResult } from "./board";
export { Grid } from "./grid";
export {
  TileState,
  emptyTile,
  copyTile,
  withState,
  leftClick,
  rightClick,
  applyClick,
  compareSolutionTile,
} from "./tile";
export type { Tile } from "./tile";
export { computeClues, lineClue, clueLabel } from "./clues";
export type { Clues } from "./clues";
export {
  PuzzleFormatError,
  decodePuzzle,
  encodeBoard,
  encodePuzzle,
} from "./codec";
export type { PuzzleDefinition } from "./codec";
export { solutionPolicy, editorPolicy } from "./policy";
export type { BoardPolicy } from "./policy";
export { SeededRng, MathRandomRng } from "./prng";
export type { Rng } from "./prng";
export {
  ReplayLog,
  ReplayPlayer,
  ReplayIntegrityError,
  verifyReplay,
  replayOnto,
} from "./replay";
export type { ReplayTarget } from "./replay";
export {
  MemoryReplaySink,
  FileReplaySink,
  DatabaseReplaySink,
  replayFileName,
  parseReplayRecord,
  readReplayFile,
  loadReplayFromDatabase,
} from "./sinks";
export type { ReplaySink } from "./sinks";
export { renderBoard, renderStatus } from "./render";
