export { PuzzleSession } from "./PuzzleSession";
export type { SessionTick } from "./PuzzleSession";
export { InputTracker } from "./InputTracker";
export type { InputFrame, InputEdges } from "./InputTracker";
export type { IPuzzleBoard, HintOutcome } from "./interfaces/IPuzzleBoard";
