import { CellCoord } from "@picross/core";
import { HintOutcome, InputFrame, PuzzleSession } from "@picross/engine";

export type ScriptStep =
  | { type: "left" | "right"; cell: CellCoord }
  | { type: "undo" }
  | { type: "hint" }
  | { type: "wait"; frames: number };

export interface ScriptResult {
  moves: number;
  undos: number;
  hints: HintOutcome[];
  solved: boolean;
  frame: number;
}

const IDLE: InputFrame = { cell: null, primary: false, secondary: false };

function parseCount(raw: string | undefined, token: string): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new Error(`Invalid move "${token}"`);
  }
  return Number(raw);
}

/**
 * Parse a move script. Steps are separated by ";" or newlines:
 *
 *   L <column> <row>   left click
 *   R <column> <row>   right click
 *   U                  undo
 *   H                  hint
 *   W <frames>         idle frames
 */
export function parseScript(text: string): ScriptStep[] {
  const steps: ScriptStep[] = [];

  for (const token of text.split(/[;\n]/).map((t) => t.trim()).filter(Boolean)) {
    const [command, ...args] = token.split(/\s+/);
    switch (command.toUpperCase()) {
      case "L":
      case "R": {
        if (args.length !== 2) throw new Error(`Invalid move "${token}"`);
        const cell = { column: parseCount(args[0], token), row: parseCount(args[1], token) };
        steps.push({ type: command.toUpperCase() === "L" ? "left" : "right", cell });
        break;
      }
      case "U":
        if (args.length !== 0) throw new Error(`Invalid move "${token}"`);
        steps.push({ type: "undo" });
        break;
      case "H":
        if (args.length !== 0) throw new Error(`Invalid move "${token}"`);
        steps.push({ type: "hint" });
        break;
      case "W":
        if (args.length !== 1) throw new Error(`Invalid move "${token}"`);
        steps.push({ type: "wait", frames: parseCount(args[0], token) });
        break;
      default:
        throw new Error(`Invalid move "${token}"`);
    }
  }

  return steps;
}

/** Host frames for one step: a press tick followed by a release tick. */
function framesFor(step: ScriptStep): InputFrame[] {
  switch (step.type) {
    case "left":
      return [{ cell: step.cell, primary: true, secondary: false }, { ...IDLE, cell: step.cell }];
    case "right":
      return [{ cell: step.cell, primary: false, secondary: true }, { ...IDLE, cell: step.cell }];
    case "undo":
      return [{ ...IDLE, undo: true }, IDLE];
    case "hint":
      return [{ ...IDLE, hint: true }, IDLE];
    case "wait":
      return Array.from({ length: step.frames }, () => IDLE);
  }
}

/** Feed a script through the session as if a player were pressing buttons. */
export function runScript(session: PuzzleSession, steps: ScriptStep[]): ScriptResult {
  const board = session.getBoard();
  const result: ScriptResult = { moves: 0, undos: 0, hints: [], solved: board.isSolved, frame: board.frame };

  for (const step of steps) {
    for (const input of framesFor(step)) {
      const tick = session.update(input);
      result.moves += tick.moves;
      if (tick.undone) result.undos++;
      if (tick.hint) result.hints.push(tick.hint);
      result.solved = tick.solved;
      result.frame = tick.frame;
    }
  }

  return result;
}

/**
 * Undo and hints are not recorded, so a replay only reproduces a session
 * made of clicks.
 */
export function replayReproducesSession(result: ScriptResult): boolean {
  return result.undos === 0 && !result.hints.some((hint) => hint.status === "hinted");
}
