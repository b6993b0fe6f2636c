import { CellCoord } from "@picross/core";

/** Level-triggered input state sampled once per tick by the host. */
export interface InputFrame {
  /** Cell under the pointer, already clamped to the grid, or null when outside */
  cell: CellCoord | null;
  /** Primary button or its keyboard alias is held */
  primary: boolean;
  /** Secondary button or its keyboard alias is held */
  secondary: boolean;
  undo?: boolean;
  hint?: boolean;
}

/** Buttons that went from released to pressed on this tick. */
export interface InputEdges {
  cell: CellCoord | null;
  left: boolean;
  right: boolean;
  undo: boolean;
  hint: boolean;
}

interface ButtonLevels {
  primary: boolean;
  secondary: boolean;
  undo: boolean;
  hint: boolean;
}

const RELEASED: ButtonLevels = { primary: false, secondary: false, undo: false, hint: false };

/**
 * Edge detector: a held button fires once, on the first frame it is down.
 */
export class InputTracker {
  private previous: ButtonLevels = { ...RELEASED };

  update(frame: InputFrame): InputEdges {
    const current: ButtonLevels = {
      primary: frame.primary,
      secondary: frame.secondary,
      undo: frame.undo ?? false,
      hint: frame.hint ?? false,
    };
    const edges: InputEdges = {
      cell: frame.cell,
      left: current.primary && !this.previous.primary,
      right: current.secondary && !this.previous.secondary,
      undo: current.undo && !this.previous.undo,
      hint: current.hint && !this.previous.hint,
    };
    this.previous = current;
    return edges;
  }

  /** Forget held buttons, e.g. after loading a new puzzle. */
  reset(): void {
    this.previous = { ...RELEASED };
  }
}
