import type { ParticleDataset } from "@/types/dataset";

export type Vec3 = [number, number, number];
/** 8-bit RGBA. */
export type Rgba = [number, number, number, number];

/** Group id 0 is reserved for "unassigned" and never appears in the table. */
export const UNASSIGNED = 0;
/** Labels live in an Int32Array. */
export const MAX_GROUP_ID = 0x7fffffff;

export type Group = {
  id: number;
  name: string;
  color: Rgba;
  /** Unit displacement direction used by the exporter. */
  direction: Vec3;
};

/** Insertion order matters: project files list groups in table order. */
export type GroupTable = Map<number, Group>;

export type AssignMode = "add" | "remove" | "toggle";

/** One undoable change of the assignment array. */
export type Edit = {
  /** Sorted, unique dataset indices. */
  indices: Int32Array;
  before: Int32Array;
  after: Int32Array;
  description: string;
};

/**
 * Bounded undo/redo log. Edits live in an arena; the two stacks hold arena
 * slots (top of stack at the end). Evicted and discarded slots are recycled.
 */
export type EditHistory = {
  arena: (Edit | null)[];
  freeSlots: number[];
  undo: number[];
  /** Index of the bottom of the undo stack; entries before it are evicted. */
  undoBase: number;
  redo: number[];
  maxHistory: number;
};

/** Amplitude/decay/center of the A / cosh(beta * r) localizing function. */
export type LocalizationParams = {
  A: number;
  beta: number;
  x0: number;
  y0: number;
};

export type ProjectState = {
  dataset: ParticleDataset;
  assignment: Int32Array;
  groups: GroupTable;
  history: EditHistory;
  localization: LocalizationParams;
  applyLocalizing: boolean;
  preserveBaseSelection: boolean;
  /** Highest group id handed out so far. */
  nextGroupId: number;
};

export const DEFAULT_DIRECTION: Vec3 = [1, 0, 0];

export function createEditHistory(maxHistory: number): EditHistory {
  return {
    arena: [],
    freeSlots: [],
    undo: [],
    undoBase: 0,
    redo: [],
    maxHistory: Math.max(1, Math.floor(maxHistory)),
  };
}

/** Caller-owned view/UI state stored alongside the project, never interpreted. */
export type ViewState = Record<string, unknown>;

/** On-disk project file (JSON). Field names are part of the file format. */
export type ProjectDocument = {
  data: {
    ids: number[];
    x: number[];
    y: number[];
    z: number[];
    box: { xlo: number; xhi: number; ylo: number; yhi: number; zlo: number; zhi: number };
  };
  assignment: number[];
  groups: {
    gid: number;
    name: string;
    color: number[];
    direction: number[];
  }[];
  breather: LocalizationParams;
  apply_localizing: boolean;
  preserve_base_selection: boolean;
  ui: ViewState;
};
