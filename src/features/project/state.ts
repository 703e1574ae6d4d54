import { DEFAULT_EDITOR_CONFIG } from "@/config/editor";
import { boxCenter, datasetSize } from "@/types/dataset";
import type { ParticleDataset } from "@/types/dataset";
import { createEditHistory } from "@/types/project";
import type { EditHistory, Group, LocalizationParams, ProjectState } from "@/types/project";

export type ProjectStateOptions = {
  maxHistory?: number;
  localization?: Partial<LocalizationParams>;
  applyLocalizing?: boolean;
  preserveBaseSelection?: boolean;
};

/**
 * Fresh session for a dataset: nothing assigned, no groups, empty history,
 * localization centered on the box unless given.
 */
export function createProjectState(
  dataset: ParticleDataset,
  options: ProjectStateOptions = {},
): ProjectState {
  const [cx, cy] = boxCenter(dataset.box);
  return {
    dataset,
    assignment: new Int32Array(datasetSize(dataset)),
    groups: new Map(),
    history: createEditHistory(options.maxHistory ?? DEFAULT_EDITOR_CONFIG.maxHistory),
    localization: {
      A: DEFAULT_EDITOR_CONFIG.localization.A,
      beta: DEFAULT_EDITOR_CONFIG.localization.beta,
      x0: cx,
      y0: cy,
      ...options.localization,
    },
    applyLocalizing: options.applyLocalizing ?? true,
    preserveBaseSelection: options.preserveBaseSelection ?? true,
    nextGroupId: 0,
  };
}

function cloneGroup(g: Group): Group {
  return { ...g, color: [...g.color], direction: [...g.direction] };
}

function cloneHistory(h: EditHistory): EditHistory {
  return {
    ...h,
    arena: h.arena.map((e) =>
      e ? { ...e, indices: e.indices.slice(), before: e.before.slice(), after: e.after.slice() } : null,
    ),
    freeSlots: [...h.freeSlots],
    undo: [...h.undo],
    redo: [...h.redo],
  };
}

/**
 * Independent copy of the session for consumers outside the store (the
 * exporter, autosave). The dataset is immutable and shared.
 */
export function exportSnapshot(state: ProjectState): ProjectState {
  return {
    ...state,
    assignment: state.assignment.slice(),
    groups: new Map([...state.groups].map(([id, g]): [number, Group] => [id, cloneGroup(g)])),
    history: cloneHistory(state.history),
    localization: { ...state.localization },
  };
}
