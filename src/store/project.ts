import { atom } from "jotai";
import type { Getter, Setter } from "jotai";
import { resolveEditorConfig } from "@/config/editor";
import type { EditorConfig } from "@/config/editor";
import { readDataFile } from "@/commands/dataset";
import { loadProject, saveProject } from "@/commands/project";
import {
  addGroup,
  allGroupColors,
  assign,
  canRedo,
  canUndo,
  createNextGroup,
  redo,
  removeGroup,
  setGroupColor,
  setGroupDirection,
  undo,
} from "@/features/groups/assignment";
import { createProjectState } from "@/features/project/state";
import { NO_MASK } from "@/features/selection/selection";
import type { CircleMask } from "@/features/selection/selection";
import { createLogger } from "@/lib/log";
import type { ParticleDataset } from "@/types/dataset";
import { SessionError } from "@/types/errors";
import { UNASSIGNED } from "@/types/project";
import type {
  AssignMode,
  Edit,
  Group,
  LocalizationParams,
  ProjectState,
  Rgba,
  Vec3,
  ViewState,
} from "@/types/project";
import {
  atomRadiusAtom,
  circleMaskAtom,
  currentSelectionAtom,
  lastLineSelectionAtom,
} from "@/store/selection";

const log = createLogger("project");

export const editorConfigAtom = atom<EditorConfig>(resolveEditorConfig());
export const projectStateAtom = atom<ProjectState | null>(null);
/** View/UI state carried through project files untouched. */
export const projectViewAtom = atom<ViewState>({});
export const projectPathAtom = atom<string | null>(null);
export const projectDirtyAtom = atom(false);
export const activeGroupIdAtom = atom<number>(UNASSIGNED);

export const canUndoAtom = atom((get) => {
  const state = get(projectStateAtom);
  return state ? canUndo(state) : false;
});

export const canRedoAtom = atom((get) => {
  const state = get(projectStateAtom);
  return state ? canRedo(state) : false;
});

export const groupColorsAtom = atom((get) => {
  const state = get(projectStateAtom);
  return state ? allGroupColors(state) : new Map<number, Rgba>();
});

function requireState(get: Getter): ProjectState {
  const state = get(projectStateAtom);
  if (!state) throw new SessionError("NoDataset", "No dataset loaded.");
  return state;
}

/** Publish an in-place mutation: new top-level object so readers re-render. */
function commit(set: Setter, state: ProjectState) {
  set(projectStateAtom, { ...state });
  set(projectDirtyAtom, true);
}

function resetTools(set: Setter) {
  set(circleMaskAtom, NO_MASK);
  set(atomRadiusAtom, 0);
  set(lastLineSelectionAtom, null);
  set(currentSelectionAtom, []);
}

// ---------- Loading & saving ----------

/** Start a fresh session on a dataset with one empty, active group. */
export const openDatasetAtom = atom(null, (get, set, dataset: ParticleDataset) => {
  const config = get(editorConfigAtom);
  const state = createProjectState(dataset, {
    maxHistory: config.maxHistory,
    localization: config.localization,
  });
  const first = createNextGroup(state);
  resetTools(set);
  set(projectStateAtom, state);
  set(projectViewAtom, {});
  set(activeGroupIdAtom, first.id);
  set(projectPathAtom, null);
  set(projectDirtyAtom, false);
  log.info(`Loaded dataset with ${dataset.ids.length} atoms.`);
});

/** Parse a data file; the current session is replaced only when parsing succeeds. */
export const openDataFileAtom = atom(null, async (_get, set, path: string) => {
  const { dataset, skippedLines } = await readDataFile(path);
  set(openDatasetAtom, dataset);
  log.info(`Loaded data file: ${path}${skippedLines ? ` (${skippedLines} malformed lines skipped)` : ""}`);
});

function readViewNumber(view: ViewState, key: string): number | undefined {
  const v = view[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function maskFromView(view: ViewState): CircleMask {
  const center = view.circle_center;
  const validCenter =
    Array.isArray(center) &&
    center.length === 2 &&
    typeof center[0] === "number" &&
    typeof center[1] === "number";
  return {
    enabled: view.circle_enabled === true,
    center: validCenter ? [center[0], center[1]] : null,
    radius: readViewNumber(view, "circle_radius") ?? 0,
  };
}

/** Load a project file; on any error the current session is left untouched. */
export const openProjectAtom = atom(null, async (get, set, path: string) => {
  const { state, view } = await loadProject(path, get(editorConfigAtom).maxHistory);
  resetTools(set);
  set(projectStateAtom, state);
  set(projectViewAtom, view);
  set(circleMaskAtom, maskFromView(view));
  set(atomRadiusAtom, readViewNumber(view, "atom_radius") ?? 0);

  const wanted = readViewNumber(view, "active_group_id");
  const fallback = state.groups.keys().next();
  set(
    activeGroupIdAtom,
    wanted !== undefined && state.groups.has(wanted) ? wanted : fallback.done ? UNASSIGNED : fallback.value,
  );
  set(projectPathAtom, path);
  set(projectDirtyAtom, false);
  log.info(`Opened project: ${path}`);
});

/** The view bucket written to project files: caller state plus tool state. */
export const gatherViewStateAtom = atom((get): ViewState => {
  const mask = get(circleMaskAtom);
  return {
    ...get(projectViewAtom),
    circle_enabled: mask.enabled,
    circle_center: mask.center ? [...mask.center] : null,
    circle_radius: mask.radius,
    atom_radius: get(atomRadiusAtom),
    active_group_id: get(activeGroupIdAtom),
  };
});

export const saveProjectAtom = atom(null, async (get, set, path?: string) => {
  const target = path ?? get(projectPathAtom);
  if (!target) throw new SessionError("NoProjectPath", "No project path given.");
  await saveProject(target, requireState(get), get(gatherViewStateAtom));
  set(projectPathAtom, target);
  set(projectDirtyAtom, false);
  log.info(`Saved project: ${target}`);
});

// ---------- Groups ----------

export const addGroupAtom = atom(null, (get, set): Group => {
  const state = requireState(get);
  const group = createNextGroup(state);
  set(activeGroupIdAtom, group.id);
  commit(set, state);
  log.info(`Created group ${group.id}.`);
  return group;
});

export const insertGroupAtom = atom(null, (get, set, group: Pick<Group, "id" | "name" | "color">) => {
  const state = requireState(get);
  const created = addGroup(state, group.id, group.name, group.color);
  commit(set, state);
  return created;
});

export const removeGroupAtom = atom(null, (get, set, groupId: number) => {
  const state = requireState(get);
  if (!removeGroup(state, groupId)) return false;
  if (get(activeGroupIdAtom) === groupId) {
    const next = state.groups.keys().next();
    set(activeGroupIdAtom, next.done ? UNASSIGNED : next.value);
  }
  commit(set, state);
  log.info(`Removed group ${groupId} (atoms reverted to unassigned).`);
  return true;
});

export const setGroupColorAtom = atom(null, (get, set, args: { groupId: number; color: Rgba }) => {
  const state = requireState(get);
  setGroupColor(state, args.groupId, args.color);
  commit(set, state);
});

export const setGroupDirectionAtom = atom(null, (get, set, args: { groupId: number; direction: Vec3 }) => {
  const state = requireState(get);
  const d = setGroupDirection(state, args.groupId, args.direction);
  commit(set, state);
  log.debug(`Direction of group ${args.groupId} = (${d.map((c) => c.toFixed(6)).join(", ")})`);
  return d;
});

export const setLocalizationAtom = atom(null, (get, set, params: Partial<LocalizationParams>) => {
  const state = requireState(get);
  state.localization = { ...state.localization, ...params };
  commit(set, state);
});

export const setModeFlagsAtom = atom(
  null,
  (get, set, flags: Partial<Pick<ProjectState, "applyLocalizing" | "preserveBaseSelection">>) => {
    const state = requireState(get);
    if (flags.applyLocalizing !== undefined) state.applyLocalizing = flags.applyLocalizing;
    if (flags.preserveBaseSelection !== undefined) state.preserveBaseSelection = flags.preserveBaseSelection;
    commit(set, state);
  },
);

// ---------- Assignment & history ----------

/** Relabel indices with the active group. Empty index sets are ignored. */
export const assignAtom = atom(null, (get, set, args: { indices: number[]; mode: AssignMode }): Edit | null => {
  const state = requireState(get);
  if (args.indices.length === 0) return null;
  const edit = assign(state, args.indices, args.mode, get(activeGroupIdAtom));
  commit(set, state);
  log.info(edit.description);
  return edit;
});

export const undoAtom = atom(null, (get, set): Edit | null => {
  const state = get(projectStateAtom);
  if (!state) return null;
  const edit = undo(state);
  if (edit) {
    commit(set, state);
    log.info(`Undo: ${edit.description}`);
  }
  return edit;
});

export const redoAtom = atom(null, (get, set): Edit | null => {
  const state = get(projectStateAtom);
  if (!state) return null;
  const edit = redo(state);
  if (edit) {
    commit(set, state);
    log.info(`Redo: ${edit.description}`);
  }
  return edit;
});
