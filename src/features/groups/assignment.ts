import { AssignmentError } from "@/types/errors";
import { DEFAULT_DIRECTION, MAX_GROUP_ID, UNASSIGNED } from "@/types/project";
import type { AssignMode, Edit, Group, ProjectState, Rgba, Vec3 } from "@/types/project";
import { clearHistory, popRedo, popUndo, pushEdit, redoDepth, undoDepth } from "@/features/groups/history";
import { DEFAULT_GROUP_COLOR, UNASSIGNED_COLOR, paletteColor } from "@/features/groups/palette";

// ---------- Groups ----------

export function addGroup(
  state: ProjectState,
  id: number,
  name: string,
  color: Rgba = [...DEFAULT_GROUP_COLOR],
): Group {
  if (!Number.isInteger(id) || id <= UNASSIGNED || id > MAX_GROUP_ID) {
    throw new AssignmentError("InvalidGroupId", `Group id must be an integer in 1..${MAX_GROUP_ID}, got ${id}.`);
  }
  if (state.groups.has(id)) {
    throw new AssignmentError("DuplicateGroup", `Group ${id} already exists.`);
  }
  const group: Group = { id, name, color: [...color], direction: [...DEFAULT_DIRECTION] };
  state.groups.set(id, group);
  state.nextGroupId = Math.max(state.nextGroupId, id);
  return group;
}

/** New group with the next counter id, a default name and a palette color. */
export function createNextGroup(state: ProjectState): Group {
  const id = state.nextGroupId + 1;
  return addGroup(state, id, `Group ${id}`, paletteColor(id - 1));
}

/**
 * Delete a group and reset its atoms to unassigned. The reset is a
 * structural change and is not recorded in the edit history.
 */
export function removeGroup(state: ProjectState, id: number): boolean {
  if (!state.groups.delete(id)) return false;
  const { assignment } = state;
  for (let i = 0; i < assignment.length; i++) {
    if (assignment[i] === id) assignment[i] = UNASSIGNED;
  }
  return true;
}

/** Drop every group, unassign every atom and forget the history. */
export function clearGroups(state: ProjectState) {
  state.groups.clear();
  state.assignment.fill(UNASSIGNED);
  clearHistory(state.history);
}

function requireGroup(state: ProjectState, id: number): Group {
  const group = state.groups.get(id);
  if (!group) throw new AssignmentError("UnknownGroup", `No group with id ${id}.`);
  return group;
}

export function setGroupColor(state: ProjectState, id: number, color: Rgba) {
  requireGroup(state, id).color = [...color];
}

export function renameGroup(state: ProjectState, id: number, name: string) {
  requireGroup(state, id).name = name;
}

/** Unit vector along `v`; a zero vector becomes (1, 0, 0). */
export function normalizeDirection(v: Vec3): Vec3 {
  const n = Math.hypot(v[0], v[1], v[2]);
  if (n === 0 || !Number.isFinite(n)) return [...DEFAULT_DIRECTION];
  return [v[0] / n, v[1] / n, v[2] / n];
}

/** In-plane direction for an angle in degrees. */
export function directionFromAngle(degrees: number): Vec3 {
  const rad = (degrees * Math.PI) / 180;
  return [Math.cos(rad), Math.sin(rad), 0];
}

export function directionAngle(direction: Vec3): number {
  return (Math.atan2(direction[1], direction[0]) * 180) / Math.PI;
}

export function setGroupDirection(state: ProjectState, id: number, direction: Vec3): Vec3 {
  const group = requireGroup(state, id);
  group.direction = normalizeDirection(direction);
  return group.direction;
}

// ---------- Assignment ----------

function normalizeIndices(state: ProjectState, indices: Iterable<number>): Int32Array {
  const n = state.assignment.length;
  const unique = [...new Set(indices)].sort((a, b) => a - b);
  for (const i of unique) {
    if (!Number.isInteger(i) || i < 0 || i >= n) {
      throw new AssignmentError("IndexOutOfRange", `Index ${i} is outside 0..${n - 1}.`);
    }
  }
  return Int32Array.from(unique);
}

function nextLabel(mode: AssignMode, current: number, active: number): number {
  switch (mode) {
    case "add":
      return active;
    case "remove":
      return UNASSIGNED;
    case "toggle":
      return current === active ? UNASSIGNED : active;
  }
}

function describeEdit(mode: AssignMode, count: number, active: number): string {
  switch (mode) {
    case "add":
      return `add ${count} to group ${active}`;
    case "remove":
      return `remove ${count}`;
    case "toggle":
      return `toggle ${count} to group ${active}`;
  }
}

/**
 * Relabel `indices` and record the change as one undoable edit.
 *
 * - add: every index gets the active group
 * - remove: every index becomes unassigned
 * - toggle: active-group members become unassigned, the rest join it
 *
 * add and toggle need an active group; otherwise nothing changes and
 * `NoActiveGroup` is thrown.
 */
export function assign(
  state: ProjectState,
  indices: Iterable<number>,
  mode: AssignMode,
  activeGroupId: number,
): Edit {
  if (mode !== "remove" && activeGroupId === UNASSIGNED) {
    throw new AssignmentError("NoActiveGroup", "Please select or create a group first.");
  }
  if (mode !== "remove") requireGroup(state, activeGroupId);

  const idx = normalizeIndices(state, indices);
  const before = new Int32Array(idx.length);
  const after = new Int32Array(idx.length);
  idx.forEach((atom, k) => {
    before[k] = state.assignment[atom];
    after[k] = nextLabel(mode, before[k], activeGroupId);
  });
  idx.forEach((atom, k) => {
    state.assignment[atom] = after[k];
  });

  const edit: Edit = { indices: idx, before, after, description: describeEdit(mode, idx.length, activeGroupId) };
  pushEdit(state.history, edit);
  return edit;
}

function apply(state: ProjectState, indices: Int32Array, values: Int32Array) {
  indices.forEach((atom, k) => {
    state.assignment[atom] = values[k];
  });
}

export function undo(state: ProjectState): Edit | null {
  const edit = popUndo(state.history);
  if (edit) apply(state, edit.indices, edit.before);
  return edit;
}

export function redo(state: ProjectState): Edit | null {
  const edit = popRedo(state.history);
  if (edit) apply(state, edit.indices, edit.after);
  return edit;
}

export function canUndo(state: ProjectState): boolean {
  return undoDepth(state.history) > 0;
}

export function canRedo(state: ProjectState): boolean {
  return redoDepth(state.history) > 0;
}

// ---------- Read-only views ----------

export function assignedGroupOf(state: ProjectState, index: number): number {
  return state.assignment[index] ?? UNASSIGNED;
}

/** Dataset indices currently labeled with `groupId`, ascending. */
export function groupMembers(state: ProjectState, groupId: number): number[] {
  const out: number[] = [];
  state.assignment.forEach((g, i) => {
    if (g === groupId) out.push(i);
  });
  return out;
}

export function allGroupColors(state: ProjectState): Map<number, Rgba> {
  const out = new Map<number, Rgba>();
  for (const [id, g] of state.groups) out.set(id, [...g.color]);
  return out;
}

/** Flat RGBA per atom; unassigned atoms and unknown labels get `unassigned`. */
export function colorsForAll(
  state: ProjectState,
  unassigned: Readonly<Rgba> = UNASSIGNED_COLOR,
): Uint8Array {
  const out = new Uint8Array(state.assignment.length * 4);
  state.assignment.forEach((gid, i) => {
    const color = state.groups.get(gid)?.color ?? unassigned;
    out.set(color, i * 4);
  });
  return out;
}
