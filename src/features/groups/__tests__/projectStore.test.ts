import { describe, expect, it, vi, beforeEach } from "vitest";
import { createStore } from "jotai";

const { files } = vi.hoisted(() => ({ files: new Map<string, string>() }));

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(async (path: string) => {
    const text = files.get(path);
    if (text === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    return text;
  }),
  writeFile: vi.fn(async (path: string, data: string) => {
    files.set(path, data);
  }),
  mkdir: vi.fn(async () => undefined),
}));

import {
  activeGroupIdAtom,
  addGroupAtom,
  assignAtom,
  canRedoAtom,
  canUndoAtom,
  gatherViewStateAtom,
  groupColorsAtom,
  openDataFileAtom,
  openDatasetAtom,
  openProjectAtom,
  projectDirtyAtom,
  projectPathAtom,
  projectStateAtom,
  redoAtom,
  removeGroupAtom,
  saveProjectAtom,
  setGroupDirectionAtom,
  setLocalizationAtom,
  setModeFlagsAtom,
  undoAtom,
} from "@/store/project";
import { atomRadiusAtom, circleMaskAtom } from "@/store/selection";
import { AssignmentError, ParseError, SessionError } from "@/types/errors";
import { gridDataset, SAMPLE_DATA_FILE } from "@/features/dataset/__tests__/fixtures";

function storeWithDataset() {
  const store = createStore();
  store.set(openDatasetAtom, gridDataset(3, 3));
  return store;
}

function labels(store: ReturnType<typeof createStore>): number[] {
  const state = store.get(projectStateAtom);
  return state ? Array.from(state.assignment) : [];
}

describe("project store", () => {
  beforeEach(() => {
    files.clear();
  });

  it("starts empty", () => {
    const store = createStore();
    expect(store.get(projectStateAtom)).toBeNull();
    expect(store.get(canUndoAtom)).toBe(false);
    expect(store.get(canRedoAtom)).toBe(false);
    expect(store.set(undoAtom)).toBeNull();
  });

  it("opens a dataset with one active group", () => {
    const store = storeWithDataset();
    const state = store.get(projectStateAtom);
    expect(state?.groups.get(1)?.name).toBe("Group 1");
    expect(store.get(activeGroupIdAtom)).toBe(1);
    expect(store.get(projectDirtyAtom)).toBe(false);
    expect(store.get(groupColorsAtom)).toEqual(new Map([[1, [230, 25, 75, 255]]]));
  });

  it("assigns, undoes and redoes through the store", () => {
    const store = storeWithDataset();
    const edit = store.set(assignAtom, { indices: [0, 4], mode: "add" });
    expect(edit?.description).toBe("add 2 to group 1");
    expect(labels(store)).toEqual([1, 0, 0, 0, 1, 0, 0, 0, 0]);
    expect(store.get(canUndoAtom)).toBe(true);
    expect(store.get(projectDirtyAtom)).toBe(true);

    store.set(undoAtom);
    expect(labels(store)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(store.get(canUndoAtom)).toBe(false);
    expect(store.get(canRedoAtom)).toBe(true);

    store.set(redoAtom);
    expect(labels(store)).toEqual([1, 0, 0, 0, 1, 0, 0, 0, 0]);
  });

  it("ignores empty index sets", () => {
    const store = storeWithDataset();
    expect(store.set(assignAtom, { indices: [], mode: "add" })).toBeNull();
    expect(store.get(canUndoAtom)).toBe(false);
  });

  it("refuses to add without an active group", () => {
    const store = storeWithDataset();
    store.set(activeGroupIdAtom, 0);
    expect(() => store.set(assignAtom, { indices: [0], mode: "add" })).toThrow(AssignmentError);
    expect(labels(store)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("activates new groups and moves off removed ones", () => {
    const store = storeWithDataset();
    const group = store.set(addGroupAtom);
    expect(group.id).toBe(2);
    expect(store.get(activeGroupIdAtom)).toBe(2);

    store.set(assignAtom, { indices: [1], mode: "add" });
    expect(store.set(removeGroupAtom, 2)).toBe(true);
    expect(store.get(activeGroupIdAtom)).toBe(1);
    expect(labels(store)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(store.get(projectStateAtom)?.groups.has(2)).toBe(false);
  });

  it("updates group direction, localization and mode flags", () => {
    const store = storeWithDataset();
    expect(store.set(setGroupDirectionAtom, { groupId: 1, direction: [0, 0, 2] })).toEqual([0, 0, 1]);
    store.set(setLocalizationAtom, { beta: 3 });
    store.set(setModeFlagsAtom, { preserveBaseSelection: false });
    const state = store.get(projectStateAtom);
    expect(state?.localization).toEqual({ A: 0.05, beta: 3, x0: 1.5, y0: 1.5 });
    expect(state?.preserveBaseSelection).toBe(false);
    expect(state?.applyLocalizing).toBe(true);
  });

  it("loads data files", async () => {
    files.set("/d/cell.data", SAMPLE_DATA_FILE);
    const store = createStore();
    await store.set(openDataFileAtom, "/d/cell.data");
    expect(store.get(projectStateAtom)?.dataset.ids).toEqual([1, 2, 3, 4]);
  });

  it("keeps the current session when a data file fails to parse", async () => {
    files.set("/d/broken.data", "no box here\nAtoms\n1 1 0 0 0\n");
    const store = storeWithDataset();
    store.set(assignAtom, { indices: [2], mode: "add" });
    const before = store.get(projectStateAtom);

    await expect(store.set(openDataFileAtom, "/d/broken.data")).rejects.toBeInstanceOf(ParseError);
    expect(store.get(projectStateAtom)).toBe(before);
    expect(labels(store)).toEqual([0, 0, 1, 0, 0, 0, 0, 0, 0]);
  });

  it("saves and reopens a project with its tool state", async () => {
    const store = storeWithDataset();
    store.set(addGroupAtom);
    store.set(assignAtom, { indices: [5, 6], mode: "add" });
    store.set(circleMaskAtom, { enabled: true, center: [1, 1], radius: 2 });
    store.set(atomRadiusAtom, 0.3);
    expect(store.get(gatherViewStateAtom)).toEqual({
      circle_enabled: true,
      circle_center: [1, 1],
      circle_radius: 2,
      atom_radius: 0.3,
      active_group_id: 2,
    });
    await store.set(saveProjectAtom, "/p/s.bpj");
    expect(store.get(projectPathAtom)).toBe("/p/s.bpj");
    expect(store.get(projectDirtyAtom)).toBe(false);

    const other = createStore();
    await other.set(openProjectAtom, "/p/s.bpj");
    expect(labels(other)).toEqual([0, 0, 0, 0, 0, 2, 2, 0, 0]);
    expect(other.get(activeGroupIdAtom)).toBe(2);
    expect(other.get(circleMaskAtom)).toEqual({ enabled: true, center: [1, 1], radius: 2 });
    expect(other.get(atomRadiusAtom)).toBe(0.3);
    expect(other.get(canUndoAtom)).toBe(false);
  });

  it("requires a path to save", async () => {
    const store = storeWithDataset();
    await expect(store.set(saveProjectAtom)).rejects.toThrow("No project path given.");
    await expect(store.set(saveProjectAtom)).rejects.toMatchObject({ code: "NoProjectPath", family: "session" });
  });

  it("refuses edits before a dataset is open", () => {
    const store = createStore();
    expect(() => store.set(addGroupAtom)).toThrow(SessionError);
    expect(() => store.set(addGroupAtom)).toThrow("No dataset loaded.");
  });
});
