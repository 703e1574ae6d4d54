import { describe, expect, it } from "vitest";
import {
  clearHistory,
  popRedo,
  popUndo,
  pushEdit,
  redoDepth,
  redoEntries,
  undoDepth,
  undoEntries,
} from "@/features/groups/history";
import { createEditHistory } from "@/types/project";
import type { Edit } from "@/types/project";

function makeEdit(label: string): Edit {
  return {
    indices: Int32Array.from([0]),
    before: Int32Array.from([0]),
    after: Int32Array.from([1]),
    description: label,
  };
}

describe("edit history", () => {
  it("moves edits between the stacks", () => {
    const history = createEditHistory(10);
    pushEdit(history, makeEdit("a"));
    pushEdit(history, makeEdit("b"));

    expect(popUndo(history)?.description).toBe("b");
    expect(undoDepth(history)).toBe(1);
    expect(redoDepth(history)).toBe(1);
    expect(popRedo(history)?.description).toBe("b");
    expect(undoEntries(history).map((e) => e.description)).toEqual(["a", "b"]);
  });

  it("never holds more than maxHistory undo entries", () => {
    const history = createEditHistory(2);
    for (let i = 0; i < 10; i++) {
      pushEdit(history, makeEdit(`e${i}`));
      expect(undoDepth(history)).toBeLessThanOrEqual(2);
    }
    expect(undoEntries(history).map((e) => e.description)).toEqual(["e8", "e9"]);
  });

  it("recycles arena slots of evicted and discarded edits", () => {
    const history = createEditHistory(2);
    for (let i = 0; i < 10; i++) pushEdit(history, makeEdit(`e${i}`));
    expect(history.arena.length).toBe(3);

    popUndo(history);
    pushEdit(history, makeEdit("fresh"));
    expect(redoEntries(history)).toEqual([]);
    expect(history.arena.length).toBe(3);
    expect(undoEntries(history).map((e) => e.description)).toEqual(["e8", "fresh"]);
  });

  it("clamps the depth to at least one", () => {
    expect(createEditHistory(0).maxHistory).toBe(1);
  });

  it("clears everything", () => {
    const history = createEditHistory(5);
    pushEdit(history, makeEdit("a"));
    popUndo(history);
    clearHistory(history);
    expect(undoDepth(history)).toBe(0);
    expect(redoDepth(history)).toBe(0);
    expect(popUndo(history)).toBeNull();
    expect(popRedo(history)).toBeNull();
  });
});
