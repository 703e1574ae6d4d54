import type { Edit, EditHistory } from "@/types/project";

function store(history: EditHistory, edit: Edit): number {
  const slot = history.freeSlots.pop();
  if (slot === undefined) {
    history.arena.push(edit);
    return history.arena.length - 1;
  }
  history.arena[slot] = edit;
  return slot;
}

function release(history: EditHistory, slot: number) {
  history.arena[slot] = null;
  history.freeSlots.push(slot);
}

function at(history: EditHistory, slot: number): Edit {
  const edit = history.arena[slot];
  if (!edit) throw new Error(`history slot ${slot} is empty`);
  return edit;
}

export function undoDepth(history: EditHistory): number {
  return history.undo.length - history.undoBase;
}

export function redoDepth(history: EditHistory): number {
  return history.redo.length;
}

/**
 * Record a new edit: clears redo and, past `maxHistory`, evicts the oldest
 * undo entry by moving the stack base.
 */
export function pushEdit(history: EditHistory, edit: Edit) {
  for (const slot of history.redo) release(history, slot);
  history.redo.length = 0;

  history.undo.push(store(history, edit));
  while (undoDepth(history) > history.maxHistory) {
    release(history, history.undo[history.undoBase]);
    history.undoBase++;
  }
  // compact once the dead prefix is as long as the live stack
  if (history.undoBase > 0 && history.undoBase >= history.maxHistory) {
    history.undo.splice(0, history.undoBase);
    history.undoBase = 0;
  }
}

/** Move the newest undo entry onto redo and return it. */
export function popUndo(history: EditHistory): Edit | null {
  if (undoDepth(history) === 0) return null;
  const slot = history.undo.pop();
  if (slot === undefined) return null;
  history.redo.push(slot);
  return at(history, slot);
}

export function popRedo(history: EditHistory): Edit | null {
  const slot = history.redo.pop();
  if (slot === undefined) return null;
  history.undo.push(slot);
  return at(history, slot);
}

export function clearHistory(history: EditHistory) {
  history.arena.length = 0;
  history.freeSlots.length = 0;
  history.undo.length = 0;
  history.undoBase = 0;
  history.redo.length = 0;
}

/** Undo entries, oldest first. */
export function undoEntries(history: EditHistory): Edit[] {
  return history.undo.slice(history.undoBase).map((slot) => at(history, slot));
}

/** Redo entries, next-to-redo last. */
export function redoEntries(history: EditHistory): Edit[] {
  return history.redo.map((slot) => at(history, slot));
}
