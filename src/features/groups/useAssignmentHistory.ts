import { useCallback } from "react";
import { useAtomValue, useSetAtom } from "jotai";
import { canRedoAtom, canUndoAtom, redoAtom, undoAtom } from "@/store/project";

/**
 * Undo/redo actions over the group assignment.
 *
 * Usage:
 *   const { undo, redo, canUndo, canRedo } = useAssignmentHistory();
 */
export function useAssignmentHistory() {
  const canUndo = useAtomValue(canUndoAtom);
  const canRedo = useAtomValue(canRedoAtom);
  const runUndo = useSetAtom(undoAtom);
  const runRedo = useSetAtom(redoAtom);

  /** Returns the description of the undone edit, or null. */
  const undo = useCallback(() => runUndo()?.description ?? null, [runUndo]);
  const redo = useCallback(() => runRedo()?.description ?? null, [runRedo]);

  return { undo, redo, canUndo, canRedo };
}
