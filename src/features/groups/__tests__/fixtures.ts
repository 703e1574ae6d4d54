import { addGroup } from "@/features/groups/assignment";
import { createProjectState } from "@/features/project/state";
import type { ProjectStateOptions } from "@/features/project/state";
import type { ProjectState } from "@/types/project";
import { gridDataset } from "@/features/dataset/__tests__/fixtures";

/** 3x3 grid session with groups 1 ("left") and 2 ("right"). */
export function createStateFixture(options: ProjectStateOptions = {}): ProjectState {
  const state = createProjectState(gridDataset(3, 3), options);
  addGroup(state, 1, "left", [255, 0, 0, 255]);
  addGroup(state, 2, "right", [0, 0, 255, 255]);
  return state;
}
