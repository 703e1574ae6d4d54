import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { deserializeProject, serializeProject } from "@/features/project/serializer";
import type { LoadedProject } from "@/features/project/serializer";
import { formatSelectedIds, selectedIdsByGroup } from "@/features/project/selectedIds";
import type { IdExportScope } from "@/features/project/selectedIds";
import type { ProjectState, ViewState } from "@/types/project";

export const PROJECT_EXTENSIONS = [".bpj", ".json"] as const;
export const SELECTED_IDS_FILE = "selected_ids.txt";

/** Project files are opened as projects; anything else as a data file. */
export const isProjectPath = (path: string): boolean => {
  const lower = path.toLowerCase();
  return PROJECT_EXTENSIONS.some((ext) => lower.endsWith(ext));
};

export const saveProject = async (
  path: string,
  state: ProjectState,
  view: ViewState = {}
): Promise<void> => {
  await writeFile(path, serializeProject(state, view), "utf-8");
};

export const loadProject = async (
  path: string,
  maxHistory?: number
): Promise<LoadedProject> => {
  const text = await readFile(path, "utf-8");
  return deserializeProject(text, maxHistory);
};

/** Write the selected atom ids into `directory` and return the file path. */
export const exportSelectedIds = async (
  directory: string,
  state: ProjectState,
  scope: IdExportScope,
  activeGroupId?: number
): Promise<string> => {
  await mkdir(directory, { recursive: true });
  const path = join(directory, SELECTED_IDS_FILE);
  const text = formatSelectedIds(selectedIdsByGroup(state, scope, activeGroupId));
  await writeFile(path, text, "utf-8");
  return path;
};
