import { UNASSIGNED } from "@/types/project";
import type { ProjectState } from "@/types/project";

export type IdExportScope = "all" | "active";

export type GroupIds = {
  groupId: number;
  name: string;
  ids: number[];
};

/**
 * Atom ids per group, in group-table order. "active" keeps only the active
 * group; groups without members are left out.
 */
export function selectedIdsByGroup(
  state: ProjectState,
  scope: IdExportScope,
  activeGroupId: number = UNASSIGNED,
): GroupIds[] {
  const members = new Map<number, number[]>();
  state.assignment.forEach((gid, i) => {
    if (gid === UNASSIGNED) return;
    if (scope === "active" && gid !== activeGroupId) return;
    const list = members.get(gid) ?? [];
    list.push(state.dataset.ids[i]);
    members.set(gid, list);
  });

  const out: GroupIds[] = [];
  for (const group of state.groups.values()) {
    const ids = members.get(group.id);
    if (ids && ids.length > 0) out.push({ groupId: group.id, name: group.name, ids });
  }
  return out;
}

const IDS_PER_LINE = 10;

/** `# group <id> <name>` header per group, then ids ten per line. */
export function formatSelectedIds(groups: GroupIds[]): string {
  const lines: string[] = [];
  for (const group of groups) {
    lines.push(`# group ${group.groupId} ${group.name} (${group.ids.length} atoms)`);
    for (let i = 0; i < group.ids.length; i += IDS_PER_LINE) {
      lines.push(group.ids.slice(i, i + IDS_PER_LINE).join(" "));
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
