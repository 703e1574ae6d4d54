import { atom } from "jotai";
import {
  circleConstrain,
  defaultBandHalfWidth,
  lineSelect,
  nearestAtom,
  rectangleSelect,
  ruleSelect,
} from "@/features/selection/selection";
import type { LineAxis } from "@/features/selection/selection";
import { createLogger } from "@/lib/log";
import { SessionError } from "@/types/errors";
import { UNASSIGNED } from "@/types/project";
import type { AssignMode, Edit, ProjectState } from "@/types/project";
import { assignAtom, projectStateAtom } from "@/store/project";
import {
  atomRadiusAtom,
  circleMaskAtom,
  currentSelectionAtom,
  lastLineSelectionAtom,
  lineToolAtom,
} from "@/store/selection";
import type { RuleSettings } from "@/store/selection";

const log = createLogger("tools");

/** Band half-width for line tools: the atom radius, or half the estimated diameter. */
export const bandHalfWidthAtom = atom((get) => {
  const radius = get(atomRadiusAtom);
  if (radius > 0) return radius;
  const state = get(projectStateAtom);
  return state ? defaultBandHalfWidth(state.dataset) : 0;
});

function areaMode(state: ProjectState): AssignMode {
  return state.preserveBaseSelection ? "add" : "toggle";
}

/** Single-atom pick; `tolerance` is already in data units. */
export const pickAtomAtom = atom(
  null,
  (get, set, args: { x: number; y: number; tolerance: number }): Edit | null => {
    const state = get(projectStateAtom);
    if (!state) return null;
    const index = nearestAtom(state.dataset, args.x, args.y, args.tolerance);
    if (index === null) return null;
    if (circleConstrain(state.dataset, [index], get(circleMaskAtom)).length === 0) return null;

    set(currentSelectionAtom, [index]);
    const mode: AssignMode = state.preserveBaseSelection
      ? state.assignment[index] === UNASSIGNED
        ? "add"
        : "remove"
      : "toggle";
    return set(assignAtom, { indices: [index], mode });
  },
);

export const selectRectangleAtom = atom(
  null,
  (get, set, rect: { xmin: number; xmax: number; ymin: number; ymax: number }): Edit | null => {
    const state = get(projectStateAtom);
    if (!state) return null;
    const hits = circleConstrain(
      state.dataset,
      rectangleSelect(state.dataset, rect.xmin, rect.xmax, rect.ymin, rect.ymax),
      get(circleMaskAtom),
    );
    set(currentSelectionAtom, hits);
    return set(assignAtom, { indices: hits, mode: areaMode(state) });
  },
);

export const selectLineAtom = atom(
  null,
  (get, set, args: { axis: LineAxis; coordinate: number }): Edit | null => {
    const state = get(projectStateAtom);
    if (!state) return null;
    const { stride, offset } = get(lineToolAtom);
    const line = lineSelect(
      state.dataset,
      args.axis,
      args.coordinate,
      get(bandHalfWidthAtom),
      stride,
      offset,
      get(circleMaskAtom),
    );
    const label = args.axis === "h" ? `H-line @ y=${args.coordinate.toFixed(6)}` : `V-line @ x=${args.coordinate.toFixed(6)}`;
    if (line.sorted.length === 0) {
      log.info(`${label}: 0 atoms hit.`);
      return null;
    }
    set(lastLineSelectionAtom, line);
    set(currentSelectionAtom, line.kept);
    log.info(`${label}: hit ${line.sorted.length}, kept ${line.kept.length} (N=${stride}, off=${offset}).`);
    return set(assignAtom, { indices: line.kept, mode: areaMode(state) });
  },
);

/** Lattice rule from the last line pick. Always adds to the active group. */
export const applyRuleAtom = atom(null, (get, set, rule: RuleSettings): Edit | null => {
  const state = get(projectStateAtom);
  if (!state) return null;
  const lastLine = get(lastLineSelectionAtom);
  if (!lastLine) throw new SessionError("NoLineSelection", "Select a horizontal or vertical line first.");

  const { anchors, indices } = ruleSelect(
    state.dataset,
    lastLine,
    rule.rowStride,
    rule.rowOffset,
    rule.colStride,
    rule.colOffset,
    get(bandHalfWidthAtom),
    get(circleMaskAtom),
  );
  if (anchors.length === 0) {
    log.info("Rule: no anchors after row stride/offset.");
    return null;
  }
  if (indices.length === 0) {
    log.info("Rule: 0 atoms after perpendicular propagation.");
    return null;
  }
  set(currentSelectionAtom, indices);
  return set(assignAtom, { indices, mode: "add" });
});
