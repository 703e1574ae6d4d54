import { atom } from "jotai";
import { NO_MASK } from "@/features/selection/selection";
import type { CircleMask, LineSelection } from "@/features/selection/selection";

export type LineToolSettings = {
  /** Keep 1 of N hits along the line. */
  stride: number;
  offset: number;
};

export type RuleSettings = {
  rowStride: number;
  rowOffset: number;
  colStride: number;
  colOffset: number;
};

export const circleMaskAtom = atom<CircleMask>(NO_MASK);
/** Band half-width / pick radius in data units; 0 means "estimate from the dataset". */
export const atomRadiusAtom = atom(0);
export const lineToolAtom = atom<LineToolSettings>({ stride: 1, offset: 0 });
export const lastLineSelectionAtom = atom<LineSelection | null>(null);
/** Index set produced by the most recent selection tool. */
export const currentSelectionAtom = atom<number[]>([]);
