import type { ParticleDataset } from "@/types/dataset";

/** "h" is a horizontal line (constant y), "v" a vertical one (constant x). */
export type LineAxis = "h" | "v";

export type CircleMask = {
  enabled: boolean;
  center: [number, number] | null;
  radius: number;
};

export const NO_MASK: CircleMask = { enabled: false, center: null, radius: 0 };

export type LineSelection = {
  axis: LineAxis;
  /** Every hit of the band, sorted along the line. */
  sorted: number[];
  /** Hits kept after periodic decimation, in the same order. */
  kept: number[];
};

export type RuleSelection = {
  anchors: number[];
  /** Sorted, de-duplicated union over all anchors. */
  indices: number[];
};

function maskActive(mask: CircleMask | undefined): mask is CircleMask & { center: [number, number] } {
  return !!mask && mask.enabled && mask.center !== null && mask.radius > 0;
}

/**
 * Closest atom to (x, y) if it lies within `tolerance` (data units).
 * Ties go to the lowest index.
 */
export function nearestAtom(
  dataset: ParticleDataset,
  x: number,
  y: number,
  tolerance: number,
): number | null {
  let best = -1;
  let bestD2 = Infinity;
  for (let i = 0; i < dataset.x.length; i++) {
    const dx = dataset.x[i] - x;
    const dy = dataset.y[i] - y;
    const d2 = dx * dx + dy * dy;
    if (d2 < bestD2) {
      bestD2 = d2;
      best = i;
    }
  }
  if (best === -1) return null;
  return bestD2 <= tolerance * tolerance ? best : null;
}

/** Data-space pick radius for a pixel radius at the given data-per-pixel scales. */
export function pixelToleranceToData(pixelTol: number, scaleX: number, scaleY: number): number {
  return Math.hypot(pixelTol * scaleX, pixelTol * scaleY);
}

export function rectangleSelect(
  dataset: ParticleDataset,
  xmin: number,
  xmax: number,
  ymin: number,
  ymax: number,
): number[] {
  const out: number[] = [];
  for (let i = 0; i < dataset.x.length; i++) {
    const x = dataset.x[i];
    const y = dataset.y[i];
    if (x >= xmin && x <= xmax && y >= ymin && y <= ymax) out.push(i);
  }
  return out;
}

/** Pass-through unless the mask is enabled with a center and positive radius. */
export function circleConstrain(
  dataset: ParticleDataset,
  indices: readonly number[],
  mask: CircleMask | undefined,
): number[] {
  if (!maskActive(mask)) return [...indices];
  const [cx, cy] = mask.center;
  const r2 = mask.radius * mask.radius;
  return indices.filter((i) => {
    const dx = dataset.x[i] - cx;
    const dy = dataset.y[i] - cy;
    return dx * dx + dy * dy <= r2;
  });
}

/** 1 for atoms inside the mask (all ones when the mask is off). */
export function pointsInsideMask(dataset: ParticleDataset, mask: CircleMask | undefined): Uint8Array {
  const n = dataset.x.length;
  const inside = new Uint8Array(n);
  if (!maskActive(mask)) return inside.fill(1);
  const [cx, cy] = mask.center;
  const r2 = mask.radius * mask.radius;
  for (let i = 0; i < n; i++) {
    const dx = dataset.x[i] - cx;
    const dy = dataset.y[i] - cy;
    inside[i] = dx * dx + dy * dy <= r2 ? 1 : 0;
  }
  return inside;
}

/** Keep sorted positions p with p mod stride == offset mod stride. */
export function decimate<T>(sorted: readonly T[], stride: number, offset: number): T[] {
  const n = Math.max(1, Math.floor(stride));
  const off = ((Math.floor(offset) % n) + n) % n;
  return sorted.filter((_, p) => p % n === off);
}

function alongLine(dataset: ParticleDataset, axis: LineAxis): Float64Array {
  return axis === "h" ? dataset.x : dataset.y;
}

function acrossLine(dataset: ParticleDataset, axis: LineAxis): Float64Array {
  return axis === "h" ? dataset.y : dataset.x;
}

/** Stable sort of indices by their coordinate along the line. */
function sortAlong(dataset: ParticleDataset, axis: LineAxis, indices: number[]): number[] {
  const along = alongLine(dataset, axis);
  return [...indices].sort((a, b) => along[a] - along[b]);
}

/**
 * Atoms within `bandHalfWidth` of the line at `coordinate` (y for "h", x for
 * "v"), optionally clipped by a circular mask, sorted along the line, then
 * decimated to one in every `strideN` starting at `offset`.
 */
export function lineSelect(
  dataset: ParticleDataset,
  axis: LineAxis,
  coordinate: number,
  bandHalfWidth: number,
  strideN: number,
  offset: number,
  mask?: CircleMask,
): LineSelection {
  const across = acrossLine(dataset, axis);
  const hits: number[] = [];
  for (let i = 0; i < across.length; i++) {
    if (Math.abs(across[i] - coordinate) <= bandHalfWidth) hits.push(i);
  }
  const sorted = sortAlong(dataset, axis, circleConstrain(dataset, hits, mask));
  return { axis, sorted, kept: decimate(sorted, strideN, offset) };
}

/**
 * Lattice propagation from a previous line pick: decimate the line to anchor
 * rows, then run a perpendicular line pick through every anchor and decimate
 * each of those by the column stride.
 */
export function ruleSelect(
  dataset: ParticleDataset,
  lastLine: Pick<LineSelection, "axis" | "sorted">,
  rowStride: number,
  rowOffset: number,
  colStride: number,
  colOffset: number,
  bandHalfWidth: number,
  mask?: CircleMask,
): RuleSelection {
  const anchors = decimate(sortAlong(dataset, lastLine.axis, lastLine.sorted), rowStride, rowOffset);
  const perpendicular: LineAxis = lastLine.axis === "h" ? "v" : "h";
  // the anchor's coordinate along the old line is the new line's position
  const along = alongLine(dataset, lastLine.axis);

  const picked = new Set<number>();
  for (const anchor of anchors) {
    const { kept } = lineSelect(
      dataset,
      perpendicular,
      along[anchor],
      bandHalfWidth,
      colStride,
      colOffset,
      mask,
    );
    kept.forEach((i) => picked.add(i));
  }
  return { anchors, indices: [...picked].sort((a, b) => a - b) };
}

/** Typical atom diameter from the box area per atom. */
export function estimatePointDiameter(dataset: ParticleDataset): number {
  const { box } = dataset;
  const area = (box.xhi - box.xlo) * (box.yhi - box.ylo);
  const n = Math.max(1, dataset.ids.length);
  return 0.55 * Math.sqrt(area / n);
}

/** Band half-width used when the caller has not set an atom radius. */
export function defaultBandHalfWidth(dataset: ParticleDataset): number {
  return 0.5 * estimatePointDiameter(dataset);
}
