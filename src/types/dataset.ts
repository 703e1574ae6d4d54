/** Simulation cell bounds. z defaults to 0/0 when the data file has no z line. */
export type Box = {
  xlo: number;
  xhi: number;
  ylo: number;
  yhi: number;
  zlo: number;
  zhi: number;
};

/**
 * Parsed particle coordinates. All arrays have the same length and are
 * ordered by ascending id; the value is frozen after construction.
 */
export type ParticleDataset = Readonly<{
  /** Atom ids. Kept as plain numbers since ids can exceed 32 bits. */
  ids: readonly number[];
  x: Float64Array;
  y: Float64Array;
  z: Float64Array;
  box: Readonly<Box>;
}>;

/** Raw record as read from one line of the Atoms block. */
export type AtomRecord = {
  id: number;
  x: number;
  y: number;
  z: number;
};

/**
 * Build a dataset from records. Records are stable-sorted by id, so atoms
 * sharing an id keep their file order.
 */
export function createDataset(records: AtomRecord[], box: Box): ParticleDataset {
  // Array.prototype.sort is stable
  const sorted = [...records].sort((a, b) => a.id - b.id);
  return datasetFromColumns(
    sorted.map((r) => r.id),
    sorted.map((r) => r.x),
    sorted.map((r) => r.y),
    sorted.map((r) => r.z),
    box,
  );
}

export function datasetSize(dataset: ParticleDataset): number {
  return dataset.ids.length;
}

export function boxCenter(box: Box): [number, number] {
  return [0.5 * (box.xlo + box.xhi), 0.5 * (box.ylo + box.yhi)];
}

/** Dataset from columns that are already in id order (e.g. from a project file). */
export function datasetFromColumns(
  ids: number[],
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  z: ArrayLike<number>,
  box: Box,
): ParticleDataset {
  return Object.freeze({
    ids: Object.freeze([...ids]),
    x: Float64Array.from(x),
    y: Float64Array.from(y),
    z: Float64Array.from(z),
    box: Object.freeze({ ...box }),
  });
}
