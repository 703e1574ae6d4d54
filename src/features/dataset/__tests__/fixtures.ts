import { createDataset } from "@/types/dataset";
import type { Box, ParticleDataset } from "@/types/dataset";

export const UNIT_BOX: Box = { xlo: 0, xhi: 10, ylo: 0, yhi: 10, zlo: 0, zhi: 0 };

/** Dataset from [id, x, y] triples (z = 0). */
export function makeDataset(points: [number, number, number][], box: Box = UNIT_BOX): ParticleDataset {
  return createDataset(
    points.map(([id, x, y]) => ({ id, x, y, z: 0 })),
    box,
  );
}

/**
 * cols x rows square lattice with unit spacing starting at (0, 0). Ids run
 * row by row from 1, so index = row * cols + col.
 */
export function gridDataset(cols: number, rows: number): ParticleDataset {
  const points: [number, number, number][] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      points.push([row * cols + col + 1, col, row]);
    }
  }
  return makeDataset(points, { xlo: 0, xhi: cols, ylo: 0, yhi: rows, zlo: 0, zhi: 0 });
}

export const SAMPLE_DATA_FILE = `LAMMPS data file written for tests

4 atoms
1 atom types

0.0 10.0 xlo xhi
-1.0 5.0 ylo yhi
-0.5 0.5 zlo zhi

Masses

1 12.011

Atoms # atomic

3 1 3.0 1.5 0.0
1 1 1.0 2.0 0.0
4 1 1 0.25 4.0 0.1 # trailing comment
2 1 2.0 3.0 0.0

Velocities

1 0.0 0.0 0.0
2 0.0 0.0 0.0
`;
