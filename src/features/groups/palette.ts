import type { Rgba } from "@/types/project";

export const PALETTE: readonly Readonly<Rgba>[] = Object.freeze([
  [230, 25, 75, 255], // red
  [60, 180, 75, 255], // green
  [255, 225, 25, 255], // yellow
  [0, 130, 200, 255], // blue
  [245, 130, 48, 255], // orange
  [145, 30, 180, 255], // purple
  [70, 240, 240, 255], // cyan
  [240, 50, 230, 255], // magenta
  [210, 245, 60, 255], // lime
  [250, 190, 190, 255], // pink
] satisfies Rgba[]);

export const UNASSIGNED_COLOR: Readonly<Rgba> = [160, 160, 160, 255];
export const DEFAULT_GROUP_COLOR: Readonly<Rgba> = [200, 200, 200, 255];

/** Palette entry for a counter; negative counters wrap as well. */
export function paletteColor(counter: number): Rgba {
  const n = PALETTE.length;
  const [r, g, b, a] = PALETTE[((Math.floor(counter) % n) + n) % n];
  return [r, g, b, a];
}

/** Scale the RGB channels (alpha kept), e.g. 0.4 for atoms outside the mask. */
export function dimColor(color: Readonly<Rgba>, factor: number): Rgba {
  const scale = (c: number) => Math.max(0, Math.min(255, Math.floor(c * factor)));
  return [scale(color[0]), scale(color[1]), scale(color[2]), color[3]];
}
