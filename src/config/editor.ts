import type { LocalizationParams } from "@/types/project";

export type EditorConfig = {
  /** Undo stack depth. */
  maxHistory: number;
  /** Screen radius, in pixels, for single-atom picks. */
  pickPixelTolerance: number;
  /** Default "keep 1 of M" along the perpendicular for the lattice rule. */
  defaultColumnStride: number;
  /** Localization amplitude and decay; the center follows the box. */
  localization: Pick<LocalizationParams, "A" | "beta">;
};

export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = Object.freeze({
  maxHistory: 100,
  pickPixelTolerance: 10,
  defaultColumnStride: 5,
  localization: Object.freeze({ A: 0.05, beta: 1.0 }),
});

function envInt(name: string): number | undefined {
  const raw = typeof process !== "undefined" ? process.env[name] : undefined;
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/** Defaults, then `LATTICE_MAX_HISTORY`, then explicit overrides. */
export function resolveEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  return {
    ...DEFAULT_EDITOR_CONFIG,
    maxHistory: envInt("LATTICE_MAX_HISTORY") ?? DEFAULT_EDITOR_CONFIG.maxHistory,
    ...overrides,
    localization: {
      ...DEFAULT_EDITOR_CONFIG.localization,
      ...overrides.localization,
    },
  };
}
