import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_EDITOR_CONFIG, resolveEditorConfig } from "../editor";

describe("resolveEditorConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("returns the defaults", () => {
    vi.stubEnv("LATTICE_MAX_HISTORY", "");
    expect(resolveEditorConfig()).toEqual({
      maxHistory: 100,
      pickPixelTolerance: 10,
      defaultColumnStride: 5,
      localization: { A: 0.05, beta: 1.0 },
    });
  });

  it("reads the history depth from the environment", () => {
    vi.stubEnv("LATTICE_MAX_HISTORY", "25");
    expect(resolveEditorConfig().maxHistory).toBe(25);
  });

  it("ignores invalid history depths", () => {
    vi.stubEnv("LATTICE_MAX_HISTORY", "-3");
    expect(resolveEditorConfig().maxHistory).toBe(100);
    vi.stubEnv("LATTICE_MAX_HISTORY", "lots");
    expect(resolveEditorConfig().maxHistory).toBe(100);
  });

  it("lets explicit overrides win and merges localization", () => {
    vi.stubEnv("LATTICE_MAX_HISTORY", "25");
    const config = resolveEditorConfig({ maxHistory: 7, localization: { A: 0.2, beta: 1.0 } });
    expect(config.maxHistory).toBe(7);
    expect(config.localization).toEqual({ A: 0.2, beta: 1.0 });
    expect(DEFAULT_EDITOR_CONFIG.localization.A).toBe(0.05);
  });
});
