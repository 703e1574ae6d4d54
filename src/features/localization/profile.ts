import type { LocalizationParams } from "@/types/project";

/** A / cosh(beta * r); flat at A when beta is 0. */
export function localizationAmplitude(params: Pick<LocalizationParams, "A" | "beta">, r: number): number {
  if (params.beta === 0) return params.A;
  return params.A / Math.cosh(params.beta * r);
}

/** Amplitude at a point, using the distance to (x0, y0). */
export function localizationAt(params: LocalizationParams, x: number, y: number): number {
  return localizationAmplitude(params, Math.hypot(x - params.x0, y - params.y0));
}

/** `count` evenly spaced samples of the radial profile on [0, rMax], for plotting. */
export function sampleProfile(
  params: Pick<LocalizationParams, "A" | "beta">,
  rMax = 10,
  count = 400,
): { r: number[]; amplitude: number[] } {
  const n = Math.max(2, Math.floor(count));
  const r = Array.from({ length: n }, (_, i) => (rMax * i) / (n - 1));
  return { r, amplitude: r.map((ri) => localizationAmplitude(params, ri)) };
}
