import { createDataset } from "@/types/dataset";
import type { AtomRecord, Box, ParticleDataset } from "@/types/dataset";
import { ParseError } from "@/types/errors";
import { createLogger } from "@/lib/log";

const log = createLogger("parser");

/**
 * First words of every section header a data file may contain. The Atoms
 * block ends at the first line starting with any of these except "atoms".
 * Multi-word headers ("Pair Coeffs", "Atom Types", ...) are listed by their
 * first word since only the first token is compared.
 */
export const SECTION_KEYWORDS: ReadonlySet<string> = new Set([
  "atoms",
  "bonds",
  "angles",
  "dihedrals",
  "impropers",
  "velocities",
  "masses",
  "pair",
  "bond",
  "angle",
  "dihedral",
  "improper",
  "ellipsoids",
  "lines",
  "triangles",
  "atom",
  "groups",
  "fixes",
]);

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INT_RE = /^[+-]?\d+$/;

/** Finite decimal or exponent literal; `inf`, `nan` and overflowing exponents are rejected. */
export function parseFloatToken(token: string): number | null {
  if (!FLOAT_RE.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/** Digit string that fits a double exactly. */
export function parseIntToken(token: string): number | null {
  if (!INT_RE.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

/** Drop everything after the first `#` and surrounding whitespace. */
export function stripComment(line: string): string {
  const hash = line.indexOf("#");
  return (hash === -1 ? line : line.slice(0, hash)).trim();
}

function tokenize(line: string): string[] {
  const bare = stripComment(line);
  return bare ? bare.split(/\s+/) : [];
}

export function parseBox(lines: readonly string[]): Box {
  let x: [number, number] | null = null;
  let y: [number, number] | null = null;
  let z: [number, number] | null = null;

  for (const raw of lines) {
    const toks = tokenize(raw);
    if (toks.length < 4) continue;
    const lo = parseFloatToken(toks[0]);
    const hi = parseFloatToken(toks[1]);
    if (lo === null || hi === null) continue;
    const label = toks.slice(-2).join(" ").toLowerCase();
    if (label === "xlo xhi") x = [lo, hi];
    else if (label === "ylo yhi") y = [lo, hi];
    else if (label === "zlo zhi") z = [lo, hi];
  }

  if (!x || !y) {
    throw new ParseError("MissingBoxBounds", "Failed to parse x/y box bounds.");
  }
  const [zlo, zhi] = z ?? [0, 0];
  return { xlo: x[0], xhi: x[1], ylo: y[0], yhi: y[1], zlo, zhi };
}

/** Index of the first line opening the given section, or -1. */
export function findSection(lines: readonly string[], keyword: string): number {
  const key = keyword.toLowerCase();
  return lines.findIndex((raw) => stripComment(raw).toLowerCase().startsWith(key));
}

/** Lines after the Atoms header up to (not including) the next section header. */
export function atomsBlock(lines: readonly string[], headerIndex: number): string[] {
  const out: string[] = [];
  for (let i = headerIndex + 1; i < lines.length; i++) {
    const first = tokenize(lines[i])[0]?.toLowerCase();
    if (first !== undefined && first !== "atoms" && SECTION_KEYWORDS.has(first)) break;
    out.push(lines[i]);
  }
  return out;
}

/**
 * `id [extra columns...] x y z`. Atom styles differ in column count, so only
 * the first and the last three tokens are read.
 */
export function parseAtomLine(line: string): AtomRecord | null {
  const toks = tokenize(line);
  if (toks.length < 4) return null;
  const id = parseIntToken(toks[0]);
  const x = parseFloatToken(toks[toks.length - 3]);
  const y = parseFloatToken(toks[toks.length - 2]);
  const z = parseFloatToken(toks[toks.length - 1]);
  if (id === null || x === null || y === null || z === null) return null;
  return { id, x, y, z };
}

export type ParseResult = {
  dataset: ParticleDataset;
  /** Non-blank lines in the Atoms block that did not parse as atoms. */
  skippedLines: number;
};

/**
 * Parse a particle data file. Malformed atom lines are skipped and counted;
 * missing box bounds, a missing Atoms section, or an empty one throw
 * `ParseError`.
 */
export function parseDataFileDetailed(text: string): ParseResult {
  const lines = text.split(/\r?\n/);
  const box = parseBox(lines);

  const header = findSection(lines, "Atoms");
  if (header === -1) {
    throw new ParseError("MissingAtomsSection", "Could not find 'Atoms' section.");
  }

  const records: AtomRecord[] = [];
  let skippedLines = 0;
  for (const raw of atomsBlock(lines, header)) {
    if (!stripComment(raw)) continue;
    const rec = parseAtomLine(raw);
    if (rec) records.push(rec);
    else skippedLines++;
  }

  if (records.length === 0) {
    throw new ParseError("NoAtomsParsed", "Found 'Atoms' section but parsed 0 atoms.");
  }
  if (skippedLines > 0) {
    log.debug(`skipped ${skippedLines} malformed atom line(s)`);
  }
  return { dataset: createDataset(records, box), skippedLines };
}

export function parseDataFile(text: string): ParticleDataset {
  return parseDataFileDetailed(text).dataset;
}
