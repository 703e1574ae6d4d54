import { DEFAULT_EDITOR_CONFIG } from "@/config/editor";
import { datasetFromColumns } from "@/types/dataset";
import type { Box, ParticleDataset } from "@/types/dataset";
import { SerializationError } from "@/types/errors";
import { MAX_GROUP_ID, UNASSIGNED, createEditHistory } from "@/types/project";
import type {
  Group,
  LocalizationParams,
  ProjectDocument,
  ProjectState,
  Rgba,
  Vec3,
  ViewState,
} from "@/types/project";

export type LoadedProject = {
  state: ProjectState;
  view: ViewState;
};

export function toProjectDocument(state: ProjectState, view: ViewState = {}): ProjectDocument {
  const { dataset } = state;
  return {
    data: {
      ids: [...dataset.ids],
      x: Array.from(dataset.x),
      y: Array.from(dataset.y),
      z: Array.from(dataset.z),
      box: { ...dataset.box },
    },
    assignment: Array.from(state.assignment),
    groups: [...state.groups.values()].map((g) => ({
      gid: g.id,
      name: g.name,
      color: [...g.color],
      direction: [...g.direction],
    })),
    breather: { ...state.localization },
    apply_localizing: state.applyLocalizing,
    preserve_base_selection: state.preserveBaseSelection,
    ui: view,
  };
}

export function serializeProject(state: ProjectState, view: ViewState = {}): string {
  return JSON.stringify(toProjectDocument(state, view), null, 2);
}

// ---------- Reading ----------

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, field: string): Json {
  if (!isRecord(value)) throw new SerializationError("expected an object", field);
  return value;
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SerializationError("expected a number", field);
  }
  return value;
}

function readInteger(value: unknown, field: string): number {
  const n = readNumber(value, field);
  if (!Number.isInteger(n)) throw new SerializationError("expected an integer", field);
  return n;
}

function readNumbers(value: unknown, field: string, length?: number): number[] {
  if (!Array.isArray(value)) throw new SerializationError("expected an array", field);
  if (length !== undefined && value.length !== length) {
    throw new SerializationError(`expected ${length} entries, got ${value.length}`, field);
  }
  return value.map((v, i) => readNumber(v, `${field}[${i}]`));
}

function readBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new SerializationError("expected a boolean", field);
  return value;
}

function readBox(value: unknown): Box {
  const box = readRecord(value, "data.box");
  const get = (key: keyof Box) => readNumber(box[key], `data.box.${key}`);
  return {
    xlo: get("xlo"),
    xhi: get("xhi"),
    ylo: get("ylo"),
    yhi: get("yhi"),
    zlo: box.zlo === undefined ? 0 : get("zlo"),
    zhi: box.zhi === undefined ? 0 : get("zhi"),
  };
}

function readDataset(value: unknown): ParticleDataset {
  const data = readRecord(value, "data");
  const ids = readNumbers(data.ids, "data.ids");
  ids.forEach((id, i) => readInteger(id, `data.ids[${i}]`));
  const n = ids.length;
  const x = readNumbers(data.x, "data.x", n);
  const y = readNumbers(data.y, "data.y", n);
  const z = readNumbers(data.z, "data.z", n);
  for (let i = 1; i < n; i++) {
    if (ids[i] < ids[i - 1]) throw new SerializationError("ids must be sorted ascending", `data.ids[${i}]`);
  }
  return datasetFromColumns(ids, x, y, z, readBox(data.box));
}

function readColor(value: unknown, field: string): Rgba {
  const [r, g, b, a] = readNumbers(value, field, 4).map((c, i) => {
    if (!Number.isInteger(c) || c < 0 || c > 255) {
      throw new SerializationError("color channels must be integers in 0..255", `${field}[${i}]`);
    }
    return c;
  });
  return [r, g, b, a];
}

function readGroups(value: unknown): Group[] {
  if (!Array.isArray(value)) throw new SerializationError("expected an array", "groups");
  const seen = new Set<number>();
  return value.map((raw, i) => {
    const field = `groups[${i}]`;
    const g = readRecord(raw, field);
    const id = readInteger(g.gid, `${field}.gid`);
    if (id <= UNASSIGNED || id > MAX_GROUP_ID) {
      throw new SerializationError(`group ids must be in 1..${MAX_GROUP_ID}`, `${field}.gid`);
    }
    if (seen.has(id)) throw new SerializationError(`duplicate group id ${id}`, `${field}.gid`);
    seen.add(id);
    if (typeof g.name !== "string") throw new SerializationError("expected a string", `${field}.name`);
    const [dx, dy, dz] =
      g.direction === undefined ? [1, 0, 0] : readNumbers(g.direction, `${field}.direction`, 3);
    const direction: Vec3 = [dx, dy, dz];
    return { id, name: g.name, color: readColor(g.color, `${field}.color`), direction };
  });
}

function readLocalization(value: unknown): LocalizationParams {
  const b = readRecord(value, "breather");
  return {
    A: readNumber(b.A, "breather.A"),
    beta: readNumber(b.beta, "breather.beta"),
    x0: readNumber(b.x0, "breather.x0"),
    y0: readNumber(b.y0, "breather.y0"),
  };
}

/**
 * Validate a parsed project document and rebuild the session. Throws
 * `SerializationError` naming the first bad field; nothing is returned
 * partially. The edit history starts empty.
 */
export function fromProjectDocument(
  value: unknown,
  maxHistory: number = DEFAULT_EDITOR_CONFIG.maxHistory,
): LoadedProject {
  const doc = readRecord(value, "document");
  const dataset = readDataset(doc.data);
  const groups = readGroups(doc.groups);
  const known = new Set(groups.map((g) => g.id));

  const labels = readNumbers(doc.assignment, "assignment", dataset.ids.length);
  labels.forEach((gid, i) => {
    if (gid !== UNASSIGNED && !known.has(gid)) {
      throw new SerializationError(`unknown group id ${gid}`, `assignment[${i}]`);
    }
  });

  const view = doc.ui === undefined ? {} : readRecord(doc.ui, "ui");

  const state: ProjectState = {
    dataset,
    assignment: Int32Array.from(labels),
    // document order is the table order
    groups: new Map(groups.map((g): [number, Group] => [g.id, g])),
    history: createEditHistory(maxHistory),
    localization: readLocalization(doc.breather),
    applyLocalizing: readBoolean(doc.apply_localizing, "apply_localizing", true),
    preserveBaseSelection: readBoolean(doc.preserve_base_selection, "preserve_base_selection", true),
    nextGroupId: groups.reduce((max, g) => Math.max(max, g.id), 0),
  };
  return { state, view };
}

export function deserializeProject(text: string, maxHistory?: number): LoadedProject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SerializationError(`not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return fromProjectDocument(parsed, maxHistory);
}
