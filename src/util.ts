import fs from "fs";

export type Cell = "corner" | "wall-horizontal" | "wall-vertical" | "floor" | "ground-anchor" | "empty";

export type Grid = readonly (readonly Cell[])[];

export type Position = {
  row: number;
  col: number;
};

export type Axis = "width" | "height";

export type Orientation = "horizontal" | "vertical";

export type AnchorRole = "corner" | "junction" | "ground" | "post" | "terminal";

export type Turn = "convex" | "concave" | "straight";

export type Anchor = {
  row: number;
  col: number;
  role: AnchorRole;
  turn?: Turn;
};

export type Segment = {
  orientation: Orientation;
  start: number;
  end: number;
  length: number;
  branch: boolean;
};

export type FloorSpan = {
  row: number;
  startCol: number;
  endCol: number;
  left?: number;
  right?: number;
};

export type Template = {
  grid: Grid;
  anchors: readonly Anchor[];
  segments: readonly Segment[];
  outlines: readonly (readonly number[])[];
  floors: readonly FloorSpan[];
};

export type Point = { x: number; y: number };

export type PathPrimitive = { op: "move"; point: Point } | { op: "line"; point: Point };

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function gridWidth(grid: Grid): number {
  return grid[0]?.length ?? 0;
}

export function gridHeight(grid: Grid): number {
  return grid.length;
}

export function cellAt(grid: Grid, row: number, col: number): Cell {
  return grid[row]?.[col] ?? "empty";
}

export function freezeGrid(rows: Cell[][]): Grid {
  return Object.freeze(rows.map((r) => Object.freeze(r)));
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  return undefined;
}

export function asRecord(v: unknown): Record<string, unknown> {
  if (v !== null && typeof v === "object" && !Array.isArray(v)) return Object.fromEntries(Object.entries(v));
  return {};
}
