import { MalformedTemplateError } from "./errors.js";
import {
  type Anchor,
  type AnchorRole,
  type Cell,
  type FloorSpan,
  type Grid,
  type Orientation,
  type Segment,
  type Template,
  type Turn,
  cellAt,
  gridHeight,
  gridWidth,
} from "./util.js";

// Directions in clockwise order: right, down, left, up.
const DR = [0, 1, 0, -1] as const;
const DC = [1, 0, -1, 0] as const;

const TURNS: readonly Turn[] = ["straight", "convex", "convex", "concave"];

type Edge = {
  a: number;
  b: number;
  dir: number;
  length: number;
};

type ProtoAnchor = {
  row: number;
  col: number;
  role: AnchorRole;
};

function hasArm(cell: Cell, dir: number): boolean {
  switch (cell) {
    case "wall-horizontal":
      return dir === 0 || dir === 2;
    case "wall-vertical":
      return dir === 1 || dir === 3;
    case "corner":
    case "ground-anchor":
      return true;
    default:
      return false;
  }
}

function isStructural(cell: Cell): boolean {
  return cell === "corner" || cell === "ground-anchor" || cell === "wall-horizontal" || cell === "wall-vertical";
}

export function connects(grid: Grid, row: number, col: number, dir: number): boolean {
  const there = cellAt(grid, row + DR[dir % 4], col + DC[dir % 4]);
  return hasArm(cellAt(grid, row, col), dir) && hasArm(there, (dir + 2) % 4);
}

function findAnchors(grid: Grid): ProtoAnchor[] {
  const height = gridHeight(grid);
  const out: ProtoAnchor[] = [];
  grid.forEach((cells, row) => {
    cells.forEach((cell, col) => {
      if (!isStructural(cell)) return;
      const conn = [0, 1, 2, 3].filter((d) => connects(grid, row, col, d));
      if (conn.length === 0) {
        throw new MalformedTemplateError("stray wall cell not attached to any structure", { row, col });
      }
      if (cell === "ground-anchor") {
        if (row !== height - 1) {
          throw new MalformedTemplateError("ground anchor above the baseline row", { row, col });
        }
        const vertical = conn.some((d) => d === 1 || d === 3);
        out.push({ row, col, role: vertical ? "ground" : "post" });
      } else if (cell === "corner") {
        out.push({ row, col, role: conn.length >= 3 ? "junction" : "corner" });
      } else if (conn.length === 1) {
        out.push({ row, col, role: "terminal" });
      }
    });
  });
  return out;
}

function traceEdges(grid: Grid, anchors: ProtoAnchor[]): Edge[] {
  const width = gridWidth(grid);
  const byCell = new Map<number, number>();
  anchors.forEach((a, i) => byCell.set(a.row * width + a.col, i));
  const edges: Edge[] = [];
  anchors.forEach((a, i) => {
    for (const dir of [0, 1]) {
      if (!connects(grid, a.row, a.col, dir)) continue;
      let row = a.row + DR[dir];
      let col = a.col + DC[dir];
      let between = 0;
      let b = byCell.get(row * width + col);
      while (b === undefined) {
        between += 1;
        row += DR[dir];
        col += DC[dir];
        b = byCell.get(row * width + col);
      }
      const tips = (a.role === "terminal" ? 1 : 0) + (anchors[b].role === "terminal" ? 1 : 0);
      edges.push({ a: i, b, dir, length: between + tips });
    }
  });
  return edges;
}

/** Peels dead-end chains. Returns, per branch edge, the anchor on its outer (tip) side. */
function peelBranches(anchorCount: number, edges: Edge[]): Map<number, number> {
  const degree = new Array<number>(anchorCount).fill(0);
  const incident: number[][] = Array.from({ length: anchorCount }, () => []);
  edges.forEach((e, i) => {
    degree[e.a] += 1;
    degree[e.b] += 1;
    incident[e.a].push(i);
    incident[e.b].push(i);
  });
  const tipOf = new Map<number, number>();
  const queue = degree.flatMap((d, i) => (d === 1 ? [i] : []));
  for (let leaf = queue.shift(); leaf !== undefined; leaf = queue.shift()) {
    if (degree[leaf] !== 1) continue;
    const ei = incident[leaf].find((i) => !tipOf.has(i));
    if (ei === undefined) continue;
    tipOf.set(ei, leaf);
    const other = edges[ei].a === leaf ? edges[ei].b : edges[ei].a;
    degree[leaf] -= 1;
    degree[other] -= 1;
    if (degree[other] === 1) queue.push(other);
  }
  return tipOf;
}

function components(anchorCount: number, edges: Edge[]): number[][] {
  const parent = Array.from({ length: anchorCount }, (_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };
  for (const e of edges) parent[find(e.a)] = find(e.b);
  const groups = new Map<number, number[]>();
  for (let i = 0; i < anchorCount; i += 1) {
    const root = find(i);
    const g = groups.get(root) ?? [];
    g.push(i);
    groups.set(root, g);
  }
  return Array.from(groups.values());
}

type Walk = {
  anchors: number[];
  edges: number[];
  turns: Map<number, Turn>;
};

/**
 * Walks the outer face of one component clockwise, keeping the outside on the
 * left: at every anchor try a left turn, then straight, right, and back.
 */
function walkOutline(start: number, anchors: ProtoAnchor[], edges: Edge[], alive: (number | undefined)[][]): Walk {
  const walk: Walk = { anchors: [], edges: [], turns: new Map() };
  let cur = start;
  let dir = 0;
  const limit = edges.length * 2 + 4;
  for (let step = 0; step <= limit; step += 1) {
    const ei = alive[cur][dir];
    if (ei === undefined) break;
    walk.anchors.push(cur);
    walk.edges.push(ei);
    const next = edges[ei].a === cur ? edges[ei].b : edges[ei].a;
    let turn = 0;
    for (const t of [3, 0, 1, 2]) {
      if (alive[next][(dir + t) % 4] !== undefined) {
        turn = t;
        break;
      }
    }
    if (!walk.turns.has(next)) walk.turns.set(next, TURNS[turn]);
    cur = next;
    dir = (dir + turn) % 4;
    if (cur === start && dir === 0) return walk;
  }
  const a = anchors[start];
  throw new MalformedTemplateError("outline does not close", { row: a.row, col: a.col });
}

function verticalCover(anchors: readonly Anchor[], segments: readonly Segment[]): Map<string, number> {
  const cover = new Map<string, number>();
  segments.forEach((s, i) => {
    if (s.orientation !== "vertical") return;
    const a = anchors[s.start];
    const b = anchors[s.end];
    for (let row = Math.min(a.row, b.row); row <= Math.max(a.row, b.row); row += 1) {
      const key = `${row},${a.col}`;
      if (!cover.has(key)) cover.set(key, i);
    }
  });
  return cover;
}

function coverFrom(cover: Map<string, number>, row: number, col: number, step: 1 | -1, width: number): number | undefined {
  for (let c = col; c >= 0 && c < width; c += step) {
    const s = cover.get(`${row},${c}`);
    if (s !== undefined) return s;
  }
  return undefined;
}

/** Floor runs per row, each tied to the nearest vertical segments on either side. */
export function attributeFloors(grid: Grid, anchors: readonly Anchor[], segments: readonly Segment[]): FloorSpan[] {
  const cover = verticalCover(anchors, segments);
  const spans: FloorSpan[] = [];
  grid.forEach((cells, row) => {
    let col = 0;
    while (col < cells.length) {
      if (cells[col] !== "floor") {
        col += 1;
        continue;
      }
      const startCol = col;
      while (col < cells.length && cells[col] === "floor") col += 1;
      const endCol = col - 1;
      spans.push({
        row,
        startCol,
        endCol,
        left: coverFrom(cover, row, startCol - 1, -1, cells.length),
        right: coverFrom(cover, row, endCol + 1, 1, cells.length),
      });
    }
  });
  return spans;
}

export function extractTopology(grid: Grid): Template {
  const proto = findAnchors(grid);
  if (proto.length < 3) {
    throw new MalformedTemplateError(`structure has ${proto.length} anchors, at least 3 are needed`);
  }
  const edges = traceEdges(grid, proto);
  const tipOf = peelBranches(proto.length, edges);

  const alive: (number | undefined)[][] = proto.map(() => [undefined, undefined, undefined, undefined]);
  edges.forEach((e, i) => {
    if (tipOf.has(i)) return;
    alive[e.a][e.dir] = i;
    alive[e.b][(e.dir + 2) % 4] = i;
  });
  const isCore = (i: number): boolean => alive[i].some((x) => x !== undefined);

  const walks: Walk[] = [];
  for (const group of components(proto.length, edges)) {
    const core = group.filter(isCore);
    if (core.length === 0) {
      const first = proto[Math.min(...group)];
      throw new MalformedTemplateError("outline does not close", { row: first.row, col: first.col });
    }
    const walk = walkOutline(Math.min(...core), proto, edges, alive);
    const distinct = new Set(walk.anchors).size;
    if (distinct < 3) {
      const a = proto[walk.anchors[0]];
      throw new MalformedTemplateError(`degenerate outline with ${distinct} anchors`, { row: a.row, col: a.col });
    }
    walks.push(walk);
  }
  walks.sort((x, y) => x.anchors[0] - y.anchors[0]);

  const order: number[] = [];
  const newIndex = new Map<number, number>();
  const place = (i: number): void => {
    if (newIndex.has(i)) return;
    newIndex.set(i, order.length);
    order.push(i);
  };
  walks.forEach((w) => w.anchors.forEach(place));
  proto.forEach((_, i) => place(i));
  const idx = (i: number): number => newIndex.get(i) ?? i;

  const turns = new Map<number, Turn>();
  walks.forEach((w) => w.turns.forEach((t, i) => turns.set(i, t)));
  const anchors: Anchor[] = order.map((i) => {
    const p = proto[i];
    const turn = turns.get(i);
    return Object.freeze(turn ? { row: p.row, col: p.col, role: p.role, turn } : { ...p });
  });

  const orientation = (e: Edge): Orientation => (e.dir === 0 ? "horizontal" : "vertical");
  const segments: Segment[] = [];
  const emitted = new Set<number>();
  for (const w of walks) {
    w.edges.forEach((ei, k) => {
      if (emitted.has(ei)) return;
      emitted.add(ei);
      const e = edges[ei];
      const from = w.anchors[k];
      const to = e.a === from ? e.b : e.a;
      segments.push({ orientation: orientation(e), start: idx(from), end: idx(to), length: e.length, branch: false });
    });
  }
  edges.forEach((e, ei) => {
    if (emitted.has(ei)) return;
    const tip = tipOf.get(ei);
    const start = tip === undefined ? e.a : tip === e.a ? e.b : e.a;
    const end = start === e.a ? e.b : e.a;
    segments.push({ orientation: orientation(e), start: idx(start), end: idx(end), length: e.length, branch: tip !== undefined });
  });
  const frozenSegments = segments.map((s) => Object.freeze(s));

  return Object.freeze({
    grid,
    anchors: Object.freeze(anchors),
    segments: Object.freeze(frozenSegments),
    outlines: Object.freeze(walks.map((w) => Object.freeze(w.anchors.map(idx)))),
    floors: Object.freeze(attributeFloors(grid, anchors, frozenSegments).map((f) => Object.freeze(f))),
  });
}
