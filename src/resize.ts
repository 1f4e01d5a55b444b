import fs from "fs";
import { pathToFileURL } from "url";
import { DegenerateSegmentError, GenerationError, type Result, TooSmallError } from "./errors.js";
import { renderAscii } from "./render_ascii.js";
import { parseTemplate } from "./template_parse.js";
import { attributeFloors, extractTopology } from "./topology.js";
import {
  type Anchor,
  type Axis,
  type Cell,
  type Grid,
  type Segment,
  type Template,
  cellAt,
  freezeGrid,
  gridHeight,
  gridWidth,
} from "./util.js";

export type AxisSpan = {
  /** First source coordinate covered by the span. */
  start: number;
  length: number;
  minimum: number;
  /** First target coordinate. */
  target: number;
  resized: number;
};

export type AxisPlan = {
  axis: Axis;
  source: number;
  target: number;
  /** Source coordinates of fixed rows/columns, ascending. */
  fixed: readonly number[];
  fixedTarget: readonly number[];
  overhead: number;
  minimum: number;
  /** Leading margin, the gaps between fixed coordinates, trailing margin. */
  spans: readonly AxisSpan[];
};

export type ResizedTemplate = Template & {
  source: { width: number; height: number };
  plans: { width: AxisPlan; height: AxisPlan };
};

type Tip = {
  anchor: number;
  coord: number;
  line: number;
  sign: 1 | -1;
};

type LineTips = {
  plus?: Tip;
  minus?: Tip;
};

/**
 * Splits `budget` over spans in proportion to their lengths with an integer
 * error-diffusion fold: the rounding remainder is carried to the next span,
 * lengths are clamped to their minimums, and whatever the clamps add is taken
 * back from the spans at the end of the axis. The result always sums to
 * `budget` when `budget` covers the minimums.
 */
export function distribute(lengths: readonly number[], minimums: readonly number[], budget: number): number[] {
  const total = lengths.reduce((a, b) => a + b, 0);
  const out = lengths.map((_, i) => minimums[i] ?? 0);
  if (out.length === 0) return out;
  if (total === 0) {
    out[0] += budget - out.reduce((a, b) => a + b, 0);
    return out;
  }
  let carry = 0;
  lengths.forEach((len, i) => {
    const exact = len * budget + carry;
    const rounded = Math.floor((2 * exact + total) / (2 * total));
    out[i] = Math.max(out[i], rounded);
    carry = exact - out[i] * total;
  });
  let excess = out.reduce((a, b) => a + b, 0) - budget;
  for (let i = out.length - 1; i >= 0 && excess > 0; i -= 1) {
    const take = Math.min(excess, out[i] - (minimums[i] ?? 0));
    out[i] -= take;
    excess -= take;
  }
  return out;
}

function spanIndexOf(spans: readonly AxisSpan[], coord: number): number {
  return spans.findIndex((s) => coord >= s.start && coord < s.start + s.length);
}

function lineNeed(tips: LineTips, spanIdx: number, span: AxisSpan, lastIdx: number): number {
  const { plus, minus } = tips;
  let need = (plus ? 1 : 0) + (minus ? 1 : 0);
  if (plus && minus) return need + 1;
  const end = span.start + span.length - 1;
  if (plus && spanIdx < lastIdx && end - plus.coord >= 1) need += 1;
  if (minus && spanIdx > 0 && minus.coord - span.start >= 1) need += 1;
  return need;
}

function groupTips(spans: readonly AxisSpan[], tips: readonly Tip[]): Map<number, Map<number, LineTips>> {
  const bySpan = new Map<number, Map<number, LineTips>>();
  for (const tip of tips) {
    const si = spanIndexOf(spans, tip.coord);
    if (si < 0) continue;
    const lines = bySpan.get(si) ?? new Map<number, LineTips>();
    const entry = lines.get(tip.line) ?? {};
    if (tip.sign > 0) entry.plus = tip;
    else entry.minus = tip;
    lines.set(tip.line, entry);
    bySpan.set(si, lines);
  }
  return bySpan;
}

function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x));
}

function placeTips(span: AxisSpan, spanIdx: number, lastIdx: number, tips: LineTips, out: Map<number, number>): void {
  const n = span.resized;
  const scaled = (occupied: number): number => Math.round((occupied * n) / span.length);
  const end = span.start + span.length - 1;
  const { plus, minus } = tips;
  let plusCells = 0;
  if (plus) {
    const occupied = plus.coord - span.start + 1;
    const reserve = minus ? 2 : spanIdx < lastIdx && end - plus.coord >= 1 ? 1 : 0;
    plusCells = clamp(scaled(occupied), 1, n - reserve);
    out.set(plus.anchor, span.target + plusCells - 1);
  }
  if (minus) {
    const occupied = end - minus.coord + 1;
    const reserve = plus ? plusCells + 1 : spanIdx > 0 && minus.coord - span.start >= 1 ? 1 : 0;
    const cells = clamp(scaled(occupied), 1, n - reserve);
    out.set(minus.anchor, span.target + n - cells);
  }
}

function planAxis(
  axis: Axis,
  size: number,
  fixedCoords: readonly number[],
  tips: readonly Tip[],
  target: number,
): { plan: AxisPlan; tipTargets: Map<number, number> } {
  if (!Number.isInteger(target)) {
    throw new GenerationError(`target ${axis} must be an integer, got ${target}`);
  }
  const fixed = Array.from(new Set(fixedCoords)).sort((a, b) => a - b);
  const bounds = [-1, ...fixed, size];
  const spans: AxisSpan[] = [];
  for (let i = 0; i + 1 < bounds.length; i += 1) {
    const start = bounds[i] + 1;
    spans.push({ start, length: bounds[i + 1] - start, minimum: 0, target: 0, resized: 0 });
  }
  const lastIdx = spans.length - 1;
  const tipsBySpan = groupTips(spans, tips);
  spans.forEach((span, i) => {
    const interior = i > 0 && i < lastIdx;
    let minimum = interior && span.length > 0 ? 1 : 0;
    for (const lineTips of tipsBySpan.get(i)?.values() ?? []) {
      minimum = Math.max(minimum, lineNeed(lineTips, i, span, lastIdx));
    }
    span.minimum = minimum;
  });

  const overhead = fixed.length;
  const minimum = overhead + spans.reduce((a, s) => a + s.minimum, 0);
  if (target < minimum) throw new TooSmallError(axis, minimum, target);

  const resized = distribute(
    spans.map((s) => s.length),
    spans.map((s) => s.minimum),
    target - overhead,
  );
  const fixedTarget: number[] = [];
  let cursor = 0;
  spans.forEach((span, i) => {
    span.target = cursor;
    span.resized = resized[i];
    cursor += span.resized;
    if (i < fixed.length) {
      fixedTarget.push(cursor);
      cursor += 1;
    }
  });

  const tipTargets = new Map<number, number>();
  tipsBySpan.forEach((lines, si) => {
    lines.forEach((lineTips) => placeTips(spans[si], si, lastIdx, lineTips, tipTargets));
  });

  return {
    plan: Object.freeze({
      axis,
      source: size,
      target,
      fixed: Object.freeze(fixed),
      fixedTarget: Object.freeze(fixedTarget),
      overhead,
      minimum,
      spans: Object.freeze(spans.map((s) => Object.freeze(s))),
    }),
    tipTargets,
  };
}

/** Maps a source coordinate onto the target axis. */
export function forward(plan: AxisPlan, coord: number): number {
  const fi = plan.fixed.indexOf(coord);
  if (fi >= 0) return plan.fixedTarget[fi];
  const span = plan.spans[spanIndexOf(plan.spans, coord)];
  if (!span || span.resized === 0) return span?.target ?? 0;
  return span.target + Math.floor(((coord - span.start) * span.resized) / span.length);
}

/** Nearest source coordinate for a target coordinate. */
export function backward(plan: AxisPlan, coord: number): number {
  const fi = plan.fixedTarget.indexOf(coord);
  if (fi >= 0) return plan.fixed[fi];
  const span = plan.spans.find((s) => coord >= s.target && coord < s.target + s.resized);
  if (!span) return 0;
  return span.start + Math.floor(((coord - span.target) * span.length) / span.resized);
}

function backgroundOf(grid: Grid, row: number, col: number): Cell {
  const cell = cellAt(grid, row, col);
  switch (cell) {
    case "floor":
    case "empty":
      return cell;
    case "wall-horizontal":
      return cellAt(grid, row - 1, col) === "floor" && cellAt(grid, row + 1, col) === "floor" ? "floor" : "empty";
    case "wall-vertical":
      return cellAt(grid, row, col - 1) === "floor" && cellAt(grid, row, col + 1) === "floor" ? "floor" : "empty";
    default:
      return "empty";
  }
}

function collectTips(template: Template, orientation: Segment["orientation"]): Tip[] {
  const tips: Tip[] = [];
  for (const s of template.segments) {
    const tip = template.anchors[s.end];
    if (!s.branch || s.orientation !== orientation || tip.role !== "terminal") continue;
    const root = template.anchors[s.start];
    if (orientation === "horizontal") {
      tips.push({ anchor: s.end, coord: tip.col, line: tip.row, sign: tip.col > root.col ? 1 : -1 });
    } else {
      tips.push({ anchor: s.end, coord: tip.row, line: tip.col, sign: tip.row > root.row ? 1 : -1 });
    }
  }
  return tips;
}

function segmentLength(s: Segment, anchors: readonly Anchor[]): number {
  const a = anchors[s.start];
  const b = anchors[s.end];
  const span = s.orientation === "horizontal" ? Math.abs(a.col - b.col) : Math.abs(a.row - b.row);
  const tips = (a.role === "terminal" ? 1 : 0) + (b.role === "terminal" ? 1 : 0);
  return span - 1 + tips;
}

/**
 * Resizes a template to exactly `targetWidth` × `targetHeight`, keeping its
 * anchors, connectivity and outline. Fixed rows and columns (those holding a
 * corner, junction or ground anchor) stay one cell wide; the spans between
 * them absorb the change.
 */
export function resize(template: Template, targetWidth: number, targetHeight: number): ResizedTemplate {
  const width = gridWidth(template.grid);
  const height = gridHeight(template.grid);
  const structural = template.anchors.filter((a) => a.role !== "terminal");
  const cols = planAxis(
    "width",
    width,
    structural.map((a) => a.col),
    collectTips(template, "horizontal"),
    targetWidth,
  );
  const rows = planAxis(
    "height",
    height,
    structural.map((a) => a.row),
    collectTips(template, "vertical"),
    targetHeight,
  );

  const anchors: Anchor[] = template.anchors.map((a, i) =>
    Object.freeze({
      ...a,
      row: rows.tipTargets.get(i) ?? forward(rows.plan, a.row),
      col: cols.tipTargets.get(i) ?? forward(cols.plan, a.col),
    }),
  );

  const cells: Cell[][] = [];
  for (let r = 0; r < targetHeight; r += 1) {
    const sr = backward(rows.plan, r);
    const line: Cell[] = [];
    for (let c = 0; c < targetWidth; c += 1) {
      line.push(backgroundOf(template.grid, sr, backward(cols.plan, c)));
    }
    cells.push(line);
  }
  for (const s of template.segments) {
    const a = anchors[s.start];
    const b = anchors[s.end];
    if (s.orientation === "horizontal") {
      for (let c = Math.min(a.col, b.col) + 1; c < Math.max(a.col, b.col); c += 1) cells[a.row][c] = "wall-horizontal";
    } else {
      for (let r = Math.min(a.row, b.row) + 1; r < Math.max(a.row, b.row); r += 1) cells[r][a.col] = "wall-vertical";
    }
  }
  template.anchors.forEach((a, i) => {
    cells[anchors[i].row][anchors[i].col] = cellAt(template.grid, a.row, a.col);
  });

  const segments: Segment[] = template.segments.map((s, i) => {
    const length = segmentLength(s, anchors);
    if (length < Math.min(1, s.length)) throw new DegenerateSegmentError(i, length);
    return Object.freeze({ ...s, length });
  });

  const grid = freezeGrid(cells);
  return Object.freeze({
    grid,
    anchors: Object.freeze(anchors),
    segments: Object.freeze(segments),
    outlines: template.outlines,
    floors: Object.freeze(attributeFloors(grid, anchors, segments).map((f) => Object.freeze(f))),
    source: Object.freeze({ width, height }),
    plans: Object.freeze({ width: cols.plan, height: rows.plan }),
  });
}

export function tryResize(
  template: Template,
  targetWidth: number,
  targetHeight: number,
): Result<ResizedTemplate, GenerationError> {
  try {
    return { ok: true, value: resize(template, targetWidth, targetHeight) };
  } catch (e) {
    if (e instanceof GenerationError) return { ok: false, error: e };
    throw e;
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 5) {
  const input = process.argv[2];
  const w = Number(process.argv[3]);
  const h = Number(process.argv[4]);
  const output = process.argv[5];
  const template = extractTopology(parseTemplate(fs.readFileSync(input, "utf8")));
  const out = resize(template, w, h);
  process.stdout.write(`${renderAscii(out.grid)}\n`);
  if (output) fs.writeFileSync(output, JSON.stringify(out, null, 2), "utf8");
  console.error(
    `resize: ${out.source.width}x${out.source.height} -> ${w}x${h} spans=${out.plans.width.spans.length}/${out.plans.height.spans.length}`,
  );
}
