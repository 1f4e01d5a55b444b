import fs from "fs";
import { pathToFileURL } from "url";
import { parseTemplate } from "./template_parse.js";
import { extractTopology } from "./topology.js";
import type { Grid, PathPrimitive, Point, Position, Template } from "./util.js";

export type Bounds = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export function cellCentre(p: Position): Point {
  return { x: p.col + 0.5, y: p.row + 0.5 };
}

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

function polyline(points: readonly Point[], close: boolean): PathPrimitive[] {
  const out: PathPrimitive[] = [];
  let last: Point | undefined;
  for (const point of points) {
    if (last && samePoint(last, point)) continue;
    out.push(last ? { op: "line", point } : { op: "move", point });
    last = point;
  }
  const first = out[0]?.point;
  if (close && first && last && !samePoint(first, last)) out.push({ op: "line", point: first });
  return out;
}

/** One closed clockwise path per outline, through every outline anchor. */
export function emitTemplateGeometry(template: Template): PathPrimitive[][] {
  return template.outlines.map((outline) =>
    polyline(
      outline.map((i) => cellCentre(template.anchors[i])),
      true,
    ),
  );
}

export function emitGeometry(grid: Grid): PathPrimitive[][] {
  return emitTemplateGeometry(extractTopology(grid));
}

/** Open two-point paths for walls off the outlines: partitions and side branches. */
export function innerWallPaths(template: Template): PathPrimitive[][] {
  const onOutline = new Set<string>();
  for (const outline of template.outlines) {
    outline.forEach((a, k) => {
      const b = outline[(k + 1) % outline.length];
      onOutline.add(`${a},${b}`);
      onOutline.add(`${b},${a}`);
    });
  }
  return template.segments
    .filter((s) => !onOutline.has(`${s.start},${s.end}`))
    .map((s) => polyline([cellCentre(template.anchors[s.start]), cellCentre(template.anchors[s.end])], false));
}

export function geometryBounds(paths: readonly (readonly PathPrimitive[])[]): Bounds | undefined {
  const points = paths.flat().map((p) => p.point);
  if (points.length === 0) return undefined;
  return {
    minX: Math.min(...points.map((p) => p.x)),
    minY: Math.min(...points.map((p) => p.y)),
    maxX: Math.max(...points.map((p) => p.x)),
    maxY: Math.max(...points.map((p) => p.y)),
  };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const paths = emitGeometry(parseTemplate(fs.readFileSync(input, "utf8")));
  fs.writeFileSync(output, JSON.stringify(paths, null, 2), "utf8");
  console.error(`geometry: outlines=${paths.length} primitives=${paths.reduce((a, p) => a + p.length, 0)}`);
}
