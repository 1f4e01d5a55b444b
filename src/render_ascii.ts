import type { Cell, Grid } from "./util.js";

const GLYPH: Record<Cell, string> = {
  corner: "+",
  "wall-horizontal": "-",
  "wall-vertical": "|",
  floor: ".",
  "ground-anchor": "o",
  empty: " ",
};

export function renderAscii(grid: Grid): string {
  return grid.map((row) => row.map((c) => GLYPH[c]).join("")).join("\n");
}
