import fs from "fs";
import { pathToFileURL } from "url";
import { MalformedTemplateError } from "./errors.js";
import { type Cell, type Grid, type Position, asBool, asRecord, freezeGrid } from "./util.js";

export type Glyph = "+" | "-" | "|" | "." | "o" | " ";

export type RawGrid = readonly (readonly Glyph[])[];

type ParseRules = {
  pad_ragged_rows: boolean;
};

const defaultParseRules: ParseRules = {
  pad_ragged_rows: false,
};

const GLYPHS: readonly Glyph[] = ["+", "-", "|", ".", "o", " "];

// Tile numbers of the numeric CSV template format.
const TILE_GLYPHS: readonly Glyph[] = [" ", "o", "-", "|", "+", "."];

const H_BEARING = new Set<Glyph>(["-", "+", "o"]);
const V_BEARING = new Set<Glyph>(["|", "+", "o"]);

function isGlyph(ch: string): ch is Glyph {
  return GLYPHS.some((g) => g === ch);
}

export function mergeParseRules(rules?: unknown): ParseRules {
  const raw = asRecord(asRecord(rules).parse);
  return {
    pad_ragged_rows: asBool(raw.pad_ragged_rows) ?? defaultParseRules.pad_ragged_rows,
  };
}

function splitRows(text: string): string[] {
  const rows = text.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
  while (rows.length > 0 && rows[rows.length - 1].trim() === "") rows.pop();
  return rows;
}

function checkRectangular(rows: readonly unknown[][]): void {
  const width = rows[0]?.length ?? 0;
  rows.forEach((r, i) => {
    if (r.length !== width) {
      throw new MalformedTemplateError(`row has ${r.length} columns, expected ${width}`, {
        row: i,
        col: Math.min(r.length, width),
      });
    }
  });
}

/** Reads template text into raw glyphs, before any neighbour disambiguation. */
export function scanTemplate(text: string, rules?: unknown): RawGrid {
  const cfg = mergeParseRules(rules);
  let lines = splitRows(text);
  if (cfg.pad_ragged_rows) {
    lines = lines.map((l) => l.trimEnd());
    while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    const width = Math.max(0, ...lines.map((l) => l.length));
    lines = lines.map((l) => l.padEnd(width, " "));
  }
  if (lines.length === 0 || lines.every((l) => l.length === 0)) {
    throw new MalformedTemplateError("template is empty");
  }

  const rows = lines.map((line, row) =>
    Array.from(line).map((ch, col) => {
      if (!isGlyph(ch)) {
        throw new MalformedTemplateError(`unrecognized character '${ch}'`, { row, col });
      }
      return ch;
    }),
  );
  checkRectangular(rows);
  return rows;
}

/** Reads the numeric CSV tile format (one record per row) into raw glyphs. */
export function scanCsvTemplate(text: string): RawGrid {
  const lines = splitRows(text);
  if (lines.length === 0) throw new MalformedTemplateError("template is empty");

  const rows = lines.map((line, row) =>
    line.split(",").map((field, col) => {
      const f = field.trim();
      const n = /^\d+$/.test(f) ? Number(f) : NaN;
      const glyph: Glyph | undefined = TILE_GLYPHS[n];
      if (glyph === undefined) {
        throw new MalformedTemplateError(`no tile with number '${f}'`, { row, col });
      }
      return glyph;
    }),
  );
  checkRectangular(rows);
  return rows;
}

function glyphAt(raw: RawGrid, row: number, col: number): Glyph {
  return raw[row]?.[col] ?? " ";
}

/**
 * Classifies one position from the finished raw scan. A `+` becomes a corner
 * when it has a horizontal-wall neighbour left or right and a vertical-wall
 * neighbour above or below; otherwise it continues the wall beside it.
 */
export function classify(position: Position, raw: RawGrid): Cell {
  const { row, col } = position;
  switch (glyphAt(raw, row, col)) {
    case "-":
      return "wall-horizontal";
    case "|":
      return "wall-vertical";
    case ".":
      return "floor";
    case "o":
      return "ground-anchor";
    case " ":
      return "empty";
    case "+": {
      const h = H_BEARING.has(glyphAt(raw, row, col - 1)) || H_BEARING.has(glyphAt(raw, row, col + 1));
      const v = V_BEARING.has(glyphAt(raw, row - 1, col)) || V_BEARING.has(glyphAt(raw, row + 1, col));
      if (h && !v) return "wall-horizontal";
      if (v && !h) return "wall-vertical";
      return "corner";
    }
  }
}

export function classifyGrid(raw: RawGrid): Grid {
  return freezeGrid(raw.map((r, row) => r.map((_, col) => classify({ row, col }, raw))));
}

export function parseTemplate(text: string, rules?: unknown): Grid {
  return classifyGrid(scanTemplate(text, rules));
}

export function parseCsvTemplate(text: string): Grid {
  return classifyGrid(scanCsvTemplate(text));
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/template_parse.js <in.txt|in.csv> <out.json>");
    process.exit(1);
  }
  const text = fs.readFileSync(input, "utf8");
  const grid = input.endsWith(".csv") ? parseCsvTemplate(text) : parseTemplate(text);
  fs.writeFileSync(output, JSON.stringify(grid, null, 2), "utf8");
  const corners = grid.flat().filter((c) => c === "corner").length;
  console.error(`template_parse: ${grid[0]?.length ?? 0}x${grid.length} corners=${corners}`);
}
