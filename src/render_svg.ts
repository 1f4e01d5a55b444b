import fs from "fs";
import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { cellCentre, emitTemplateGeometry, innerWallPaths } from "./geometry.js";
import { parseTemplate } from "./template_parse.js";
import { extractTopology } from "./topology.js";
import { type Anchor, type PathPrimitive, type Template, asBool, asNum, asRecord, gridHeight, gridWidth } from "./util.js";

type RenderRules = {
  cell_size: number;
  padding: number;
  stroke_width: number;
  show_floor: boolean;
  show_anchors: boolean;
};

const defaultRenderRules: RenderRules = {
  cell_size: 10,
  padding: 20,
  stroke_width: 2,
  show_floor: true,
  show_anchors: true,
};

export function mergeRenderRules(rules?: unknown): RenderRules {
  const raw = asRecord(asRecord(rules).render);
  return {
    cell_size: asNum(raw.cell_size) ?? defaultRenderRules.cell_size,
    padding: asNum(raw.padding) ?? defaultRenderRules.padding,
    stroke_width: asNum(raw.stroke_width) ?? defaultRenderRules.stroke_width,
    show_floor: asBool(raw.show_floor) ?? defaultRenderRules.show_floor,
    show_anchors: asBool(raw.show_anchors) ?? defaultRenderRules.show_anchors,
  };
}

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** SVG path data for one primitive list, scaled from grid units and shifted by `offset`. */
export function pathData(prims: readonly PathPrimitive[], scale: number, offset: number, close: boolean): string {
  const d = prims
    .map((p) => `${p.op === "move" ? "M" : "L"}${offset + p.point.x * scale},${offset + p.point.y * scale}`)
    .join(" ");
  return close && d ? `${d} Z` : d;
}

function renderAnchor(a: Anchor, i: number, cfg: RenderRules): string {
  const c = cellCentre(a);
  const x = cfg.padding + c.x * cfg.cell_size;
  const y = cfg.padding + c.y * cfg.cell_size;
  const r = cfg.cell_size * 0.3;
  const turn = a.turn ? ` ${a.turn}` : "";
  if (a.role === "ground" || a.role === "post") {
    return `\n    <circle class="anchor ${a.role}" data-index="${i}" cx="${x}" cy="${y}" r="${r}"/>`;
  }
  return `\n    <rect class="anchor ${a.role}${turn}" data-index="${i}" x="${x - r}" y="${y - r}" width="${2 * r}" height="${2 * r}"/>`;
}

export function renderSvg(template: Template, cssPath?: string, rules?: unknown): string {
  const cfg = mergeRenderRules(rules);
  const scale = cfg.cell_size;
  const pad = cfg.padding;
  const w = pad * 2 + gridWidth(template.grid) * scale;
  const h = pad * 2 + gridHeight(template.grid) * scale;
  const css = cssPath ? fs.readFileSync(cssPath, "utf8") : "";

  const floors = template.floors.map((f) => {
    const x = pad + f.startCol * scale;
    const y = pad + f.row * scale;
    const fw = (f.endCol - f.startCol + 1) * scale;
    return `\n    <rect class="floor" data-row="${f.row}" x="${x}" y="${y}" width="${fw}" height="${scale}"/>`;
  }).join("");

  const outlines = emitTemplateGeometry(template).map((prims, i) => {
    return `\n    <path class="outline" data-outline="${i}" d="${esc(pathData(prims, scale, pad, true))}"/>`;
  }).join("");

  const inner = innerWallPaths(template).map((prims) => {
    return `\n    <path class="wall inner" d="${esc(pathData(prims, scale, pad, false))}"/>`;
  }).join("");

  const anchors = template.anchors.map((a, i) => renderAnchor(a, i, cfg)).join("");

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">\n<style>\n${css}\n.outline, .wall {\n  stroke-width: ${cfg.stroke_width}px;\n}\n</style>\n<g id="layer-floor" class="layer floor" inkscape:groupmode="layer" inkscape:label="floor">${cfg.show_floor ? floors : ""}\n</g>\n<g id="layer-walls" class="layer walls" inkscape:groupmode="layer" inkscape:label="walls">${outlines}${inner}\n</g>\n<g id="layer-anchors" class="layer anchors" inkscape:groupmode="layer" inkscape:label="anchors">${cfg.show_anchors ? anchors : ""}\n</g>\n</svg>`;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const css = process.argv[4];
  const rulesPath = process.argv[5];
  const template = extractTopology(parseTemplate(fs.readFileSync(input, "utf8")));
  const rules = rulesPath ? yaml.load(fs.readFileSync(rulesPath, "utf8")) : undefined;
  const svg = renderSvg(template, css, rules);
  fs.writeFileSync(output, svg, "utf8");
}
