import { type PipelineError, type Result, attempt } from "./errors.js";
import { emitTemplateGeometry } from "./geometry.js";
import { renderAscii } from "./render_ascii.js";
import { type ResizedTemplate, resize } from "./resize.js";
import { parseCsvTemplate, parseTemplate } from "./template_parse.js";
import { extractTopology } from "./topology.js";
import type { PathPrimitive, Template } from "./util.js";

export type TemplateFormat = "ascii" | "csv";

export type Generation = {
  template: Template;
  resized: ResizedTemplate;
  geometry: PathPrimitive[][];
  ascii: string;
};

export function loadTemplate(text: string, format: TemplateFormat = "ascii", rules?: unknown): Template {
  const grid = format === "csv" ? parseCsvTemplate(text) : parseTemplate(text, rules);
  return extractTopology(grid);
}

/** Runs the whole chain for one template: parse, extract, resize, emit. */
export function generate(
  text: string,
  width: number,
  height: number,
  format: TemplateFormat = "ascii",
  rules?: unknown,
): Generation {
  const template = loadTemplate(text, format, rules);
  const resized = resize(template, width, height);
  return {
    template,
    resized,
    geometry: emitTemplateGeometry(resized),
    ascii: renderAscii(resized.grid),
  };
}

export function generateResult(
  text: string,
  width: number,
  height: number,
  format: TemplateFormat = "ascii",
  rules?: unknown,
): Result<Generation, PipelineError> {
  return attempt(() => generate(text, width, height, format, rules));
}
