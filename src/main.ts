#!/usr/bin/env node
import fs from "fs";
import yaml from "js-yaml";
import { fileURLToPath, pathToFileURL } from "url";
import { parseArgs } from "util";
import { generateResult } from "./generate.js";
import { renderSvg } from "./render_svg.js";
import { die, readText, writeText } from "./util.js";

const USAGE =
  "Usage: siege-shaper <template> --width N --height N [--rules rules.yaml] [--svg out.svg] [--json out.json] [--csv]";

function main(argv: string[]): number {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      width: { type: "string", short: "w" },
      height: { type: "string", short: "h" },
      rules: { type: "string" },
      svg: { type: "string" },
      json: { type: "string" },
      csv: { type: "boolean" },
    },
  });
  const [templatePath] = positionals;
  if (!templatePath || values.width === undefined || values.height === undefined) die(USAGE);

  const rules = values.rules ? yaml.load(readText(values.rules)) : undefined;
  const format = values.csv || templatePath.endsWith(".csv") ? "csv" : "ascii";
  const result = generateResult(readText(templatePath), Number(values.width), Number(values.height), format, rules);
  if (!result.ok) {
    console.error(`${result.error.name}: ${result.error.message}`);
    return 1;
  }

  const { template, resized, geometry, ascii } = result.value;
  process.stdout.write(`${ascii}\n`);
  console.error(
    `siege-shaper: ${resized.source.width}x${resized.source.height} -> ${values.width}x${values.height} anchors=${template.anchors.length} outlines=${geometry.length}`,
  );
  if (values.svg) {
    writeText(values.svg, renderSvg(resized, fileURLToPath(new URL("../styles/siege.css", import.meta.url)), rules));
  }
  if (values.json) writeText(values.json, JSON.stringify({ template: resized, geometry }, null, 2));
  return 0;
}

/** Runs the CLI on `argv` (without node and script) and returns the exit status. */
export function run(argv: string[]): number {
  try {
    return main(argv);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

// argv[1] is the bin symlink when installed through npm.
const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  process.exitCode = run(process.argv.slice(2));
}
