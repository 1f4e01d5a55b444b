import fs from 'fs';
import { fileURLToPath } from 'url';
import type { Anchor, Template } from '../../src/util.js';

/** Absolute path of a template shipped under templates/. */
export function templatePath(name: string): string {
  return fileURLToPath(new URL(`../../templates/${name}`, import.meta.url));
}

/** Absolute path of a file under tests/fixtures/. */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./${name}`, import.meta.url));
}

export function readTemplate(name: string): string {
  return fs.readFileSync(templatePath(name), 'utf8');
}

/** Joins rows into template text. */
export function rows(...lines: string[]): string {
  return lines.join('\n');
}

/** The tower as usually written, with short rows. */
export const RAGGED_TOWER = rows(
  '+-------+',
  '|.......|',
  '|.......|',
  '|.......|',
  '|.......+----+',
  '|.......|',
  '|.......|',
  '|.......|',
  'o---o---o',
);

export const TOWER = readTemplate('tower.txt');

export const TOWER_6X7 = rows(
  '+---+ ',
  '|...| ',
  '|...| ',
  '|...+-',
  '|...| ',
  '|...| ',
  'o-o-o ',
);

export const BOX = rows(
  '+--+',
  '|..|',
  '+--+',
);

/** Compact anchor summary: [row, col, role, turn]. */
export function anchorSummary(template: Template): [number, number, Anchor['role'], Anchor['turn']][] {
  return template.anchors.map((a) => [a.row, a.col, a.role, a.turn]);
}

/** Two branches growing toward each other from opposite walls. */
export const FACING_TIPS = rows(
  '+-------+',
  '|.......|',
  '+--...--+',
  '|.......|',
  '+-------+',
);

/** A short wall hanging from the roof. */
export const HANGING_SPUR = rows(
  '+--+--+',
  '|..|..|',
  '|.....|',
  '|.....|',
  '+-----+',
);

/** A short wall rising from the floor. */
export const RISING_SPUR = rows(
  '+-----+',
  '|.....|',
  '|..|..|',
  '+--+--+',
);

/** A ledge reaching into the room from the left wall. */
export const SPUR_IN_ROOM = rows(
  '+-----+',
  '|.....|',
  '+--...|',
  '|.....|',
  '+-----+',
);

/** Two rooms split by a full-height partition. */
export const PARTITIONED = rows(
  '+--+---+',
  '|..|...|',
  '|..|...|',
  '+--+---+',
);

export const L_SHAPE = rows(
  '+-+  ',
  '|.|  ',
  '|.+-+',
  '|...|',
  '+---+',
);

export const TWO_BOXES = rows(
  '+-+ +--+',
  '|.| |..|',
  '+-+ +--+',
);
