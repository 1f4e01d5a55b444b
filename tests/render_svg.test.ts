import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import { mergeRenderRules, pathData, renderSvg } from '../src/render_svg.js';
import { parseTemplate } from '../src/template_parse.js';
import { extractTopology } from '../src/topology.js';
import { TOWER } from './fixtures/helpers.js';

type Attrs = Record<string, string>;
type Layer = {
  id: string;
  'inkscape:groupmode': string;
  path?: Attrs[];
  rect?: Attrs[];
  circle?: Attrs[];
};

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => ['g', 'path', 'rect', 'circle'].includes(name),
});

const tower = extractTopology(parseTemplate(TOWER));

function layers(svg: string): { svg: Attrs; layers: Layer[] } {
  const doc = parser.parse(svg);
  return { svg: doc.svg, layers: doc.svg.g };
}

describe('renderSvg', () => {
  it('sizes the canvas from the grid, cell size and padding', () => {
    const { svg } = layers(renderSvg(tower));

    expect(svg.width).toBe('180');
    expect(svg.height).toBe('130');
    expect(svg.viewBox).toBe('0 0 180 130');
  });

  it('puts floors, walls and anchors on separate layers', () => {
    const { layers: [floor, walls, anchors] } = layers(renderSvg(tower));

    expect([floor.id, walls.id, anchors.id]).toEqual(['layer-floor', 'layer-walls', 'layer-anchors']);
    expect(floor['inkscape:groupmode']).toBe('layer');
  });

  it('draws the outline as one closed path', () => {
    const { layers: [, walls] } = layers(renderSvg(tower));

    expect(walls.path?.map((p) => p.class)).toEqual(['outline', 'wall inner']);
    expect(walls.path?.[0].d).toBe('M25,25 L105,25 L105,65 L105,105 L65,105 L25,105 L25,25 Z');
    expect(walls.path?.[1].d).toBe('M105,65 L155,65');
  });

  it('fills each floor run', () => {
    const { layers: [floor] } = layers(renderSvg(tower));

    expect(floor.rect?.length).toBe(7);
    expect(floor.rect?.[0]).toMatchObject({ x: '30', y: '30', width: '70', height: '10' });
  });

  it('marks grounds with circles and corners with squares', () => {
    const { layers: [, , anchors] } = layers(renderSvg(tower));

    expect(anchors.circle?.map((c) => c.class)).toEqual(['anchor ground', 'anchor post', 'anchor ground']);
    expect(anchors.circle?.[0]).toMatchObject({ 'data-index': '3', cx: '105', cy: '105', r: '3' });
    expect(anchors.rect?.map((r) => r.class)).toEqual([
      'anchor corner convex',
      'anchor corner convex',
      'anchor junction straight',
      'anchor terminal',
    ]);
  });

  it('honours render rules', () => {
    const svg = renderSvg(tower, undefined, { render: { cell_size: 20, padding: 0, show_floor: false } });
    const { svg: root, layers: [floor, walls] } = layers(svg);

    expect(root.width).toBe('280');
    expect(floor.rect).toBeUndefined();
    expect(walls.path?.[0].d).toBe('M10,10 L170,10 L170,90 L170,170 L90,170 L10,170 L10,10 Z');
  });
});

describe('pathData', () => {
  it('leaves open paths unclosed', () => {
    const d = pathData([
      { op: 'move', point: { x: 1, y: 2 } },
      { op: 'line', point: { x: 3, y: 2 } },
    ], 2, 1, false);

    expect(d).toBe('M3,5 L7,5');
  });

  it('writes nothing for an empty path', () => {
    expect(pathData([], 10, 0, true)).toBe('');
  });
});

describe('mergeRenderRules', () => {
  it('fills in defaults and coerces numbers', () => {
    expect(mergeRenderRules({ render: { cell_size: '12' } })).toEqual({
      cell_size: 12,
      padding: 20,
      stroke_width: 2,
      show_floor: true,
      show_anchors: true,
    });
  });
});
