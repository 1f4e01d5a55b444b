import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { run } from '../src/main.js';
import { TOWER_6X7, fixturePath, templatePath } from './fixtures/helpers.js';

describe('siege-shaper CLI', () => {
  let tmp: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'siege-shaper-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      stderr.push(String(msg));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('prints the resized template and exits 0', () => {
    const status = run([templatePath('tower.txt'), '--width', '6', '--height', '7']);

    expect(status).toBe(0);
    expect(stdout.join('')).toBe(`${TOWER_6X7}\n`);
    expect(stderr).toEqual(['siege-shaper: 14x9 -> 6x7 anchors=7 outlines=1']);
  });

  it('writes SVG and JSON when asked', () => {
    const svg = path.join(tmp, 'tower.svg');
    const json = path.join(tmp, 'tower.json');
    const status = run([templatePath('tower.txt'), '-w', '6', '-h', '7', '--svg', svg, '--json', json]);

    expect(status).toBe(0);
    expect(fs.readFileSync(svg, 'utf8').startsWith('<?xml')).toBe(true);
    expect(JSON.parse(fs.readFileSync(json, 'utf8')).template.source).toEqual({ width: 14, height: 9 });
  });

  it('reports a malformed template with its position and exits 1', () => {
    const status = run([fixturePath('broken.txt'), '--width', '6', '--height', '7']);

    expect(status).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(["MalformedTemplate: unrecognized character '#' at row 0, column 2"]);
  });

  it('reports a width below the minimum and exits 1', () => {
    const status = run([templatePath('tower.txt'), '--width', '5', '--height', '7']);

    expect(status).toBe(1);
    expect(stderr).toEqual(['TooSmall: requested width 5 is below the minimum 6']);
  });

  it('prints usage when a size is missing', () => {
    const status = run([templatePath('tower.txt'), '--width', '6']);

    expect(status).toBe(1);
    expect(stderr[0]).toMatch(/^Usage: siege-shaper <template>/);
  });
});
