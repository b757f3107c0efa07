/**
 * Per-tile coverage for the fine program.
 *
 * All three modes work from scanline crossings: a sample is inside when the
 * winding of the crossings to its left satisfies the fill rule.
 * - area: 16 sub-rows per pixel, exact horizontal span overlap per sub-row
 * - msaa: 4x4 sample grid per pixel
 * - none: pixel center only
 */

import type { AntialiasingMode } from '../types';
import { TILE_PIXELS, TILE_SIZE } from '../pipeline/layout';

export interface CoverageSegment {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

interface Crossing {
  x: number;
  dir: number;
}

const AREA_SUBROWS = 16;
const MSAA_GRID = 4;

const EVEN_ODD = 1;

function isInside(winding: number, fillRule: number): boolean {
  return fillRule === EVEN_ODD ? (winding & 1) !== 0 : winding !== 0;
}

function crossingsAt(segments: readonly CoverageSegment[], y: number): Crossing[] {
  const crossings: Crossing[] = [];
  for (const seg of segments) {
    if (seg.y0 === seg.y1) continue;
    const top = Math.min(seg.y0, seg.y1);
    const bottom = Math.max(seg.y0, seg.y1);
    if (y < top || y >= bottom) continue;
    const t = (y - seg.y0) / (seg.y1 - seg.y0);
    crossings.push({
      x: seg.x0 + t * (seg.x1 - seg.x0),
      dir: seg.y1 > seg.y0 ? 1 : -1,
    });
  }
  crossings.sort((a, b) => a.x - b.x || a.dir - b.dir);
  return crossings;
}

/**
 * Sample one scanline at `columns` x positions (ascending) and add `weight`
 * to each inside sample's pixel
 */
function sampleRow(
  crossings: readonly Crossing[],
  columns: readonly number[],
  fillRule: number,
  weight: number,
  out: Float32Array,
  rowBase: number,
  pixelOf: (column: number) => number
): void {
  let cursor = 0;
  let winding = 0;
  for (let i = 0; i < columns.length; i++) {
    const sx = columns[i] ?? 0;
    while (cursor < crossings.length && (crossings[cursor]?.x ?? Infinity) < sx) {
      winding += crossings[cursor]?.dir ?? 0;
      cursor++;
    }
    if (isInside(winding, fillRule)) {
      out[rowBase + pixelOf(i)] += weight;
    }
  }
}

function addSpan(
  out: Float32Array,
  rowBase: number,
  originX: number,
  start: number,
  end: number,
  weight: number
): void {
  const from = Math.max(start, originX);
  const to = Math.min(end, originX + TILE_SIZE);
  if (to <= from) return;

  for (let px = Math.floor(from); px < to; px++) {
    const overlap = Math.min(to, px + 1) - Math.max(from, px);
    if (overlap > 0) {
      out[rowBase + (px - originX)] += overlap * weight;
    }
  }
}

function areaCoverage(
  segments: readonly CoverageSegment[],
  originX: number,
  originY: number,
  fillRule: number,
  out: Float32Array
): void {
  const weight = 1 / AREA_SUBROWS;
  for (let row = 0; row < TILE_SIZE; row++) {
    const rowBase = row * TILE_SIZE;
    for (let k = 0; k < AREA_SUBROWS; k++) {
      const y = originY + row + (k + 0.5) / AREA_SUBROWS;
      const crossings = crossingsAt(segments, y);
      let winding = 0;
      for (let i = 0; i < crossings.length; i++) {
        const current = crossings[i];
        if (!current) continue;
        winding += current.dir;
        if (!isInside(winding, fillRule)) continue;
        const end = crossings[i + 1]?.x ?? Infinity;
        addSpan(out, rowBase, originX, current.x, end, weight);
      }
    }
  }
}

const MSAA_COLUMNS = Array.from(
  { length: TILE_SIZE * MSAA_GRID },
  (_, i) => Math.floor(i / MSAA_GRID) + ((i % MSAA_GRID) + 0.5) / MSAA_GRID
);
const CENTER_COLUMNS = Array.from({ length: TILE_SIZE }, (_, i) => i + 0.5);

function msaaCoverage(
  segments: readonly CoverageSegment[],
  originX: number,
  originY: number,
  fillRule: number,
  out: Float32Array
): void {
  const columns = MSAA_COLUMNS.map((x) => x + originX);
  const weight = 1 / (MSAA_GRID * MSAA_GRID);
  for (let row = 0; row < TILE_SIZE; row++) {
    for (let j = 0; j < MSAA_GRID; j++) {
      const y = originY + row + (j + 0.5) / MSAA_GRID;
      sampleRow(crossingsAt(segments, y), columns, fillRule, weight, out, row * TILE_SIZE, (i) =>
        Math.floor(i / MSAA_GRID)
      );
    }
  }
}

function centerCoverage(
  segments: readonly CoverageSegment[],
  originX: number,
  originY: number,
  fillRule: number,
  out: Float32Array
): void {
  const columns = CENTER_COLUMNS.map((x) => x + originX);
  for (let row = 0; row < TILE_SIZE; row++) {
    const y = originY + row + 0.5;
    sampleRow(crossingsAt(segments, y), columns, fillRule, 1, out, row * TILE_SIZE, (i) => i);
  }
}

/**
 * Coverage of each pixel of the tile whose top-left pixel is
 * (`originX`, `originY`), row-major, clamped to [0, 1]
 */
export function computeTileCoverage(
  segments: readonly CoverageSegment[],
  originX: number,
  originY: number,
  fillRule: number,
  mode: AntialiasingMode,
  out: Float32Array = new Float32Array(TILE_PIXELS)
): Float32Array {
  out.fill(0);
  if (segments.length === 0) return out;

  switch (mode) {
    case 'area':
      areaCoverage(segments, originX, originY, fillRule, out);
      break;
    case 'msaa':
      msaaCoverage(segments, originX, originY, fillRule, out);
      break;
    case 'none':
      centerCoverage(segments, originX, originY, fillRule, out);
      break;
  }

  for (let i = 0; i < out.length; i++) {
    const value = out[i] ?? 0;
    if (value > 1) out[i] = 1;
  }
  return out;
}
