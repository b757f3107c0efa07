/**
 * Fine program: one workgroup per tile. Executes the tile's command list
 * over a premultiplied accumulator seeded with the base color, then stores
 * unpremultiplied 8-bit pixels in the configured format.
 */

import type { AntialiasingMode, WorkgroupCount } from '../types';
import {
  PTCL_HEADER_WORDS,
  PtclCommand,
  TILE_PIXELS,
  TILE_SEGMENT_BYTES,
  TILE_SIZE,
  decodeFrameConfig,
} from '../pipeline/layout';
import { packPixel } from '../utils/pixels';
import { failureFlags } from './bump';
import { computeTileCoverage, type CoverageSegment } from './coverage';
import { readDrawInfo } from './tiling';
import type { CpuBindings, CpuProgram } from './types';

function readSegments(view: DataView, offset: number, count: number): CoverageSegment[] {
  const segments: CoverageSegment[] = [];
  for (let i = 0; i < count; i++) {
    const base = (offset + i) * TILE_SEGMENT_BYTES;
    segments.push({
      x0: view.getFloat32(base, true),
      y0: view.getFloat32(base + 4, true),
      x1: view.getFloat32(base + 8, true),
      y1: view.getFloat32(base + 12, true),
    });
  }
  return segments;
}

function compositeFill(
  dest: Float32Array,
  color: readonly [number, number, number, number],
  coverage: Float32Array
): void {
  for (let p = 0; p < TILE_PIXELS; p++) {
    const c = coverage[p] ?? 0;
    if (c === 0) continue;
    const inv = 1 - color[3] * c;
    const base = p * 4;
    for (let ch = 0; ch < 4; ch++) {
      dest[base + ch] = (color[ch] ?? 0) * c + (dest[base + ch] ?? 0) * inv;
    }
  }
}

function compositeLayer(backdrop: Float32Array, layer: Float32Array, coverage: Float32Array): void {
  for (let p = 0; p < TILE_PIXELS; p++) {
    const c = coverage[p] ?? 0;
    if (c === 0) continue;
    const base = p * 4;
    const inv = 1 - (layer[base + 3] ?? 0) * c;
    for (let ch = 0; ch < 4; ch++) {
      backdrop[base + ch] = (layer[base + ch] ?? 0) * c + (backdrop[base + ch] ?? 0) * inv;
    }
  }
}

export function runFine(bindings: CpuBindings, workgroups: WorkgroupCount): void {
  const bump = bindings.view('bump');
  if (failureFlags(bump) !== 0) return;

  const config = decodeFrameConfig(bindings.view('config'));
  const drawInfo = bindings.view('drawInfo');
  const tileSegments = bindings.view('tileSegments');
  const ptcl = bindings.view('ptcl');
  const outputView = bindings.view('output');
  const output = new Uint8Array(outputView.buffer, outputView.byteOffset, outputView.byteLength);
  const mode: AntialiasingMode = config.antialiasing;

  const coverage = new Float32Array(TILE_PIXELS);
  const [groupsX, groupsY] = workgroups;

  for (let ty = 0; ty < Math.min(groupsY, config.tilesY); ty++) {
    for (let tx = 0; tx < Math.min(groupsX, config.tilesX); tx++) {
      const tile = ty * config.tilesX + tx;
      const originX = tx * TILE_SIZE;
      const originY = ty * TILE_SIZE;

      let accum: Float32Array = new Float32Array(TILE_PIXELS * 4);
      for (let p = 0; p < TILE_PIXELS; p++) {
        accum.set(config.baseColor, p * 4);
      }
      const layers: Float32Array[] = [];

      const start = ptcl.getUint32(tile * PTCL_HEADER_WORDS * 4, true);
      const length = ptcl.getUint32((tile * PTCL_HEADER_WORDS + 1) * 4, true);
      let cursor = start;
      const end = start + length;
      while (cursor < end) {
        const word = (i: number) => ptcl.getUint32((cursor + i) * 4, true);
        const cmd = word(0);
        if (cmd === PtclCommand.fill) {
          const segments = readSegments(tileSegments, word(1), word(2));
          computeTileCoverage(segments, originX, originY, word(3), mode, coverage);
          compositeFill(accum, readDrawInfo(drawInfo, word(4)).color, coverage);
          cursor += 5;
        } else if (cmd === PtclCommand.beginClip) {
          layers.push(accum);
          accum = new Float32Array(TILE_PIXELS * 4);
          cursor += 1;
        } else if (cmd === PtclCommand.endClip) {
          const segments = readSegments(tileSegments, word(1), word(2));
          computeTileCoverage(segments, originX, originY, word(3), mode, coverage);
          const backdrop = layers.pop() ?? new Float32Array(TILE_PIXELS * 4);
          compositeLayer(backdrop, accum, coverage);
          accum = backdrop;
          cursor += 4;
        } else {
          break;
        }
      }

      for (let row = 0; row < TILE_SIZE; row++) {
        const y = originY + row;
        if (y >= config.height) break;
        for (let col = 0; col < TILE_SIZE; col++) {
          const x = originX + col;
          if (x >= config.width) break;
          const p = (row * TILE_SIZE + col) * 4;
          packPixel(
            accum[p] ?? 0,
            accum[p + 1] ?? 0,
            accum[p + 2] ?? 0,
            accum[p + 3] ?? 0,
            config.format,
            output,
            (y * config.width + x) * 4
          );
        }
      }
    }
  }
}

/**
 * Fine variant for one antialiasing mode. The mode is also carried in the
 * config uniform; a variant refuses frames configured for another mode.
 */
export function fineProgram(mode: AntialiasingMode): CpuProgram {
  return {
    label: `fine-${mode}`,
    stage: 'fine',
    run: (bindings, workgroups) => {
      const configured = decodeFrameConfig(bindings.view('config')).antialiasing;
      if (configured !== mode) {
        throw new Error(`[fine-${mode}] frame configured for ${configured} antialiasing`);
      }
      runFine(bindings, workgroups);
    },
  };
}
