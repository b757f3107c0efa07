/**
 * Binning program: assigns every draw object to the tiles its bounding box
 * covers. Bin headers hold `{elementCount, chunkOffset}` per tile; bin data
 * holds draw indices in paint order, grouped by tile.
 */

import {
  BIN_HEADER_BYTES,
  BumpWord,
  FailureFlag,
  decodeFrameConfig,
  tileGrid,
} from '../pipeline/layout';
import { failureFlags, raiseFailure, writeBumpWord } from './bump';
import { readDrawInfo } from './tiling';
import type { CpuBindings, CpuProgram } from './types';

export function runBinning(bindings: CpuBindings): void {
  const config = decodeFrameConfig(bindings.view('config'));
  const bump = bindings.view('bump');
  if (failureFlags(bump) & FailureFlag.malformedScene) return;

  const drawInfo = bindings.view('drawInfo');
  const headers = bindings.view('binHeaders');
  const data = bindings.view('binData');
  const { tilesX, tileCount } = tileGrid(config.width, config.height);

  const bboxes: Array<[number, number, number, number]> = [];
  const counts = new Uint32Array(tileCount);
  for (let d = 0; d < config.drawObjectCount; d++) {
    const [x0, y0, x1, y1] = readDrawInfo(drawInfo, d).bbox;
    bboxes.push([x0, y0, x1, y1]);
    for (let ty = y0; ty < y1; ty++) {
      for (let tx = x0; tx < x1; tx++) {
        counts[ty * tilesX + tx] += 1;
      }
    }
  }

  const offsets = new Uint32Array(tileCount);
  let total = 0;
  for (let tile = 0; tile < tileCount; tile++) {
    offsets[tile] = total;
    total += counts[tile] ?? 0;
    headers.setUint32(tile * BIN_HEADER_BYTES, counts[tile] ?? 0, true);
    headers.setUint32(tile * BIN_HEADER_BYTES + 4, offsets[tile] ?? 0, true);
  }

  writeBumpWord(bump, BumpWord.binEntries, total);
  if (total > config.binCapacity) {
    raiseFailure(bump, FailureFlag.binning);
    return;
  }

  const cursors = offsets.slice();
  bboxes.forEach(([x0, y0, x1, y1], d) => {
    for (let ty = y0; ty < y1; ty++) {
      for (let tx = x0; tx < x1; tx++) {
        const tile = ty * tilesX + tx;
        const slot = cursors[tile] ?? 0;
        data.setUint32(slot * 4, d, true);
        cursors[tile] = slot + 1;
      }
    }
  });
}

export const binningProgram: CpuProgram = {
  label: 'binning',
  stage: 'binning',
  run: (bindings) => runBinning(bindings),
};
