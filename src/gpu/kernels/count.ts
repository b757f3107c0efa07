/**
 * Counting program used by dynamic estimation. Runs after the element
 * program and reports the exact bin entry, tile segment and ptcl word totals
 * the main pipeline will need, without binning anything.
 */

import { COUNTS_BYTES, FailureFlag, PTCL_HEADER_WORDS, decodeFrameConfig } from '../pipeline/layout';
import { failureFlags } from './bump';
import { bboxContainsTile, commandWords, planTile, readDrawInfo, type DrawInfoRecord } from './tiling';
import type { CpuBindings, CpuProgram } from './types';

function* drawsInTile(records: readonly DrawInfoRecord[], tx: number, ty: number): Generator<number> {
  for (let d = 0; d < records.length; d++) {
    const record = records[d];
    if (record && bboxContainsTile(record, tx, ty)) yield d;
  }
}

export function runCount(bindings: CpuBindings): void {
  const counts = bindings.view('counts');
  for (let offset = 0; offset < COUNTS_BYTES; offset += 4) {
    counts.setUint32(offset, 0, true);
  }
  if (failureFlags(bindings.view('bump')) & FailureFlag.malformedScene) return;

  const config = decodeFrameConfig(bindings.view('config'));
  const drawInfo = bindings.view('drawInfo');
  const lines = bindings.view('lines');

  const records: DrawInfoRecord[] = [];
  let binEntries = 0;
  for (let d = 0; d < config.drawObjectCount; d++) {
    const record = readDrawInfo(drawInfo, d);
    const [x0, y0, x1, y1] = record.bbox;
    binEntries += (x1 - x0) * (y1 - y0);
    records.push(record);
  }

  let tileSegments = 0;
  let ptclWords = config.tilesX * config.tilesY * PTCL_HEADER_WORDS;
  for (let ty = 0; ty < config.tilesY; ty++) {
    for (let tx = 0; tx < config.tilesX; tx++) {
      for (const command of planTile(drawInfo, lines, drawsInTile(records, tx, ty), tx, ty)) {
        tileSegments += command.segments.length;
        ptclWords += commandWords(command);
      }
    }
  }

  counts.setUint32(0, binEntries, true);
  counts.setUint32(4, tileSegments, true);
  counts.setUint32(8, ptclWords, true);
}

export const countProgram: CpuProgram = {
  label: 'count',
  stage: 'count',
  run: (bindings) => runCount(bindings),
};
