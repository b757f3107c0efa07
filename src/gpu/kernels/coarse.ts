/**
 * Coarse program: one workgroup per tile. Turns the tile's bin into a
 * per-tile command list (ptcl) and copies the segments each command needs
 * into the tile segment buffer. Both buffers are bump allocated; totals keep
 * counting once capacity runs out so the host can size a retry.
 */

import {
  BIN_HEADER_BYTES,
  BumpWord,
  FailureFlag,
  LINE_BYTES,
  PTCL_HEADER_WORDS,
  PtclCommand,
  TILE_SEGMENT_BYTES,
  decodeFrameConfig,
} from '../pipeline/layout';
import type { WorkgroupCount } from '../types';
import { failureFlags, raiseFailure, writeBumpWord } from './bump';
import { commandWords, planTile, type TileCommand } from './tiling';
import type { CpuBindings, CpuProgram } from './types';

function* binnedDraws(headers: DataView, data: DataView, tile: number): Generator<number> {
  const count = headers.getUint32(tile * BIN_HEADER_BYTES, true);
  const offset = headers.getUint32(tile * BIN_HEADER_BYTES + 4, true);
  for (let i = 0; i < count; i++) {
    yield data.getUint32((offset + i) * 4, true);
  }
}

function encodeCommand(command: TileCommand, segOffset: number): number[] {
  switch (command.kind) {
    case 'fill':
      return [
        PtclCommand.fill,
        segOffset,
        command.segments.length,
        command.fillRule,
        command.drawIndex,
      ];
    case 'beginClip':
      return [PtclCommand.beginClip];
    case 'endClip':
      return [PtclCommand.endClip, segOffset, command.segments.length, command.fillRule];
  }
}

export function runCoarse(bindings: CpuBindings, workgroups: WorkgroupCount): void {
  const config = decodeFrameConfig(bindings.view('config'));
  const bump = bindings.view('bump');
  if (failureFlags(bump) & (FailureFlag.malformedScene | FailureFlag.binning)) return;

  const drawInfo = bindings.view('drawInfo');
  const lines = bindings.view('lines');
  const headers = bindings.view('binHeaders');
  const binData = bindings.view('binData');
  const tileSegments = bindings.view('tileSegments');
  const ptcl = bindings.view('ptcl');

  const tileCount = config.tilesX * config.tilesY;
  const headerWords = tileCount * PTCL_HEADER_WORDS;
  const headersFit = headerWords <= config.ptclCapacity;

  let segCursor = 0;
  let ptclCursor = headerWords;

  const [groupsX, groupsY] = workgroups;
  for (let ty = 0; ty < Math.min(groupsY, config.tilesY); ty++) {
    for (let tx = 0; tx < Math.min(groupsX, config.tilesX); tx++) {
      const tile = ty * config.tilesX + tx;
      const commands = planTile(drawInfo, lines, binnedDraws(headers, binData, tile), tx, ty);

      const start = ptclCursor;
      for (const command of commands) {
        const segOffset = segCursor;
        for (const lineIndex of command.segments) {
          if (segCursor < config.tileSegmentCapacity) {
            const src = lineIndex * LINE_BYTES;
            const dst = segCursor * TILE_SEGMENT_BYTES;
            for (let k = 0; k < 16; k += 4) {
              tileSegments.setFloat32(dst + k, lines.getFloat32(src + k, true), true);
            }
          }
          segCursor++;
        }

        const words = encodeCommand(command, segOffset);
        if (ptclCursor + commandWords(command) <= config.ptclCapacity) {
          words.forEach((word, i) => ptcl.setUint32((ptclCursor + i) * 4, word, true));
        }
        ptclCursor += words.length;
      }

      if (headersFit) {
        ptcl.setUint32(tile * PTCL_HEADER_WORDS * 4, start, true);
        ptcl.setUint32((tile * PTCL_HEADER_WORDS + 1) * 4, ptclCursor - start, true);
      }
    }
  }

  writeBumpWord(bump, BumpWord.tileSegments, segCursor);
  writeBumpWord(bump, BumpWord.ptclWords, ptclCursor);
  if (segCursor > config.tileSegmentCapacity) {
    raiseFailure(bump, FailureFlag.tileSegments);
  }
  if (ptclCursor > config.ptclCapacity) {
    raiseFailure(bump, FailureFlag.ptcl);
  }
}

export const coarseProgram: CpuProgram = {
  label: 'coarse',
  stage: 'coarse',
  run: (bindings, workgroups) => runCoarse(bindings, workgroups),
};
