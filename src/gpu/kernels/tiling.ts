/**
 * Helpers shared by the coarse and count programs. Both must walk tiles and
 * pick segments identically, otherwise dynamic sizing stops being exact.
 */

import { DrawTag } from '@/encoding/drawTag';
import {
  DRAW_INFO_BYTES,
  DrawInfoWord,
  LINE_BYTES,
  PTCL_BEGIN_CLIP_WORDS,
  PTCL_END_CLIP_WORDS,
  PTCL_FILL_WORDS,
  TILE_SIZE,
} from '../pipeline/layout';

export interface DrawInfoRecord {
  tag: number;
  fillRule: number;
  lineOffset: number;
  lineCount: number;
  color: [number, number, number, number];
  bbox: [number, number, number, number];
  clipDepth: number;
}

export function readDrawInfo(view: DataView, index: number): DrawInfoRecord {
  const base = index * DRAW_INFO_BYTES;
  const word = (w: number) => view.getUint32(base + w * 4, true);
  const float = (w: number) => view.getFloat32(base + w * 4, true);
  return {
    tag: word(DrawInfoWord.tag),
    fillRule: word(DrawInfoWord.fillRule),
    lineOffset: word(DrawInfoWord.lineOffset),
    lineCount: word(DrawInfoWord.lineCount),
    color: [
      float(DrawInfoWord.color),
      float(DrawInfoWord.color + 1),
      float(DrawInfoWord.color + 2),
      float(DrawInfoWord.color + 3),
    ],
    bbox: [
      word(DrawInfoWord.bbox),
      word(DrawInfoWord.bbox + 1),
      word(DrawInfoWord.bbox + 2),
      word(DrawInfoWord.bbox + 3),
    ],
    clipDepth: word(DrawInfoWord.clipDepth),
  };
}

export function bboxContainsTile(info: DrawInfoRecord, tx: number, ty: number): boolean {
  const [x0, y0, x1, y1] = info.bbox;
  return tx >= x0 && tx < x1 && ty >= y0 && ty < y1;
}

/**
 * A line affects winding inside the tile when it spans part of the tile's
 * rows and starts left of the tile's right edge. Lines wholly to the right
 * never change winding for samples inside the tile.
 */
export function lineTouchesTile(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  tx: number,
  ty: number
): boolean {
  if (y0 === y1) return false;
  const top = ty * TILE_SIZE;
  const bottom = top + TILE_SIZE;
  const right = (tx + 1) * TILE_SIZE;
  return Math.min(y0, y1) < bottom && Math.max(y0, y1) > top && Math.min(x0, x1) < right;
}

export type TileCommandKind = 'fill' | 'beginClip' | 'endClip';

export interface TileCommand {
  kind: TileCommandKind;
  drawIndex: number;
  fillRule: number;
  /** Indices into the lines buffer */
  segments: number[];
}

export function commandWords(command: TileCommand): number {
  switch (command.kind) {
    case 'fill':
      return PTCL_FILL_WORDS;
    case 'beginClip':
      return PTCL_BEGIN_CLIP_WORDS;
    case 'endClip':
      return PTCL_END_CLIP_WORDS;
  }
}

function touchingSegments(
  lines: DataView,
  info: DrawInfoRecord,
  tx: number,
  ty: number
): number[] {
  const segments: number[] = [];
  for (let i = 0; i < info.lineCount; i++) {
    const index = info.lineOffset + i;
    const base = index * LINE_BYTES;
    const x0 = lines.getFloat32(base, true);
    const y0 = lines.getFloat32(base + 4, true);
    const x1 = lines.getFloat32(base + 8, true);
    const y1 = lines.getFloat32(base + 12, true);
    if (lineTouchesTile(x0, y0, x1, y1, tx, ty)) {
      segments.push(index);
    }
  }
  return segments;
}

/**
 * Build the command list for one tile from the draw objects binned into it,
 * in paint order. Fills that touch no segment are dropped; clip markers are
 * always kept so layers stay balanced.
 */
export function planTile(
  drawInfo: DataView,
  lines: DataView,
  drawIndices: Iterable<number>,
  tx: number,
  ty: number
): TileCommand[] {
  const commands: TileCommand[] = [];
  for (const drawIndex of drawIndices) {
    const info = readDrawInfo(drawInfo, drawIndex);
    if (info.tag === DrawTag.BeginClip) {
      commands.push({ kind: 'beginClip', drawIndex, fillRule: info.fillRule, segments: [] });
      continue;
    }

    const segments = touchingSegments(lines, info, tx, ty);
    if (info.tag === DrawTag.EndClip) {
      commands.push({ kind: 'endClip', drawIndex, fillRule: info.fillRule, segments });
    } else if (segments.length > 0) {
      commands.push({ kind: 'fill', drawIndex, fillRule: info.fillRule, segments });
    }
  }
  return commands;
}
