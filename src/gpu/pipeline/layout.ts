/**
 * Buffer layouts shared by the host and the stage programs
 *
 * All buffers are arrays of little-endian 32-bit words.
 *
 * config (16 words):
 * | Word  | Field                                      |
 * |-------|--------------------------------------------|
 * | 0-1   | width, height                              |
 * | 2-3   | tilesX, tilesY                             |
 * | 4-5   | drawObjectCount, segmentCount              |
 * | 6-8   | binData / tileSegments / ptcl capacity     |
 * | 9-10  | antialiasing, output format                |
 * | 11    | encoded scene bytes                        |
 * | 12-15 | base color, premultiplied f32              |
 *
 * drawInfo (16 words per draw object):
 * | 0 tag | 1 fillRule | 2 lineOffset | 3 lineCount | 4-7 color f32 |
 * | 8-11 tile bbox x0, y0, x1, y1 | 12 clip depth | 13-15 reserved |
 *
 * ptcl: 2 header words per tile (command offset, command word count),
 * followed by bump-allocated command words.
 */

import type {
  AntialiasingMode,
  BufferCounts,
  BumpDiagnostics,
  FrameBufferName,
  OutputFormat,
  RenderConfig,
  SceneSummary,
} from '../types';
import { divCeil } from '../utils/align';
import { premultiply } from '../utils/pixels';

export const TILE_SIZE = 16;
export const TILE_PIXELS = TILE_SIZE * TILE_SIZE;
export const WORKGROUP_SIZE = 256;

export const CONFIG_WORDS = 16;
export const CONFIG_BYTES = CONFIG_WORDS * 4;

export const DRAW_INFO_WORDS = 16;
export const DRAW_INFO_BYTES = DRAW_INFO_WORDS * 4;
export const LINE_WORDS = 4;
export const LINE_BYTES = LINE_WORDS * 4;
export const BIN_HEADER_WORDS = 2;
export const BIN_HEADER_BYTES = BIN_HEADER_WORDS * 4;
export const BIN_ENTRY_BYTES = 4;
export const TILE_SEGMENT_WORDS = 4;
export const TILE_SEGMENT_BYTES = TILE_SEGMENT_WORDS * 4;
export const PTCL_HEADER_WORDS = 2;
export const BUMP_WORDS = 8;
export const BUMP_BYTES = BUMP_WORDS * 4;
export const COUNTS_WORDS = 4;
export const COUNTS_BYTES = COUNTS_WORDS * 4;

// Smallest region handed to a program; zero-sized bindings are not allowed
export const MIN_BINDING_BYTES = 16;

export const ConfigWord = {
  width: 0,
  height: 1,
  tilesX: 2,
  tilesY: 3,
  drawObjectCount: 4,
  segmentCount: 5,
  binCapacity: 6,
  tileSegmentCapacity: 7,
  ptclCapacity: 8,
  antialiasing: 9,
  format: 10,
  sceneBytes: 11,
  baseColor: 12,
} as const;

export const DrawInfoWord = {
  tag: 0,
  fillRule: 1,
  lineOffset: 2,
  lineCount: 3,
  color: 4,
  bbox: 8,
  clipDepth: 12,
} as const;

export const BumpWord = {
  failed: 0,
  binEntries: 1,
  tileSegments: 2,
  ptclWords: 3,
  drawObjects: 4,
  segments: 5,
} as const;

export const FailureFlag = {
  binning: 1,
  tileSegments: 2,
  ptcl: 4,
  malformedScene: 8,
} as const;

export const PtclCommand = {
  fill: 1,
  beginClip: 2,
  endClip: 3,
} as const;

export const PTCL_FILL_WORDS = 5; // cmd, segOffset, segCount, fillRule, drawIndex
export const PTCL_BEGIN_CLIP_WORDS = 1;
export const PTCL_END_CLIP_WORDS = 4; // cmd, segOffset, segCount, fillRule

const ANTIALIASING_CODE: Record<AntialiasingMode, number> = { area: 0, msaa: 1, none: 2 };
const FORMAT_CODE: Record<OutputFormat, number> = { rgba8unorm: 0, bgra8unorm: 1 };

export interface TileGrid {
  tilesX: number;
  tilesY: number;
  tileCount: number;
}

export function tileGrid(width: number, height: number): TileGrid {
  const tilesX = divCeil(width, TILE_SIZE);
  const tilesY = divCeil(height, TILE_SIZE);
  return { tilesX, tilesY, tileCount: tilesX * tilesY };
}

/**
 * Decoded config uniform as seen by the programs
 */
export interface FrameConfig {
  width: number;
  height: number;
  tilesX: number;
  tilesY: number;
  drawObjectCount: number;
  segmentCount: number;
  binCapacity: number;
  tileSegmentCapacity: number;
  ptclCapacity: number;
  antialiasing: AntialiasingMode;
  format: OutputFormat;
  sceneBytes: number;
  baseColor: [number, number, number, number];
}

export function encodeFrameConfig(args: {
  config: RenderConfig;
  summary: SceneSummary;
  sceneBytes: number;
  regionBytes: Partial<Record<FrameBufferName, number>>;
}): Uint8Array {
  const { config, summary, sceneBytes, regionBytes } = args;
  const grid = tileGrid(config.width, config.height);
  const bytes = new Uint8Array(CONFIG_BYTES);
  const view = new DataView(bytes.buffer);
  const setWord = (word: number, value: number) => view.setUint32(word * 4, value, true);

  setWord(ConfigWord.width, config.width);
  setWord(ConfigWord.height, config.height);
  setWord(ConfigWord.tilesX, grid.tilesX);
  setWord(ConfigWord.tilesY, grid.tilesY);
  setWord(ConfigWord.drawObjectCount, summary.drawObjectCount);
  setWord(ConfigWord.segmentCount, summary.segmentCount);
  setWord(ConfigWord.binCapacity, Math.floor((regionBytes.binData ?? 0) / BIN_ENTRY_BYTES));
  setWord(
    ConfigWord.tileSegmentCapacity,
    Math.floor((regionBytes.tileSegments ?? 0) / TILE_SEGMENT_BYTES)
  );
  setWord(ConfigWord.ptclCapacity, Math.floor((regionBytes.ptcl ?? 0) / 4));
  setWord(ConfigWord.antialiasing, ANTIALIASING_CODE[config.antialiasing]);
  setWord(ConfigWord.format, FORMAT_CODE[config.format]);
  setWord(ConfigWord.sceneBytes, sceneBytes);

  const base = premultiply(config.baseColor);
  for (let i = 0; i < 4; i++) {
    view.setFloat32((ConfigWord.baseColor + i) * 4, base[i] ?? 0, true);
  }
  return bytes;
}

export function decodeFrameConfig(view: DataView): FrameConfig {
  const word = (index: number) => view.getUint32(index * 4, true);
  const aaCode = word(ConfigWord.antialiasing);
  return {
    width: word(ConfigWord.width),
    height: word(ConfigWord.height),
    tilesX: word(ConfigWord.tilesX),
    tilesY: word(ConfigWord.tilesY),
    drawObjectCount: word(ConfigWord.drawObjectCount),
    segmentCount: word(ConfigWord.segmentCount),
    binCapacity: word(ConfigWord.binCapacity),
    tileSegmentCapacity: word(ConfigWord.tileSegmentCapacity),
    ptclCapacity: word(ConfigWord.ptclCapacity),
    antialiasing: aaCode === 1 ? 'msaa' : aaCode === 2 ? 'none' : 'area',
    format: word(ConfigWord.format) === 1 ? 'bgra8unorm' : 'rgba8unorm',
    sceneBytes: word(ConfigWord.sceneBytes),
    baseColor: [
      view.getFloat32(ConfigWord.baseColor * 4, true),
      view.getFloat32((ConfigWord.baseColor + 1) * 4, true),
      view.getFloat32((ConfigWord.baseColor + 2) * 4, true),
      view.getFloat32((ConfigWord.baseColor + 3) * 4, true),
    ],
  };
}

export function decodeBumpDiagnostics(bytes: Uint8Array): BumpDiagnostics {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const word = (index: number) => view.getUint32(index * 4, true);
  return {
    failed: word(BumpWord.failed),
    binEntries: word(BumpWord.binEntries),
    tileSegments: word(BumpWord.tileSegments),
    ptclWords: word(BumpWord.ptclWords),
    drawObjects: word(BumpWord.drawObjects),
    segments: word(BumpWord.segments),
  };
}

export function decodeBufferCounts(bytes: Uint8Array): BufferCounts {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    binEntries: view.getUint32(0, true),
    tileSegments: view.getUint32(4, true),
    ptclWords: view.getUint32(8, true),
  };
}
