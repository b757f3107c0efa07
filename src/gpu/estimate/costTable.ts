/**
 * Byte costs used to size frame buffers.
 *
 * Buffers whose size follows directly from the summary are always exact.
 * Only the three bump-allocated buffers (bin data, tile segments, ptcl)
 * depend on how objects overlap tiles; static sizing assumes a flat
 * per-tile depth for those.
 */

import {
  BIN_ENTRY_BYTES,
  BIN_HEADER_BYTES,
  BUMP_BYTES,
  CONFIG_BYTES,
  COUNTS_BYTES,
  DRAW_INFO_BYTES,
  LINE_BYTES,
  MIN_BINDING_BYTES,
  PTCL_FILL_WORDS,
  PTCL_HEADER_WORDS,
  TILE_SEGMENT_BYTES,
  tileGrid,
} from '../pipeline/layout';
import type {
  BufferCounts,
  FrameBufferName,
  FrameBufferSizes,
  RenderConfig,
  SceneSummary,
} from '../types';
import { alignTo } from '../utils/align';

export const STATIC_COST_TABLE = {
  /** Draw objects assumed to overlap any one tile */
  binEntriesPerTile: 8,
  /** Segments assumed to cross any one tile */
  tileSegmentsPerTile: 32,
  /** Tiles a flattened segment is assumed to touch */
  tileSegmentsPerSegment: 4,
  /** Commands assumed per tile, each sized as a fill */
  ptclCommandsPerTile: 8,
} as const;

export const DEFAULT_SAFETY_MARGIN = 0.25;

/**
 * Static bound for the bump-allocated buffers, padded by `safetyMargin`
 */
export function staticBufferCounts(
  summary: SceneSummary,
  config: RenderConfig,
  safetyMargin: number
): BufferCounts {
  const { tileCount } = tileGrid(config.width, config.height);
  const pad = (count: number) => Math.ceil(count * (1 + safetyMargin));
  return {
    binEntries: pad(tileCount * STATIC_COST_TABLE.binEntriesPerTile),
    tileSegments: pad(
      tileCount * STATIC_COST_TABLE.tileSegmentsPerTile +
        summary.segmentCount * STATIC_COST_TABLE.tileSegmentsPerSegment
    ),
    ptclWords: pad(
      tileCount * (PTCL_HEADER_WORDS + STATIC_COST_TABLE.ptclCommandsPerTile * PTCL_FILL_WORDS)
    ),
  };
}

function bindingBytes(bytes: number): number {
  return Math.max(MIN_BINDING_BYTES, alignTo(bytes, 4));
}

/**
 * Byte size of every frame buffer given the bump-allocated counts
 */
export function frameBufferSizes(
  summary: SceneSummary,
  config: RenderConfig,
  sceneBytes: number,
  counts: BufferCounts
): FrameBufferSizes {
  const { tileCount } = tileGrid(config.width, config.height);
  return {
    config: CONFIG_BYTES,
    scene: bindingBytes(sceneBytes),
    drawInfo: bindingBytes(summary.drawObjectCount * DRAW_INFO_BYTES),
    lines: bindingBytes(summary.segmentCount * LINE_BYTES),
    binHeaders: bindingBytes(tileCount * BIN_HEADER_BYTES),
    binData: bindingBytes(counts.binEntries * BIN_ENTRY_BYTES),
    tileSegments: bindingBytes(counts.tileSegments * TILE_SEGMENT_BYTES),
    ptcl: bindingBytes(counts.ptclWords * 4),
    bump: BUMP_BYTES,
    output: bindingBytes(config.width * config.height * 4),
  };
}

export type CountingBufferName = Exclude<
  FrameBufferName,
  'binHeaders' | 'binData' | 'tileSegments' | 'ptcl' | 'output'
> | 'counts';

/**
 * Buffers bound by the counting pass
 */
export function countingBufferSizes(
  summary: SceneSummary,
  sceneBytes: number
): Record<CountingBufferName, number> {
  return {
    config: CONFIG_BYTES,
    scene: bindingBytes(sceneBytes),
    drawInfo: bindingBytes(summary.drawObjectCount * DRAW_INFO_BYTES),
    lines: bindingBytes(summary.segmentCount * LINE_BYTES),
    bump: BUMP_BYTES,
    counts: COUNTS_BYTES,
  };
}

export function totalBytes(sizes: Readonly<Record<string, number>>): number {
  return Object.values(sizes).reduce((sum, size) => sum + size, 0);
}
