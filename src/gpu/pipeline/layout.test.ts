import { describe, expect, it } from 'vitest';
import { makeConfig } from '@/test/scenes';
import {
  CONFIG_BYTES,
  decodeBufferCounts,
  decodeBumpDiagnostics,
  decodeFrameConfig,
  encodeFrameConfig,
  tileGrid,
} from './layout';

describe('layout', () => {
  it('rounds partial tiles up', () => {
    expect(tileGrid(33, 16)).toEqual({ tilesX: 3, tilesY: 1, tileCount: 3 });
    expect(tileGrid(1, 1)).toEqual({ tilesX: 1, tilesY: 1, tileCount: 1 });
  });

  it('encodes the config uniform the programs decode', () => {
    const bytes = encodeFrameConfig({
      config: makeConfig({
        width: 40,
        height: 20,
        antialiasing: 'none',
        format: 'bgra8unorm',
        baseColor: { r: 1, g: 0.5, b: 0, a: 0.5 },
      }),
      summary: {
        pathCount: 2,
        drawObjectCount: 2,
        clipCount: 0,
        glyphCount: 0,
        layerCount: 0,
        segmentCount: 9,
      },
      sceneBytes: 240,
      regionBytes: { binData: 40, tileSegments: 100, ptcl: 64 },
    });

    expect(bytes.byteLength).toBe(CONFIG_BYTES);
    expect(decodeFrameConfig(new DataView(bytes.buffer))).toEqual({
      width: 40,
      height: 20,
      tilesX: 3,
      tilesY: 2,
      drawObjectCount: 2,
      segmentCount: 9,
      binCapacity: 10,
      tileSegmentCapacity: 6,
      ptclCapacity: 16,
      antialiasing: 'none',
      format: 'bgra8unorm',
      sceneBytes: 240,
      baseColor: [0.5, 0.25, 0, 0.5],
    });
  });

  it('decodes bump diagnostics and counts from a subarray', () => {
    const backing = new Uint8Array(64);
    const view = new DataView(backing.buffer);
    [3, 10, 20, 30, 4, 5].forEach((value, i) => view.setUint32(16 + i * 4, value, true));

    expect(decodeBumpDiagnostics(backing.subarray(16, 48))).toEqual({
      failed: 3,
      binEntries: 10,
      tileSegments: 20,
      ptclWords: 30,
      drawObjects: 4,
      segments: 5,
    });
    expect(decodeBufferCounts(backing.subarray(20, 36))).toEqual({
      binEntries: 10,
      tileSegments: 20,
      ptclWords: 30,
    });
  });
});
