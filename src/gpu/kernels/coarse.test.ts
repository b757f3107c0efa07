import { describe, expect, it } from 'vitest';
import { rectPath } from '@/encoding/path';
import { SceneEncoder } from '@/encoding/SceneEncoder';
import { allocateHostBuffers, bindingsOf, words, type HarnessCapacities } from '@/test/kernelHarness';
import { makeConfig } from '@/test/scenes';
import { FailureFlag, PtclCommand, tileGrid } from '../pipeline/layout';
import type { RenderConfig, Scene } from '../types';
import { runBinning } from './binning';
import { runCoarse } from './coarse';
import { runCount } from './count';
import { runElement } from './element';

const config = makeConfig({ width: 32, height: 32 });

function twoRectScene(): Scene {
  return new SceneEncoder()
    .fill(rectPath(0, 0, 32, 16), { r: 1, g: 0, b: 0, a: 1 })
    .fill(rectPath(16, 0, 16, 32), { r: 0, g: 0, b: 1, a: 1 })
    .finish();
}

function runThroughCoarse(scene: Scene, frame: RenderConfig, capacities?: HarnessCapacities) {
  const buffers = allocateHostBuffers(scene, frame, capacities);
  const bindings = bindingsOf(buffers);
  const { tilesX, tilesY } = tileGrid(frame.width, frame.height);
  runElement(bindings);
  runBinning(bindings);
  runCoarse(bindings, [tilesX, tilesY, 1]);
  return buffers;
}

function countFor(scene: Scene, frame: RenderConfig): number[] {
  const buffers = allocateHostBuffers(scene, frame);
  const bindings = bindingsOf(buffers);
  runElement(bindings);
  runCount(bindings);
  return words(buffers.counts, 3);
}

describe('runCoarse', () => {
  it('builds per-tile command lists and copies the touching segments', () => {
    const buffers = runThroughCoarse(twoRectScene(), config);

    // headers: {start, length} per tile
    expect(words(buffers.ptcl, 8)).toEqual([8, 5, 13, 10, 23, 0, 23, 5]);
    expect(words(buffers.ptcl, 20, 8)).toEqual([
      PtclCommand.fill, 0, 1, 0, 0,
      PtclCommand.fill, 1, 1, 0, 0,
      PtclCommand.fill, 2, 1, 0, 1,
      PtclCommand.fill, 3, 1, 0, 1,
    ]);
    // bump: failed, binEntries, tileSegments, ptclWords
    expect(words(buffers.bump, 4)).toEqual([0, 4, 4, 28]);

    const segments = buffers.tileSegments;
    if (!segments) throw new Error('missing tileSegments');
    const view = new DataView(segments.buffer);
    // first copied segment is the rect's closing edge (0,16) -> (0,0)
    expect([0, 4, 8, 12].map((offset) => view.getFloat32(offset, true))).toEqual([0, 16, 0, 0]);
  });

  it('keeps counting past ptcl and segment capacity', () => {
    const buffers = runThroughCoarse(twoRectScene(), config, { tileSegments: 2, ptclWords: 20 });

    expect(words(buffers.bump, 4)).toEqual([
      FailureFlag.tileSegments | FailureFlag.ptcl,
      4,
      4,
      28,
    ]);
  });

  it('skips work after a binning overflow', () => {
    const buffers = runThroughCoarse(twoRectScene(), config, { binEntries: 1 });

    expect(words(buffers.bump, 4)).toEqual([FailureFlag.binning, 4, 0, 0]);
  });

  it('emits clip markers even where the clipped fill misses the tile', () => {
    const scene = new SceneEncoder()
      .pushClip(rectPath(0, 0, 32, 16))
      .fill(rectPath(0, 0, 8, 8), { r: 0, g: 1, b: 0, a: 1 })
      .popClip()
      .finish();
    const buffers = runThroughCoarse(scene, config);

    // tile 1 holds beginClip and endClip but no fill
    expect(words(buffers.ptcl, 2, 2)).toEqual([18, 5]);
    expect(words(buffers.ptcl, 5, 18)).toEqual([PtclCommand.beginClip, PtclCommand.endClip, 3, 1, 0]);
  });
});

describe('runCount', () => {
  it('matches what binning and coarse actually allocate', () => {
    const scenes = [
      twoRectScene(),
      new SceneEncoder()
        .pushClip(rectPath(0, 0, 32, 16))
        .fill(rectPath(0, 0, 8, 8), { r: 0, g: 1, b: 0, a: 1 })
        .popClip()
        .finish(),
    ];

    for (const scene of scenes) {
      const coarse = runThroughCoarse(scene, config);
      expect(countFor(scene, config)).toEqual(words(coarse.bump, 3, 1));
    }
  });

  it('reports exact totals for a simple scene', () => {
    expect(countFor(twoRectScene(), config)).toEqual([4, 4, 28]);
  });

  it('zeroes its output for a malformed scene', () => {
    const scene = twoRectScene();
    const buffers = allocateHostBuffers(
      { data: scene.data, summary: { ...scene.summary, segmentCount: 9 } },
      config
    );
    buffers.counts?.fill(0xff);
    const bindings = bindingsOf(buffers);

    runElement(bindings);
    runCount(bindings);

    expect(words(buffers.counts, 4)).toEqual([0, 0, 0, 0]);
  });
});
