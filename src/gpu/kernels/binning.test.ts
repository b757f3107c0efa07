import { describe, expect, it } from 'vitest';
import { rectPath } from '@/encoding/path';
import { SceneEncoder } from '@/encoding/SceneEncoder';
import { allocateHostBuffers, bindingsOf, words } from '@/test/kernelHarness';
import { makeConfig } from '@/test/scenes';
import { BumpWord, FailureFlag } from '../pipeline/layout';
import { runBinning } from './binning';
import { runElement } from './element';

const config = makeConfig({ width: 32, height: 32 });

function twoRectScene() {
  return new SceneEncoder()
    .fill(rectPath(0, 0, 32, 16), { r: 1, g: 0, b: 0, a: 1 })
    .fill(rectPath(16, 0, 16, 32), { r: 0, g: 0, b: 1, a: 1 })
    .finish();
}

describe('runBinning', () => {
  it('writes per-tile counts, offsets and draw indices in paint order', () => {
    const buffers = allocateHostBuffers(twoRectScene(), config);
    const bindings = bindingsOf(buffers);

    runElement(bindings);
    runBinning(bindings);

    // {count, offset} for tiles 0..3
    expect(words(buffers.binHeaders, 8)).toEqual([1, 0, 2, 1, 0, 3, 1, 3]);
    expect(words(buffers.binData, 4)).toEqual([0, 0, 1, 1]);
    expect(words(buffers.bump, 1, BumpWord.binEntries)).toEqual([4]);
    expect(words(buffers.bump, 1)).toEqual([0]);
  });

  it('flags overflow but still reports the total it needed', () => {
    const buffers = allocateHostBuffers(twoRectScene(), config, { binEntries: 3 });
    const bindings = bindingsOf(buffers);

    runElement(bindings);
    runBinning(bindings);

    expect(words(buffers.bump, 2)).toEqual([FailureFlag.binning, 4]);
  });

  it('does nothing for a malformed scene', () => {
    const scene = twoRectScene();
    const buffers = allocateHostBuffers(
      { data: scene.data, summary: { ...scene.summary, segmentCount: 9 } },
      config
    );
    const bindings = bindingsOf(buffers);

    runElement(bindings);
    runBinning(bindings);

    expect(words(buffers.bump, 2)).toEqual([FailureFlag.malformedScene, 0]);
  });
});
