import { describe, expect, it, vi } from 'vitest';
import { fullRectScene, makeConfig } from '@/test/scenes';
import { EstimationError } from '../errors';
import type { BufferCounts, BumpDiagnostics } from '../types';
import { ResourceEstimator, type BufferCounter } from './ResourceEstimator';

function fakeCounter(counts: BufferCounts) {
  const count = vi.fn(async () => counts);
  const counter: BufferCounter = { count };
  return { counter, count };
}

const scene = fullRectScene(64, 64);
const config = makeConfig();

describe('ResourceEstimator', () => {
  it('sizes a static estimate from tile count and segment count', () => {
    const estimate = new ResourceEstimator().estimateStatic(scene, config);

    expect(estimate.mode).toBe('static');
    expect(estimate.exact).toBe(false);
    expect(estimate.buffers).toEqual({
      config: 64,
      scene: 92,
      drawInfo: 64,
      lines: 64,
      binHeaders: 128,
      binData: 640,
      tileSegments: 10560,
      ptcl: 3360,
      bump: 32,
      output: 16384,
    });
    expect(estimate.totalBytes).toBe(31388);
  });

  it('applies the safety margin only to bump-allocated buffers', () => {
    const estimate = new ResourceEstimator().estimateStatic(scene, config, 0);

    expect(estimate.buffers.binData).toBe(512);
    expect(estimate.buffers.tileSegments).toBe(8448);
    expect(estimate.buffers.ptcl).toBe(2688);
    expect(estimate.buffers.output).toBe(16384);
  });

  it('never runs the counting pass in static mode', async () => {
    const { counter, count } = fakeCounter({ binEntries: 1, tileSegments: 1, ptclWords: 1 });

    const estimate = await new ResourceEstimator().estimate(scene, config, {
      mode: 'static',
      counter,
    });

    expect(count).not.toHaveBeenCalled();
    expect(estimate.buffers.binData).toBe(640);
  });

  it('sizes a dynamic estimate from exact counts', async () => {
    const { counter, count } = fakeCounter({ binEntries: 3, tileSegments: 5, ptclWords: 40 });

    const estimate = await new ResourceEstimator().estimate(scene, config, {
      mode: 'dynamic',
      counter,
    });

    expect(count).toHaveBeenCalledWith(scene, config);
    expect(estimate).toMatchObject({ mode: 'dynamic', exact: true });
    // bindings never drop below 16 bytes
    expect(estimate.buffers.binData).toBe(16);
    expect(estimate.buffers.tileSegments).toBe(80);
    expect(estimate.buffers.ptcl).toBe(160);
  });

  it('rejects an inconsistent summary before counting', async () => {
    const { counter, count } = fakeCounter({ binEntries: 0, tileSegments: 0, ptclWords: 0 });
    const broken = { data: scene.data, summary: { ...scene.summary, drawObjectCount: 2 } };

    await expect(
      new ResourceEstimator().estimate(broken, config, { mode: 'dynamic', counter })
    ).rejects.toBeInstanceOf(EstimationError);
    expect(count).not.toHaveBeenCalled();
  });

  it('rejects negative or non-finite margins', async () => {
    const { counter } = fakeCounter({ binEntries: 0, tileSegments: 0, ptclWords: 0 });

    expect(() => new ResourceEstimator({ safetyMargin: -1 })).toThrow(
      '[ResourceEstimator] safety margin must be a non-negative number, got -1'
    );
    await expect(
      new ResourceEstimator().estimate(scene, config, {
        mode: 'static',
        counter,
        safetyMargin: Number.NaN,
      })
    ).rejects.toThrow('got NaN');
  });

  it('resizes to fresh counts, never below what the failed frame reported', async () => {
    const { counter } = fakeCounter({ binEntries: 3, tileSegments: 5, ptclWords: 40 });
    const estimator = new ResourceEstimator();
    const diagnostics: BumpDiagnostics = {
      failed: 1,
      binEntries: 500,
      tileSegments: 2,
      ptclWords: 10,
      drawObjects: 1,
      segments: 4,
    };

    const resized = await estimator.resize(scene, config, {
      previous: estimator.estimateStatic(scene, config),
      diagnostics,
      counter,
    });

    expect(resized.mode).toBe('dynamic');
    expect(resized.buffers.binData).toBe(2000);
    expect(resized.buffers.tileSegments).toBe(80);
    expect(resized.buffers.ptcl).toBe(160);
    expect(resized.totalBytes).toBe(19068);
  });
});
