import { describe, expect, it } from 'vitest';
import { fullRectScene, makeConfig } from '@/test/scenes';
import { CpuDevice } from '../backend/CpuDevice';
import { EstimationError, UnsupportedConfig } from '../errors';
import { createCpuPrograms } from '../kernels';
import { ArenaPool } from '../resources/ArenaPool';
import { CountingPass } from './CountingPass';
import { PipelineGraph } from './PipelineGraph';

function createPass(device = new CpuDevice()) {
  const pool = new ArenaPool(device, { depth: 1 });
  const pass = new CountingPass(device, pool, new PipelineGraph(), createCpuPrograms());
  return { device, pool, pass };
}

describe('CountingPass', () => {
  it('reads back exact totals for a scene', async () => {
    const { pass, pool } = createPass();

    const result = await pass.run(fullRectScene(64, 64), makeConfig());

    // 16 tiles, each with the rect's left edge and one fill command
    expect(result.counts).toEqual({ binEntries: 16, tileSegments: 16, ptclWords: 112 });
    expect(result.timings.map((timing) => timing.stage)).toEqual(['element', 'count']);
    expect(pool.stats().inUse).toBe(0);
  });

  it('reports a scene stream that disagrees with its summary', async () => {
    const { pass, pool } = createPass();
    const scene = fullRectScene(64, 64);
    const data = scene.data.slice();
    new DataView(data.buffer).setUint32(0, 7, true);

    await expect(pass.run({ data, summary: scene.summary }, makeConfig())).rejects.toThrow(
      new EstimationError(
        'scene stream does not match its summary (decoded 0 draw objects, 0 segments)'
      )
    );
    expect(pool.stats().inUse).toBe(0);
  });

  it('refuses a scratch arena larger than one device buffer', async () => {
    const device = new CpuDevice({ limits: { maxBufferSize: 1024 } });
    const { pass } = createPass(device);

    const pending = pass.run(fullRectScene(64, 64), makeConfig());

    await expect(pending).rejects.toThrow(UnsupportedConfig);
    await expect(pending).rejects.toThrow('device maxBufferSize is 1024');
    expect(device.allocatedBytes()).toBe(0);
  });
});
