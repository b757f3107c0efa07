import { describe, expect, it } from 'vitest';
import { CpuDevice } from '../backend/CpuDevice';
import { Fence } from '../backend/Fence';
import { ArenaOverflow } from '../errors';
import { ArenaPool } from './ArenaPool';
import { arenaBytesFor } from './BufferArena';

async function freshArena(bytes: number) {
  const device = new CpuDevice();
  const pool = new ArenaPool(device, { depth: 1 });
  return pool.acquire(bytes);
}

describe('Arena', () => {
  it('hands out regions at aligned, increasing offsets', async () => {
    const arena = await freshArena(1000);

    const config = arena.subAlloc('config', 64);
    const scene = arena.subAlloc('scene', 100);

    expect(config.offset).toBe(0);
    expect(scene.offset).toBe(256);
    expect(arena.used).toBe(356);
    expect(arena.remaining).toBe(488);
    expect(arena.regions.map((region) => region.name)).toEqual(['config', 'scene']);
  });

  it('raises ArenaOverflow with what was asked and what was left', async () => {
    const arena = await freshArena(1000);
    arena.subAlloc('config', 64);
    arena.subAlloc('scene', 100);

    let caught: unknown = null;
    try {
      arena.subAlloc('drawInfo', 600);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ArenaOverflow);
    expect(caught).toMatchObject({ requested: 600, available: 488, buffer: 'drawInfo' });
    // a failed request does not move the cursor
    expect(arena.used).toBe(356);
  });

  it('rejects empty or fractional regions', async () => {
    const arena = await freshArena(256);

    expect(() => arena.subAlloc('bump', 0)).toThrow('[BufferArena] bump: invalid region size 0');
    expect(() => arena.subAlloc('bump', 1.5)).toThrow('invalid region size 1.5');
  });

  it('cannot be used or released after release', async () => {
    const arena = await freshArena(256);
    arena.release(Fence.signaled());

    expect(arena.isReleased).toBe(true);
    expect(() => arena.subAlloc('bump', 32)).toThrow(`[BufferArena] arena ${arena.id} used after release`);
    expect(() => arena.release(Fence.signaled())).toThrow('released twice');
  });
});

describe('arenaBytesFor', () => {
  it('adds alignment padding between regions', () => {
    expect(arenaBytesFor([64, 100, 600], 256)).toBe(1112);
    expect(arenaBytesFor([], 256)).toBe(0);
  });
});
