/**
 * BufferArena - per-frame bump allocator over one pooled device buffer
 *
 * Regions are handed out at increasing, aligned offsets and never freed
 * individually. The whole arena goes back to its pool in one `release`,
 * together with the fence that guards its memory.
 */

import type { DeviceBuffer } from '../backend/ComputeDevice';
import type { Fence } from '../backend/Fence';
import { ArenaOverflow } from '../errors';
import type { BufferName } from '../types';
import { alignTo } from '../utils/align';

export interface BufferRegion {
  name: BufferName;
  buffer: DeviceBuffer;
  offset: number;
  size: number;
}

export interface ArenaOwner {
  releaseSlot(slotIndex: number, fence: Fence): void;
}

export class Arena {
  readonly id: number;
  readonly slotIndex: number;
  readonly buffer: DeviceBuffer;
  readonly capacity: number;
  readonly alignment: number;

  private readonly owner: ArenaOwner;
  private readonly allocations: BufferRegion[] = [];
  private cursor = 0;
  private released = false;

  constructor(args: {
    id: number;
    owner: ArenaOwner;
    slotIndex: number;
    buffer: DeviceBuffer;
    capacity: number;
    alignment: number;
  }) {
    this.id = args.id;
    this.owner = args.owner;
    this.slotIndex = args.slotIndex;
    this.buffer = args.buffer;
    this.capacity = args.capacity;
    this.alignment = args.alignment;
  }

  /**
   * Carve `bytes` out of the arena at the next aligned offset
   */
  subAlloc(name: BufferName, bytes: number): BufferRegion {
    if (this.released) {
      throw new Error(`[BufferArena] arena ${this.id} used after release`);
    }
    if (!Number.isInteger(bytes) || bytes <= 0) {
      throw new Error(`[BufferArena] ${name}: invalid region size ${bytes}`);
    }

    const offset = alignTo(this.cursor, this.alignment);
    if (offset + bytes > this.capacity) {
      throw new ArenaOverflow({
        requested: bytes,
        available: Math.max(0, this.capacity - offset),
        buffer: name,
      });
    }

    const region: BufferRegion = { name, buffer: this.buffer, offset, size: bytes };
    this.cursor = offset + bytes;
    this.allocations.push(region);
    return region;
  }

  get used(): number {
    return this.cursor;
  }

  get remaining(): number {
    return Math.max(0, this.capacity - alignTo(this.cursor, this.alignment));
  }

  get regions(): readonly BufferRegion[] {
    return this.allocations;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Return the arena to its pool. It is handed to the next frame only after
   * `fence` signals.
   */
  release(fence: Fence): void {
    if (this.released) {
      throw new Error(`[BufferArena] arena ${this.id} released twice`);
    }
    this.released = true;
    this.owner.releaseSlot(this.slotIndex, fence);
  }
}

/**
 * Bytes an arena needs to hold `sizes` when allocated in order
 */
export function arenaBytesFor(sizes: readonly number[], alignment: number): number {
  let cursor = 0;
  for (const size of sizes) {
    cursor = alignTo(cursor, alignment) + size;
  }
  return cursor;
}
