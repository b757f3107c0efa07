/**
 * ArenaPool - bounded set of reusable arena blocks, one per in-flight frame
 *
 * A slot goes back into circulation as soon as its arena is released, but
 * the next occupant only receives it after the release fence has signaled.
 * When every slot is taken, acquirers queue FIFO. Blocks grow to the
 * requested size and never shrink.
 */

import type { ComputeDevice, DeviceBuffer } from '../backend/ComputeDevice';
import type { Fence } from '../backend/Fence';
import { DeviceLost } from '../errors';
import { Arena, type ArenaOwner } from './BufferArena';

interface ArenaSlot {
  index: number;
  buffer: DeviceBuffer | null;
  retire: Fence | null;
  inUse: boolean;
  /** Set when the slot falls outside a reduced depth */
  retiring: boolean;
}

type SlotWaiter = {
  resolve: (slot: ArenaSlot) => void;
  reject: (error: unknown) => void;
};

export interface ArenaPoolOptions {
  depth: number;
  label?: string;
}

export interface ArenaPoolStats {
  depth: number;
  slots: number;
  inUse: number;
  waiting: number;
  acquires: number;
  reuses: number;
  grows: number;
  fenceWaits: number;
  allocatedBytes: number;
}

export const MAX_POOL_DEPTH = 8;

function assertDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 1 || depth > MAX_POOL_DEPTH) {
    throw new Error(`[ArenaPool] depth must be an integer in [1, ${MAX_POOL_DEPTH}], got ${depth}`);
  }
}

export class ArenaPool implements ArenaOwner {
  private readonly device: ComputeDevice<unknown>;
  private readonly label: string;
  private depth: number;
  private slots: ArenaSlot[] = [];
  private waiters: SlotWaiter[] = [];
  private nextArenaId = 1;
  private invalidated = false;
  private counters = { acquires: 0, reuses: 0, grows: 0, fenceWaits: 0 };

  constructor(device: ComputeDevice<unknown>, options: ArenaPoolOptions) {
    assertDepth(options.depth);
    this.device = device;
    this.depth = options.depth;
    this.label = options.label ?? 'arena';
  }

  get poolDepth(): number {
    return this.depth;
  }

  /**
   * Hand out an arena of at least `totalBytes`. Resolves once a slot is free
   * and its previous occupant's fence has signaled.
   */
  async acquire(totalBytes: number): Promise<Arena> {
    this.assertValid();
    if (!Number.isInteger(totalBytes) || totalBytes <= 0) {
      throw new Error(`[ArenaPool] invalid arena size ${totalBytes}`);
    }
    this.counters.acquires += 1;

    const slot = await this.claimSlot();
    try {
      await this.waitForRetirement(slot);
      this.assertValid();
      this.ensureCapacity(slot, totalBytes);
    } catch (error) {
      this.returnUnused(slot);
      throw error;
    }

    const buffer = slot.buffer;
    if (!buffer) {
      this.returnUnused(slot);
      throw new Error(`[ArenaPool] slot ${slot.index} has no block after sizing`);
    }
    return new Arena({
      id: this.nextArenaId++,
      owner: this,
      slotIndex: slot.index,
      buffer,
      capacity: buffer.size,
      alignment: this.device.info.limits.minStorageBufferOffsetAlignment,
    });
  }

  releaseSlot(slotIndex: number, fence: Fence): void {
    const slot = this.slots.find((candidate) => candidate.index === slotIndex);
    if (!slot || !slot.inUse) {
      throw new Error(`[ArenaPool] slot ${slotIndex} is not checked out`);
    }
    slot.retire = fence;
    slot.inUse = false;

    if (this.invalidated) {
      this.dropBlock(slot);
      return;
    }
    if (slot.retiring) {
      this.retireSlot(slot);
      return;
    }
    this.handOff(slot);
  }

  /**
   * Change how many frames may be in flight. Extra slots are destroyed once
   * their fences signal; waiters are served by new slots straight away.
   */
  setDepth(depth: number): void {
    assertDepth(depth);
    this.depth = depth;

    const kept: ArenaSlot[] = [];
    for (const slot of this.slots) {
      if (kept.length < depth) {
        kept.push(slot);
        continue;
      }
      slot.retiring = true;
      if (!slot.inUse) {
        this.retireSlot(slot);
      }
    }

    while (this.waiters.length > 0 && this.liveSlotCount() < this.depth) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      waiter.resolve(this.createSlot());
    }
  }

  /**
   * Forget every block. Used after device loss: the memory is gone and
   * must not be handed out again.
   */
  invalidate(reason: string = 'device lost'): void {
    if (this.invalidated) return;
    this.invalidated = true;
    for (const slot of this.slots) {
      if (!slot.inUse) {
        this.dropBlock(slot);
      }
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new DeviceLost(reason));
    }
  }

  get isInvalidated(): boolean {
    return this.invalidated;
  }

  stats(): ArenaPoolStats {
    return {
      depth: this.depth,
      slots: this.slots.length,
      inUse: this.slots.filter((slot) => slot.inUse).length,
      waiting: this.waiters.length,
      acquires: this.counters.acquires,
      reuses: this.counters.reuses,
      grows: this.counters.grows,
      fenceWaits: this.counters.fenceWaits,
      allocatedBytes: this.slots.reduce((sum, slot) => sum + (slot.buffer?.size ?? 0), 0),
    };
  }

  private claimSlot(): Promise<ArenaSlot> {
    if (this.waiters.length === 0) {
      const free = this.slots.find((slot) => !slot.inUse && !slot.retiring);
      if (free) {
        free.inUse = true;
        return Promise.resolve(free);
      }
      if (this.liveSlotCount() < this.depth) {
        return Promise.resolve(this.createSlot());
      }
    }
    return new Promise<ArenaSlot>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private createSlot(): ArenaSlot {
    const used = new Set(this.slots.map((slot) => slot.index));
    let index = 0;
    while (used.has(index)) index++;
    const slot: ArenaSlot = { index, buffer: null, retire: null, inUse: true, retiring: false };
    this.slots.push(slot);
    return slot;
  }

  private liveSlotCount(): number {
    return this.slots.filter((slot) => !slot.retiring).length;
  }

  private handOff(slot: ArenaSlot): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      slot.inUse = true;
      waiter.resolve(slot);
    }
  }

  private returnUnused(slot: ArenaSlot): void {
    slot.inUse = false;
    if (this.invalidated) {
      this.dropBlock(slot);
    } else if (slot.retiring) {
      this.retireSlot(slot);
    } else {
      this.handOff(slot);
    }
  }

  private async waitForRetirement(slot: ArenaSlot): Promise<void> {
    const fence = slot.retire;
    if (!fence) return;
    if (!fence.isSignaled) {
      this.counters.fenceWaits += 1;
    }
    try {
      await fence.wait();
    } catch (error) {
      // Previous occupant never finished; its block cannot be trusted
      console.warn(`[ArenaPool] ${this.label}: discarding block after failed fence ${fence.label}`, error);
      this.dropBlock(slot);
    }
    slot.retire = null;
  }

  private ensureCapacity(slot: ArenaSlot, totalBytes: number): void {
    if (slot.buffer && slot.buffer.size >= totalBytes) {
      this.counters.reuses += 1;
      return;
    }
    if (slot.buffer) {
      this.device.releaseBuffer(slot.buffer);
      slot.buffer = null;
    }
    slot.buffer = this.device.createBuffer(totalBytes, `${this.label}-${slot.index}`);
    this.counters.grows += 1;
  }

  private retireSlot(slot: ArenaSlot): void {
    const remove = () => {
      this.dropBlock(slot);
      this.slots = this.slots.filter((candidate) => candidate !== slot);
    };
    const fence = slot.retire;
    if (!fence) {
      remove();
      return;
    }
    void fence.wait().then(remove, remove);
  }

  private dropBlock(slot: ArenaSlot): void {
    if (slot.buffer) {
      this.device.releaseBuffer(slot.buffer);
    }
    slot.buffer = null;
  }

  private assertValid(): void {
    if (this.invalidated) {
      throw new DeviceLost(`${this.label} pool invalidated`);
    }
  }
}
