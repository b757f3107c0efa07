/**
 * CpuDevice - reference compute backend running the CPU stage programs
 *
 * Buffers are host-visible: `writeBuffer` lands immediately, while
 * submissions and readbacks execute later in queue order. Writing into a
 * region that queued work still uses is therefore a real hazard here, just
 * as it is with mapped GPU memory.
 */

import { AllocationError, DeviceLost } from '../errors';
import type { CpuBindings, CpuProgram } from '../kernels/types';
import type { BufferName, DispatchTiming } from '../types';
import { alignTo } from '../utils/align';
import {
  DEFAULT_DEVICE_LIMITS,
  type BufferBinding,
  type ComputeDevice,
  type DeviceBuffer,
  type DeviceInfo,
  type DeviceLimits,
  type DeviceLossInfo,
  type DispatchCommand,
  type Submission,
} from './ComputeDevice';
import { Fence } from './Fence';

export interface CpuDeviceOptions {
  label?: string;
  /** Delay before each queued submission or readback executes */
  latencyMs?: number;
  limits?: Partial<DeviceLimits>;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CpuDevice implements ComputeDevice<CpuProgram> {
  readonly info: DeviceInfo;
  readonly lost: Promise<DeviceLossInfo>;

  private readonly latencyMs: number;
  private readonly storage = new Map<number, Uint8Array>();
  private nextBufferId = 1;
  private nextSubmissionId = 1;
  private allocated = 0;
  private queueTail: Promise<void> = Promise.resolve();
  private lossReason: string | null = null;
  private resolveLost: (info: DeviceLossInfo) => void = () => undefined;

  constructor(options: CpuDeviceOptions = {}) {
    this.info = {
      backend: 'cpu',
      label: options.label ?? 'cpu-device',
      limits: { ...DEFAULT_DEVICE_LIMITS, ...options.limits },
    };
    this.latencyMs = Math.max(0, options.latencyMs ?? 0);
    this.lost = new Promise((resolve) => {
      this.resolveLost = resolve;
    });
  }

  get isLost(): boolean {
    return this.lossReason !== null;
  }

  createBuffer(size: number, label: string): DeviceBuffer {
    this.assertUsable();
    const bytes = alignTo(Math.max(4, Math.ceil(size)), 4);
    const { maxBufferSize, memoryBudgetBytes } = this.info.limits;
    if (bytes > maxBufferSize) {
      throw new AllocationError(
        bytes,
        `[CpuDevice] ${label}: ${bytes} bytes exceeds maxBufferSize ${maxBufferSize}`
      );
    }
    if (this.allocated + bytes > memoryBudgetBytes) {
      throw new AllocationError(
        bytes,
        `[CpuDevice] ${label}: ${bytes} bytes exceeds remaining budget ${memoryBudgetBytes - this.allocated}`
      );
    }

    const buffer: DeviceBuffer = { id: this.nextBufferId++, size: bytes, label };
    this.storage.set(buffer.id, new Uint8Array(bytes));
    this.allocated += bytes;
    return buffer;
  }

  releaseBuffer(buffer: DeviceBuffer): void {
    if (this.storage.delete(buffer.id)) {
      this.allocated -= buffer.size;
    }
  }

  writeBuffer(buffer: DeviceBuffer, offset: number, data: Uint8Array): void {
    this.assertUsable();
    const bytes = this.bytesOf(buffer);
    if (offset < 0 || offset + data.byteLength > bytes.byteLength) {
      throw new Error(
        `[CpuDevice] ${buffer.label}: write out of bounds (offset=${offset}, size=${data.byteLength}, bufferSize=${bytes.byteLength})`
      );
    }
    bytes.set(data, offset);
  }

  submit(dispatches: readonly DispatchCommand<CpuProgram>[]): Submission {
    this.assertUsable();
    for (const dispatch of dispatches) {
      for (const binding of dispatch.bindings) {
        this.checkBinding(dispatch.stage, binding);
      }
    }

    const id = this.nextSubmissionId++;
    const fence = new Fence(`${this.info.label}:submission-${id}`);
    const timings: DispatchTiming[] = [];

    this.queueTail = this.queueTail.then(async () => {
      if (this.latencyMs > 0) await delay(this.latencyMs);
      if (this.lossReason !== null) {
        fence.fail(new DeviceLost(this.lossReason));
        return;
      }
      try {
        for (const dispatch of dispatches) {
          const start = performance.now();
          dispatch.program.run(this.bindingsFor(dispatch.bindings), dispatch.workgroups);
          timings.push({ stage: dispatch.stage, durationMs: performance.now() - start });
        }
        fence.signal();
      } catch (error) {
        fence.fail(error);
      }
    });

    return { id, fence, timings };
  }

  readBuffer(buffer: DeviceBuffer, offset: number, size: number): Promise<Uint8Array> {
    this.assertUsable();
    const bytes = this.bytesOf(buffer);
    if (offset < 0 || offset + size > bytes.byteLength) {
      return Promise.reject(
        new Error(
          `[CpuDevice] ${buffer.label}: read out of bounds (offset=${offset}, size=${size}, bufferSize=${bytes.byteLength})`
        )
      );
    }

    const result = this.queueTail.then(async () => {
      if (this.latencyMs > 0) await delay(this.latencyMs);
      if (this.lossReason !== null) {
        throw new DeviceLost(this.lossReason);
      }
      return bytes.slice(offset, offset + size);
    });
    // Later work queues behind the read whether or not it succeeded
    this.queueTail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  allocatedBytes(): number {
    return this.allocated;
  }

  /**
   * Simulate losing the device. Queued work that has not run yet fails.
   */
  lose(reason: string = 'lost'): void {
    if (this.lossReason !== null) return;
    this.lossReason = reason;
    this.resolveLost({ reason });
  }

  destroy(): void {
    this.lose('destroyed');
    this.storage.clear();
    this.allocated = 0;
  }

  private assertUsable(): void {
    if (this.lossReason !== null) {
      throw new DeviceLost(this.lossReason);
    }
  }

  private bytesOf(buffer: DeviceBuffer): Uint8Array {
    const bytes = this.storage.get(buffer.id);
    if (!bytes) {
      throw new Error(`[CpuDevice] ${buffer.label}: buffer ${buffer.id} was released`);
    }
    return bytes;
  }

  private checkBinding(stage: string, binding: BufferBinding): void {
    const bytes = this.bytesOf(binding.buffer);
    const { minStorageBufferOffsetAlignment } = this.info.limits;
    if (binding.offset % minStorageBufferOffsetAlignment !== 0) {
      throw new Error(
        `[CpuDevice] ${stage}: ${binding.name} offset ${binding.offset} is not ${minStorageBufferOffsetAlignment}-byte aligned`
      );
    }
    if (binding.size <= 0 || binding.offset + binding.size > bytes.byteLength) {
      throw new Error(
        `[CpuDevice] ${stage}: ${binding.name} binding out of bounds (offset=${binding.offset}, size=${binding.size}, bufferSize=${bytes.byteLength})`
      );
    }
  }

  private bindingsFor(bindings: readonly BufferBinding[]): CpuBindings {
    const views = new Map<BufferName, DataView>();
    for (const binding of bindings) {
      const bytes = this.bytesOf(binding.buffer);
      views.set(
        binding.name,
        new DataView(bytes.buffer, bytes.byteOffset + binding.offset, binding.size)
      );
    }
    return {
      has: (name) => views.has(name),
      view: (name) => {
        const view = views.get(name);
        if (!view) {
          throw new Error(`[CpuDevice] buffer "${name}" is not bound for this dispatch`);
        }
        return view;
      },
    };
  }
}
