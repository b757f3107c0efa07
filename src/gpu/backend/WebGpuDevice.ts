/**
 * WebGpuDevice - ComputeDevice adapter over a WebGPU GPUDevice
 *
 * Programs are compiled compute pipelines whose bind group 0 lists the
 * dispatch bindings in order. Per-pass timings come from timestamp queries
 * when the device has them.
 *
 * Every stage binds sub-ranges of one arena buffer, and a usage scope may not
 * mix `storage` with `read-only-storage` on the same buffer. Programs built by
 * `createProgram` therefore get an explicit layout with every binding as
 * `storage`, and their WGSL must declare each binding `var<storage, read_write>`,
 * including those the stage only reads.
 */

import { AllocationError, DeviceLost } from '../errors';
import { stageDefinition } from '../pipeline/PipelineGraph';
import type { DispatchTiming, ProgramStageName } from '../types';
import { alignTo } from '../utils/align';
import { safeWriteBuffer } from '../utils/safeGpuUpload';
import {
  DEFAULT_DEVICE_LIMITS,
  type ComputeDevice,
  type DeviceBuffer,
  type DeviceInfo,
  type DeviceLossInfo,
  type DispatchCommand,
  type Submission,
} from './ComputeDevice';
import { Fence } from './Fence';

// GPUBufferUsage / GPUMapMode values; the globals only exist in browsers
export const BufferUsage = {
  MAP_READ: 0x0001,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  STORAGE: 0x0080,
  QUERY_RESOLVE: 0x0200,
} as const;
export const MAP_MODE_READ = 0x0001;
export const SHADER_STAGE_COMPUTE = 0x4;

const STORAGE_USAGE = BufferUsage.STORAGE | BufferUsage.COPY_SRC | BufferUsage.COPY_DST;
const READBACK_USAGE = BufferUsage.MAP_READ | BufferUsage.COPY_DST;

export interface WebGpuDeviceOptions {
  label?: string;
  memoryBudgetBytes?: number;
}

export interface WebGpuProgramDescriptor {
  stage: ProgramStageName;
  /** WGSL source; bindings are `@group(0) @binding(i)` in stage order */
  code: string;
  entryPoint?: string;
  label?: string;
}

/**
 * Bind group 0 layout for a stage: one read-write storage entry per binding
 */
export function storageLayoutEntries(stage: ProgramStageName): GPUBindGroupLayoutEntry[] {
  return stageDefinition(stage).bindings.map((_binding, index): GPUBindGroupLayoutEntry => ({
    binding: index,
    visibility: SHADER_STAGE_COMPUTE,
    buffer: { type: 'storage' },
  }));
}

export interface RequestWebGpuDeviceOptions extends WebGpuDeviceOptions {
  powerPreference?: GPUPowerPreference;
}

interface TimestampQuery {
  querySet: GPUQuerySet;
  resolveBuffer: GPUBuffer;
  readbackBuffer: GPUBuffer;
}

export class WebGpuDevice implements ComputeDevice<GPUComputePipeline> {
  readonly info: DeviceInfo;
  readonly lost: Promise<DeviceLossInfo>;

  private readonly device: GPUDevice;
  private readonly buffers = new Map<number, GPUBuffer>();
  private readonly timestampsSupported: boolean;
  private nextBufferId = 1;
  private nextSubmissionId = 1;
  private allocated = 0;
  private lossReason: string | null = null;

  /**
   * Request an adapter and device from `gpu` (navigator.gpu, or the
   * object exported by a Node WebGPU binding)
   */
  static async request(gpu: GPU, options: RequestWebGpuDeviceOptions = {}): Promise<WebGpuDevice> {
    const adapter = await gpu.requestAdapter({
      powerPreference: options.powerPreference ?? 'high-performance',
    });
    if (!adapter) {
      throw new Error('[WebGpuDevice] No suitable GPU adapter found');
    }

    const requiredFeatures: GPUFeatureName[] = [];
    // Optional: timestamp-query for per-stage timings
    if (adapter.features.has('timestamp-query')) {
      requiredFeatures.push('timestamp-query');
    }

    const device = await adapter.requestDevice({
      requiredFeatures,
      requiredLimits: {
        maxBufferSize: Math.min(adapter.limits.maxBufferSize, DEFAULT_DEVICE_LIMITS.maxBufferSize),
        maxStorageBufferBindingSize: Math.min(
          adapter.limits.maxStorageBufferBindingSize,
          DEFAULT_DEVICE_LIMITS.maxBufferSize
        ),
      },
    });
    console.log('[WebGpuDevice] Device initialized', {
      features: requiredFeatures,
      maxBufferSize: device.limits.maxBufferSize,
    });
    return new WebGpuDevice(device, options);
  }

  constructor(device: GPUDevice, options: WebGpuDeviceOptions = {}) {
    this.device = device;
    this.timestampsSupported = device.features.has('timestamp-query');
    this.info = {
      backend: 'webgpu',
      label: options.label ?? (device.label || 'webgpu-device'),
      limits: {
        maxBufferSize: device.limits.maxBufferSize,
        minStorageBufferOffsetAlignment: device.limits.minStorageBufferOffsetAlignment,
        maxComputeWorkgroupsPerDimension: device.limits.maxComputeWorkgroupsPerDimension,
        maxTextureDimension2D: device.limits.maxTextureDimension2D,
        memoryBudgetBytes: options.memoryBudgetBytes ?? DEFAULT_DEVICE_LIMITS.memoryBudgetBytes,
      },
    };
    this.lost = device.lost.then((info) => {
      const reason = info.message || info.reason || 'unknown';
      this.lossReason = reason;
      return { reason };
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
        `[WebGpuDevice] ${label}: ${bytes} bytes exceeds maxBufferSize ${maxBufferSize}`
      );
    }
    if (this.allocated + bytes > memoryBudgetBytes) {
      throw new AllocationError(
        bytes,
        `[WebGpuDevice] ${label}: ${bytes} bytes exceeds remaining budget ${memoryBudgetBytes - this.allocated}`
      );
    }

    const gpuBuffer = this.device.createBuffer({ label, size: bytes, usage: STORAGE_USAGE });
    const buffer: DeviceBuffer = { id: this.nextBufferId++, size: bytes, label };
    this.buffers.set(buffer.id, gpuBuffer);
    this.allocated += bytes;
    return buffer;
  }

  createProgram(descriptor: WebGpuProgramDescriptor): GPUComputePipeline {
    this.assertUsable();
    const label = descriptor.label ?? `${this.info.label}:${descriptor.stage}`;
    const module = this.device.createShaderModule({ label, code: descriptor.code });
    const bindGroupLayout = this.device.createBindGroupLayout({
      label,
      entries: storageLayoutEntries(descriptor.stage),
    });
    return this.device.createComputePipeline({
      label,
      layout: this.device.createPipelineLayout({ label, bindGroupLayouts: [bindGroupLayout] }),
      compute: { module, entryPoint: descriptor.entryPoint ?? 'main' },
    });
  }

  releaseBuffer(buffer: DeviceBuffer): void {
    const gpuBuffer = this.buffers.get(buffer.id);
    if (!gpuBuffer) return;
    gpuBuffer.destroy();
    this.buffers.delete(buffer.id);
    this.allocated -= buffer.size;
  }

  writeBuffer(buffer: DeviceBuffer, offset: number, data: Uint8Array): void {
    this.assertUsable();
    safeWriteBuffer({
      device: this.device,
      dstBuffer: this.gpuBufferOf(buffer),
      dstOffset: offset,
      src: data,
      label: buffer.label,
    });
  }

  submit(dispatches: readonly DispatchCommand<GPUComputePipeline>[]): Submission {
    this.assertUsable();
    const id = this.nextSubmissionId++;
    const label = `${this.info.label}:submission-${id}`;
    const timings: DispatchTiming[] = [];
    const query = this.createTimestampQuery(dispatches.length);

    const encoder = this.device.createCommandEncoder({ label });
    dispatches.forEach((dispatch, index) => {
      const pass = encoder.beginComputePass({
        label: `${label}:${dispatch.stage}`,
        timestampWrites: query
          ? {
              querySet: query.querySet,
              beginningOfPassWriteIndex: index * 2,
              endOfPassWriteIndex: index * 2 + 1,
            }
          : undefined,
      });
      pass.setPipeline(dispatch.program);
      pass.setBindGroup(
        0,
        this.device.createBindGroup({
          label: `${label}:${dispatch.stage}`,
          layout: dispatch.program.getBindGroupLayout(0),
          entries: dispatch.bindings.map((binding, bindingIndex) => ({
            binding: bindingIndex,
            resource: {
              buffer: this.gpuBufferOf(binding.buffer),
              offset: binding.offset,
              size: binding.size,
            },
          })),
        })
      );
      const [x, y, z] = dispatch.workgroups;
      pass.dispatchWorkgroups(x, y, z);
      pass.end();
    });

    if (query) {
      const byteLength = dispatches.length * 2 * 8;
      encoder.resolveQuerySet(query.querySet, 0, dispatches.length * 2, query.resolveBuffer, 0);
      encoder.copyBufferToBuffer(query.resolveBuffer, 0, query.readbackBuffer, 0, byteLength);
    }
    this.device.queue.submit([encoder.finish()]);

    const completion = this.device.queue.onSubmittedWorkDone().then(async () => {
      if (query) {
        await this.collectTimings(query, dispatches, timings);
      }
    });
    return { id, fence: Fence.after(completion, label), timings };
  }

  async readBuffer(buffer: DeviceBuffer, offset: number, size: number): Promise<Uint8Array> {
    this.assertUsable();
    const source = this.gpuBufferOf(buffer);
    const staging = this.device.createBuffer({
      label: `${buffer.label}:readback`,
      size: alignTo(size, 4),
      usage: READBACK_USAGE,
    });

    try {
      const encoder = this.device.createCommandEncoder({ label: `${buffer.label}:readback` });
      encoder.copyBufferToBuffer(source, offset, staging, 0, alignTo(size, 4));
      this.device.queue.submit([encoder.finish()]);

      await staging.mapAsync(MAP_MODE_READ);
      const bytes = new Uint8Array(staging.getMappedRange(0, alignTo(size, 4))).slice(0, size);
      staging.unmap();
      return bytes;
    } catch (error) {
      if (this.lossReason !== null) {
        throw new DeviceLost(this.lossReason);
      }
      throw error;
    } finally {
      staging.destroy();
    }
  }

  allocatedBytes(): number {
    return this.allocated;
  }

  destroy(): void {
    for (const gpuBuffer of this.buffers.values()) {
      gpuBuffer.destroy();
    }
    this.buffers.clear();
    this.allocated = 0;
    this.device.destroy();
  }

  private assertUsable(): void {
    if (this.lossReason !== null) {
      throw new DeviceLost(this.lossReason);
    }
  }

  private gpuBufferOf(buffer: DeviceBuffer): GPUBuffer {
    const gpuBuffer = this.buffers.get(buffer.id);
    if (!gpuBuffer) {
      throw new Error(`[WebGpuDevice] ${buffer.label}: buffer ${buffer.id} was released`);
    }
    return gpuBuffer;
  }

  private createTimestampQuery(dispatchCount: number): TimestampQuery | null {
    if (!this.timestampsSupported || dispatchCount === 0) {
      return null;
    }
    const count = dispatchCount * 2;
    return {
      querySet: this.device.createQuerySet({ type: 'timestamp', count }),
      resolveBuffer: this.device.createBuffer({
        size: count * 8,
        usage: BufferUsage.QUERY_RESOLVE | BufferUsage.COPY_SRC,
      }),
      readbackBuffer: this.device.createBuffer({ size: count * 8, usage: READBACK_USAGE }),
    };
  }

  private async collectTimings(
    query: TimestampQuery,
    dispatches: readonly DispatchCommand<GPUComputePipeline>[],
    timings: DispatchTiming[]
  ): Promise<void> {
    try {
      await query.readbackBuffer.mapAsync(MAP_MODE_READ);
      const data = new BigUint64Array(query.readbackBuffer.getMappedRange());
      dispatches.forEach((dispatch, index) => {
        const start = data[index * 2] ?? BigInt(0);
        const end = data[index * 2 + 1] ?? BigInt(0);
        // Convert nanoseconds to milliseconds
        timings.push({ stage: dispatch.stage, durationMs: Number(end - start) / 1_000_000 });
      });
      query.readbackBuffer.unmap();
    } catch (error) {
      // Timings are optional; the submission itself completed
      console.warn('[WebGpuDevice] Timestamp readback failed:', error);
    } finally {
      query.querySet.destroy();
      query.resolveBuffer.destroy();
      query.readbackBuffer.destroy();
    }
  }
}
