/**
 * Capability interface over a compute backend: allocate, submit, fence,
 * read back. The orchestrator only ever talks to this; backends are picked
 * once when the device is created.
 */

import type {
  BufferName,
  DispatchTiming,
  ProgramStageName,
  WorkgroupCount,
} from '../types';
import type { Fence } from './Fence';

export type DeviceBackend = 'cpu' | 'webgpu';

export interface DeviceLimits {
  maxBufferSize: number;
  minStorageBufferOffsetAlignment: number;
  maxComputeWorkgroupsPerDimension: number;
  /** Largest render target edge the device accepts */
  maxTextureDimension2D: number;
  /** Total bytes `createBuffer` may hold at once */
  memoryBudgetBytes: number;
}

export interface DeviceInfo {
  backend: DeviceBackend;
  label: string;
  limits: DeviceLimits;
}

export interface DeviceBuffer {
  readonly id: number;
  readonly size: number;
  readonly label: string;
}

export type BindingAccess = 'read' | 'read-write';

export interface BufferBinding {
  name: BufferName;
  buffer: DeviceBuffer;
  offset: number;
  size: number;
  access: BindingAccess;
}

export interface DispatchCommand<P> {
  stage: ProgramStageName;
  program: P;
  bindings: readonly BufferBinding[];
  workgroups: WorkgroupCount;
}

/**
 * Handle for one submitted dispatch sequence. `timings` fills in once the
 * fence has signaled, and stays empty on backends without timing support.
 */
export interface Submission {
  readonly id: number;
  readonly fence: Fence;
  readonly timings: readonly DispatchTiming[];
}

export interface DeviceLossInfo {
  reason: string;
}

export interface ComputeDevice<P> {
  readonly info: DeviceInfo;
  /** Resolves once, when the device becomes unusable */
  readonly lost: Promise<DeviceLossInfo>;
  readonly isLost: boolean;

  createBuffer(size: number, label: string): DeviceBuffer;
  releaseBuffer(buffer: DeviceBuffer): void;
  writeBuffer(buffer: DeviceBuffer, offset: number, data: Uint8Array): void;
  /** Dispatches run in order; each observes every write of the ones before it */
  submit(dispatches: readonly DispatchCommand<P>[]): Submission;
  /** Ordered after every submission made before the call */
  readBuffer(buffer: DeviceBuffer, offset: number, size: number): Promise<Uint8Array>;
  allocatedBytes(): number;
  destroy(): void;
}

export const DEFAULT_DEVICE_LIMITS: DeviceLimits = {
  maxBufferSize: 256 * 1024 * 1024,
  minStorageBufferOffsetAlignment: 256,
  maxComputeWorkgroupsPerDimension: 65535,
  maxTextureDimension2D: 8192,
  memoryBudgetBytes: 1024 * 1024 * 1024,
};
