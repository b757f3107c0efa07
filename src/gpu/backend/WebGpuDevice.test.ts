import { describe, expect, it, vi } from 'vitest';
import { DeviceLost } from '../errors';
import { stageDefinition } from '../pipeline/PipelineGraph';
import {
  BufferUsage,
  SHADER_STAGE_COMPUTE,
  WebGpuDevice,
  storageLayoutEntries,
} from './WebGpuDevice';

const pipeline = { getBindGroupLayout: () => ({}) } as unknown as GPUComputePipeline;

interface FakeBuffer {
  label: string;
  size: number;
  usage: number;
  bytes: Uint8Array;
  destroy: ReturnType<typeof vi.fn>;
  mapAsync: ReturnType<typeof vi.fn>;
  getMappedRange: () => ArrayBuffer;
  unmap: ReturnType<typeof vi.fn>;
}

function createFakeGpu() {
  const buffers: FakeBuffer[] = [];
  let loseDevice: (info: { reason: string; message: string }) => void = () => undefined;
  const pass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    dispatchWorkgroups: vi.fn(),
    end: vi.fn(),
  };
  const encoder = {
    beginComputePass: vi.fn(() => pass),
    copyBufferToBuffer: vi.fn(),
    resolveQuerySet: vi.fn(),
    finish: vi.fn(() => ({})),
  };
  const queue = {
    writeBuffer: vi.fn(),
    submit: vi.fn(),
    onSubmittedWorkDone: vi.fn(() => Promise.resolve()),
  };

  const gpuDevice = {
    label: '',
    features: new Set<string>(),
    limits: {
      maxBufferSize: 4096,
      minStorageBufferOffsetAlignment: 256,
      maxComputeWorkgroupsPerDimension: 65535,
      maxTextureDimension2D: 2048,
    },
    lost: new Promise<{ reason: string; message: string }>((resolve) => {
      loseDevice = resolve;
    }),
    queue,
    createBuffer: vi.fn((desc: { label?: string; size: number; usage: number }) => {
      const bytes = new Uint8Array(desc.size);
      if (desc.usage & BufferUsage.MAP_READ) {
        bytes.forEach((_, i) => {
          bytes[i] = i + 1;
        });
      }
      const buffer: FakeBuffer = {
        label: desc.label ?? '',
        size: desc.size,
        usage: desc.usage,
        bytes,
        destroy: vi.fn(),
        mapAsync: vi.fn(() => Promise.resolve()),
        getMappedRange: () => bytes.buffer,
        unmap: vi.fn(),
      };
      buffers.push(buffer);
      return buffer;
    }),
    createCommandEncoder: vi.fn(() => encoder),
    createBindGroup: vi.fn((_descriptor: { entries: unknown[] }) => ({})),
    createShaderModule: vi.fn((_descriptor: { label: string; code: string }) => ({})),
    createBindGroupLayout: vi.fn((_descriptor: { entries: GPUBindGroupLayoutEntry[] }) => ({})),
    createPipelineLayout: vi.fn((_descriptor: { bindGroupLayouts: unknown[] }) => ({})),
    createComputePipeline: vi.fn(
      (_descriptor: { label: string; compute: { entryPoint: string } }) => pipeline
    ),
    destroy: vi.fn(),
  };

  return {
    device: gpuDevice as unknown as GPUDevice,
    gpuDevice,
    buffers,
    pass,
    encoder,
    queue,
    lose: (reason: string, message: string = '') => loseDevice({ reason, message }),
  };
}

describe('WebGpuDevice', () => {
  it('takes limits from the device and labels it when unnamed', () => {
    const { device } = createFakeGpu();
    const webgpu = new WebGpuDevice(device, { memoryBudgetBytes: 8192 });

    expect(webgpu.info.label).toBe('webgpu-device');
    expect(webgpu.info.limits).toEqual({
      maxBufferSize: 4096,
      minStorageBufferOffsetAlignment: 256,
      maxComputeWorkgroupsPerDimension: 65535,
      maxTextureDimension2D: 2048,
      memoryBudgetBytes: 8192,
    });
  });

  it('creates storage buffers and destroys them on release', () => {
    const { device, buffers } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);

    const buffer = webgpu.createBuffer(10, 'arena');

    expect(buffer.size).toBe(12);
    expect(buffers[0]?.usage).toBe(
      BufferUsage.STORAGE | BufferUsage.COPY_SRC | BufferUsage.COPY_DST
    );
    expect(webgpu.allocatedBytes()).toBe(12);

    webgpu.releaseBuffer(buffer);
    expect(buffers[0]?.destroy).toHaveBeenCalledTimes(1);
    expect(webgpu.allocatedBytes()).toBe(0);
  });

  it('refuses buffers past the device limit', () => {
    const { device } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);

    expect(() => webgpu.createBuffer(5000, 'huge')).toThrow(
      '[WebGpuDevice] huge: 5000 bytes exceeds maxBufferSize 4096'
    );
  });

  it('encodes one compute pass per dispatch and signals after the queue drains', async () => {
    const { device, pass, encoder, queue, gpuDevice } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);
    const buffer = webgpu.createBuffer(512, 'arena');

    const submission = webgpu.submit([
      {
        stage: 'element',
        program: pipeline,
        bindings: [
          { name: 'config', buffer, offset: 0, size: 64, access: 'read' },
          { name: 'bump', buffer, offset: 256, size: 32, access: 'read-write' },
        ],
        workgroups: [2, 3, 1],
      },
    ]);
    await submission.fence.wait();

    expect(encoder.beginComputePass).toHaveBeenCalledWith({
      label: 'webgpu-device:submission-1:element',
      timestampWrites: undefined,
    });
    expect(pass.setPipeline).toHaveBeenCalledWith(pipeline);
    expect(pass.dispatchWorkgroups).toHaveBeenCalledWith(2, 3, 1);
    expect(gpuDevice.createBindGroup.mock.calls[0]?.[0].entries).toEqual([
      { binding: 0, resource: { buffer: expect.anything(), offset: 0, size: 64 } },
      { binding: 1, resource: { buffer: expect.anything(), offset: 256, size: 32 } },
    ]);
    expect(queue.submit).toHaveBeenCalledTimes(1);
    expect(submission.timings).toEqual([]);
    expect(submission.fence.isSignaled).toBe(true);
  });

  it('reads back through a mapped staging buffer', async () => {
    const { device, buffers, encoder } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);
    const buffer = webgpu.createBuffer(64, 'arena');

    const bytes = await webgpu.readBuffer(buffer, 16, 6);

    const staging = buffers[1];
    expect(staging?.size).toBe(8);
    expect(encoder.copyBufferToBuffer).toHaveBeenCalledWith(buffers[0], 16, staging, 0, 8);
    expect(Array.from(bytes)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(staging?.unmap).toHaveBeenCalledTimes(1);
    expect(staging?.destroy).toHaveBeenCalledTimes(1);
  });

  it('reports device loss with the driver message', async () => {
    const { device, lose } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);

    lose('unknown', 'GPU process crashed');

    await expect(webgpu.lost).resolves.toEqual({ reason: 'GPU process crashed' });
    expect(webgpu.isLost).toBe(true);
    expect(() => webgpu.createBuffer(16, 'late')).toThrow(DeviceLost);
  });

  it('uploads through the queue', () => {
    const { device, queue } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);
    const buffer = webgpu.createBuffer(64, 'arena');

    webgpu.writeBuffer(buffer, 8, new Uint8Array([1, 2, 3, 4]));

    expect(queue.writeBuffer).toHaveBeenCalledTimes(1);
    expect(queue.writeBuffer.mock.calls[0]?.[1]).toBe(8);
  });

  it('lays out every stage binding as read-write storage', () => {
    const { device, gpuDevice } = createFakeGpu();
    const webgpu = new WebGpuDevice(device);

    const program = webgpu.createProgram({ stage: 'element', code: '// element' });

    expect(program).toBe(pipeline);
    // element reads config and scene, yet shares one arena buffer with its writes
    expect(stageDefinition('element').bindings.map((binding) => binding.access)).toEqual([
      'read',
      'read',
      'read-write',
      'read-write',
      'read-write',
    ]);
    expect(gpuDevice.createBindGroupLayout.mock.calls[0]?.[0].entries).toEqual(
      [0, 1, 2, 3, 4].map((binding) => ({
        binding,
        visibility: SHADER_STAGE_COMPUTE,
        buffer: { type: 'storage' },
      }))
    );
    expect(gpuDevice.createPipelineLayout).toHaveBeenCalledTimes(1);
    expect(gpuDevice.createComputePipeline.mock.calls[0]?.[0].label).toBe(
      'webgpu-device:element'
    );
    expect(gpuDevice.createComputePipeline.mock.calls[0]?.[0].compute.entryPoint).toBe('main');
  });

  it('sizes layouts from the stage binding lists', () => {
    expect(storageLayoutEntries('fine')).toHaveLength(6);
    expect(storageLayoutEntries('count')).toHaveLength(5);
    expect(storageLayoutEntries('coarse').every((entry) => entry.buffer?.type === 'storage')).toBe(
      true
    );
  });
});
