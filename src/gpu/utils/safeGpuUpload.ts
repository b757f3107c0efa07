export const DEFAULT_MAX_CHUNK_BYTES = 64 * 1024 * 1024; // 64MB

function assertFourByteAligned(value: number, label: string): void {
  if (value % 4 !== 0) {
    throw new Error(`[safeGpuUpload] ${label} must be 4-byte aligned, got ${value}`);
  }
}

/**
 * ArrayBuffer holding `src`, copied only when the view sits on shared memory
 */
function backingArrayBuffer(src: Uint8Array): { buffer: ArrayBuffer; byteOffset: number } {
  if (src.buffer instanceof ArrayBuffer) {
    return { buffer: src.buffer, byteOffset: src.byteOffset };
  }
  const copy = new ArrayBuffer(src.byteLength);
  new Uint8Array(copy).set(src);
  return { buffer: copy, byteOffset: 0 };
}

export function getMaxChunkBytes(device: GPUDevice): number {
  const max = Math.min(device.limits.maxBufferSize, DEFAULT_MAX_CHUNK_BYTES);
  // WebGPU requires writeBuffer size/dataOffset to be multiples of 4.
  return max - (max % 4);
}

/**
 * Upload `src` at `dstOffset`, splitting large writes into chunks. A source
 * whose length is not a multiple of 4 gets its tail zero-padded.
 */
export function safeWriteBuffer(args: {
  device: GPUDevice;
  dstBuffer: GPUBuffer;
  dstOffset: number;
  src: Uint8Array;
  label: string;
}): void {
  const { device, dstBuffer, dstOffset, src, label } = args;
  if (src.byteLength === 0) {
    return;
  }

  assertFourByteAligned(dstOffset, `${label}: dstOffset`);

  const alignedLength = src.byteLength - (src.byteLength % 4);
  const paddedSize = alignedLength === src.byteLength ? alignedLength : alignedLength + 4;
  if (dstOffset + paddedSize > dstBuffer.size) {
    throw new Error(
      `[safeGpuUpload] ${label}: write out of bounds (dstOffset=${dstOffset}, size=${paddedSize}, dstSize=${dstBuffer.size})`
    );
  }

  const maxChunkBytes = getMaxChunkBytes(device);
  if (maxChunkBytes <= 0) {
    throw new Error(`[safeGpuUpload] ${label}: invalid maxChunkBytes=${maxChunkBytes}`);
  }

  const { buffer, byteOffset } = backingArrayBuffer(src);
  let written = 0;
  while (written < alignedLength) {
    const chunkSize = Math.min(alignedLength - written, maxChunkBytes);
    device.queue.writeBuffer(
      dstBuffer,
      dstOffset + written,
      buffer,
      byteOffset + written,
      chunkSize
    );
    written += chunkSize;
  }

  if (alignedLength < src.byteLength) {
    const tail = new ArrayBuffer(4);
    new Uint8Array(tail).set(src.subarray(alignedLength));
    device.queue.writeBuffer(dstBuffer, dstOffset + alignedLength, tail, 0, 4);
  }
}
