/**
 * CountingPass - the device round-trip behind dynamic estimation
 *
 * Runs element -> count in a scratch arena, waits for the fence and reads
 * back the exact bump-buffer totals.
 */

import type { ComputeDevice, Submission } from '../backend/ComputeDevice';
import { Fence } from '../backend/Fence';
import { EstimationError, UnsupportedConfig } from '../errors';
import type { ArenaPool } from '../resources/ArenaPool';
import type { Arena } from '../resources/BufferArena';
import type { BufferCounts, DispatchTiming, RenderConfig, Scene } from '../types';
import { FailureFlag, decodeBufferCounts, decodeBumpDiagnostics } from './layout';
import type { PipelineGraph, StagePrograms } from './PipelineGraph';

export interface CountingResult {
  counts: BufferCounts;
  timings: readonly DispatchTiming[];
}

interface PendingCount {
  submission: Submission;
  readback: Promise<[Uint8Array, Uint8Array]>;
}

export class CountingPass<P> {
  constructor(
    private readonly device: ComputeDevice<P>,
    private readonly pool: ArenaPool,
    private readonly graph: PipelineGraph,
    private readonly programs: StagePrograms<P>
  ) {}

  async run(scene: Scene, config: RenderConfig): Promise<CountingResult> {
    const { minStorageBufferOffsetAlignment, maxBufferSize } = this.device.info.limits;
    const arenaBytes = this.graph.countingArenaBytes(scene, minStorageBufferOffsetAlignment);
    if (arenaBytes > maxBufferSize) {
      throw new UnsupportedConfig(
        `counting pass needs ${arenaBytes} arena bytes, device maxBufferSize is ${maxBufferSize}`
      );
    }
    const arena = await this.pool.acquire(arenaBytes);

    let pending: PendingCount;
    try {
      pending = this.submit(arena, scene, config);
    } catch (error) {
      arena.release(Fence.signaled('counting-aborted'));
      throw error;
    }
    // The scratch arena is reusable once both reads have landed
    arena.release(Fence.after(pending.readback, 'counting-readback'));

    const [, [bumpBytes, countsBytes]] = await Promise.all([
      pending.submission.fence.wait(),
      pending.readback,
    ]);
    const diagnostics = decodeBumpDiagnostics(bumpBytes);
    if (diagnostics.failed & FailureFlag.malformedScene) {
      throw new EstimationError(
        `scene stream does not match its summary (decoded ${diagnostics.drawObjects} draw objects, ${diagnostics.segments} segments)`
      );
    }
    return { counts: decodeBufferCounts(countsBytes), timings: pending.submission.timings };
  }

  private submit(arena: Arena, scene: Scene, config: RenderConfig): PendingCount {
    const plan = this.graph.instantiateCounting({ arena, scene, config, programs: this.programs });
    plan.upload(this.device);
    const submission = this.device.submit(plan.dispatches);

    const bump = plan.region('bump');
    const counts = plan.region('counts');
    const readback = Promise.all([
      this.device.readBuffer(bump.buffer, bump.offset, bump.size),
      this.device.readBuffer(counts.buffer, counts.offset, counts.size),
    ]);
    return { submission, readback };
  }
}
