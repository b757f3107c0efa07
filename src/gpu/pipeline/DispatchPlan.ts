import type { BufferBinding, ComputeDevice, DispatchCommand } from '../backend/ComputeDevice';
import type { BufferRegion } from '../resources/BufferArena';
import type { BufferName } from '../types';

export type PlanKind = 'render' | 'count';

export interface PlanUpload {
  region: BufferRegion;
  data: Uint8Array;
}

/**
 * One frame's bound instantiation of the pipeline graph: the regions carved
 * from the frame's arena, the host data to upload into them, and the
 * dispatch list in execution order. Discarded once the frame completes.
 */
export class DispatchPlan<P> {
  readonly kind: PlanKind;
  readonly dispatches: readonly DispatchCommand<P>[];
  private readonly regionMap: ReadonlyMap<BufferName, BufferRegion>;
  private readonly uploads: readonly PlanUpload[];

  constructor(args: {
    kind: PlanKind;
    regions: ReadonlyMap<BufferName, BufferRegion>;
    uploads: readonly PlanUpload[];
    dispatches: readonly DispatchCommand<P>[];
  }) {
    this.kind = args.kind;
    this.regionMap = args.regions;
    this.uploads = args.uploads;
    this.dispatches = args.dispatches;
  }

  region(name: BufferName): BufferRegion {
    const region = this.regionMap.get(name);
    if (!region) {
      throw new Error(`[DispatchPlan] ${this.kind} plan has no "${name}" region`);
    }
    return region;
  }

  get regions(): BufferRegion[] {
    return [...this.regionMap.values()];
  }

  /**
   * Write the host-side inputs (config, scene, zeroed counters)
   */
  upload(device: ComputeDevice<P>): void {
    for (const { region, data } of this.uploads) {
      if (data.byteLength > region.size) {
        throw new Error(
          `[DispatchPlan] upload of ${data.byteLength} bytes does not fit ${region.name} (${region.size})`
        );
      }
      device.writeBuffer(region.buffer, region.offset, data);
    }
  }

  /**
   * Bindings of the first dispatch for `stage`, in binding order
   */
  bindingsFor(stage: DispatchCommand<P>['stage']): readonly BufferBinding[] {
    return this.dispatches.find((dispatch) => dispatch.stage === stage)?.bindings ?? [];
  }
}
