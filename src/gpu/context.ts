/**
 * RenderContext - owns the device, its arena pool, the program set and the
 * renderer settings
 *
 * One context per device. Once the device is lost the context is unusable:
 * the pool is invalidated and every later render fails with DeviceLost.
 */

import {
  createRendererSettingsStore,
  type RendererSettingsStore,
} from '@/stores/settings';
import type { ComputeDevice, DeviceLossInfo } from './backend/ComputeDevice';
import { DeviceLost } from './errors';
import { CountingPass } from './pipeline/CountingPass';
import { PipelineGraph, type StagePrograms } from './pipeline/PipelineGraph';
import { ArenaPool } from './resources/ArenaPool';
import type { RenderConfig } from './types';

export interface RenderContextOptions<P> {
  device: ComputeDevice<P>;
  programs: StagePrograms<P>;
  settings?: RendererSettingsStore;
  label?: string;
}

export class RenderContext<P> {
  readonly device: ComputeDevice<P>;
  readonly pool: ArenaPool;
  readonly graph = new PipelineGraph();
  readonly settings: RendererSettingsStore;
  readonly label: string;

  private currentPrograms: StagePrograms<P>;
  private lossInfo: DeviceLossInfo | null = null;
  private unsubscribe: (() => void) | null;

  constructor(options: RenderContextOptions<P>) {
    this.device = options.device;
    this.currentPrograms = options.programs;
    this.settings = options.settings ?? createRendererSettingsStore();
    this.label = options.label ?? options.device.info.label;
    this.pool = new ArenaPool(options.device, {
      depth: this.settings.getState().poolDepth,
      label: `${this.label}-arena`,
    });

    this.unsubscribe = this.settings.subscribe((state, previous) => {
      if (state.poolDepth !== previous.poolDepth && !this.pool.isInvalidated) {
        this.pool.setDepth(state.poolDepth);
      }
    });

    void this.device.lost.then((info) => {
      console.error(`[RenderContext] ${this.label}: device lost:`, info.reason);
      this.lossInfo = info;
      this.pool.invalidate(info.reason);
    });
  }

  get programs(): StagePrograms<P> {
    return this.currentPrograms;
  }

  /**
   * Swap compiled programs. Takes effect for the next render call; frames
   * already planned keep the handles they were built with.
   */
  setPrograms(programs: StagePrograms<P>): void {
    this.assertUsable();
    this.currentPrograms = programs;
  }

  /**
   * Config for a `width` x `height` frame using the default antialiasing
   * from settings
   */
  defaultConfig(
    width: number,
    height: number,
    overrides: Partial<Omit<RenderConfig, 'width' | 'height'>> = {}
  ): RenderConfig {
    return {
      width,
      height,
      antialiasing: this.settings.getState().antialiasing,
      baseColor: { r: 0, g: 0, b: 0, a: 0 },
      format: 'rgba8unorm',
      ...overrides,
    };
  }

  get isLost(): boolean {
    return this.lossInfo !== null || this.device.isLost;
  }

  assertUsable(): void {
    if (this.lossInfo) {
      throw new DeviceLost(this.lossInfo.reason);
    }
    if (this.device.isLost) {
      throw new DeviceLost(`${this.label} device is no longer usable`);
    }
  }

  createCountingPass(programs: StagePrograms<P> = this.currentPrograms): CountingPass<P> {
    return new CountingPass(this.device, this.pool, this.graph, programs);
  }

  /**
   * Stop following settings and destroy the device
   */
  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.pool.invalidate('context disposed');
    this.device.destroy();
  }
}
