/**
 * Renderer - drives one scene through the pipeline
 *
 * estimate -> acquire arena -> plan -> submit -> read back. When the device
 * reports that a bump-allocated buffer ran out, the frame is resized once
 * (exact counts from the counting pass) and dispatched again; a second
 * overflow is fatal.
 *
 * Arenas go back to the pool right after submission, gated by a fence on the
 * frame's readbacks, so the next frame may plan while this one executes.
 */

import { ANTIALIASING_MODES } from '@/stores/settings';
import type { Submission } from './backend/ComputeDevice';
import { Fence } from './backend/Fence';
import type { RenderContext } from './context';
import {
  ArenaOverflow,
  DeviceLost,
  EstimationError,
  RenderCancelled,
  RenderError,
  RenderOverflow,
  UnsupportedConfig,
} from './errors';
import {
  ResourceEstimator,
  type BufferCounter,
  type SizeEstimator,
} from './estimate/ResourceEstimator';
import { validateSceneSummary } from './estimate/validateSummary';
import type { DispatchPlan } from './pipeline/DispatchPlan';
import type { StagePrograms } from './pipeline/PipelineGraph';
import {
  BIN_ENTRY_BYTES,
  FailureFlag,
  TILE_SEGMENT_BYTES,
  decodeBumpDiagnostics,
} from './pipeline/layout';
import type { Arena } from './resources/BufferArena';
import { RenderStateMachine, type RenderState } from './RenderStateMachine';
import type {
  BumpDiagnostics,
  DispatchTiming,
  EstimationMode,
  OutputFormat,
  RenderConfig,
  RenderedImage,
  Scene,
  SizeEstimate,
  StageTimingHook,
} from './types';
import { fillBackground } from './utils/pixels';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['rgba8unorm', 'bgra8unorm'];

export interface RendererOptions {
  estimator?: SizeEstimator;
  /** Called once per executed dispatch, counting pass included */
  onStageTiming?: StageTimingHook;
}

export interface RenderOptions {
  /** Receives the pixels, only once the frame has fully succeeded */
  target?: Uint8Array;
  /** Checked before each submission; work already submitted runs to completion */
  signal?: AbortSignal;
  /** Overrides the settings store for this call */
  estimationMode?: EstimationMode;
}

export interface RenderOutcome {
  frameId: number;
  image: RenderedImage;
  /** null when the scene was empty and no pipeline ran */
  estimate: SizeEstimate | null;
  /** Pipeline dispatches made: 0 for a clear, 2 after a resize */
  attempts: number;
  shortCircuited: boolean;
  states: readonly RenderState[];
}

export interface RenderMetricsSnapshot {
  renderCount: number;
  completedCount: number;
  shortCircuitCount: number;
  retryCount: number;
  overflowFailureCount: number;
  failureCount: number;
  cancelledCount: number;
  avgFrameMs: number;
  maxFrameMs: number;
  lastError: string | null;
}

interface RenderMetricsAccumulatorState {
  renderCount: number;
  completedCount: number;
  shortCircuitCount: number;
  retryCount: number;
  overflowFailureCount: number;
  failureCount: number;
  cancelledCount: number;
  totalFrameMs: number;
  maxFrameMs: number;
  lastError: string | null;
}

function createEmptyRenderMetricsState(): RenderMetricsAccumulatorState {
  return {
    renderCount: 0,
    completedCount: 0,
    shortCircuitCount: 0,
    retryCount: 0,
    overflowFailureCount: 0,
    failureCount: 0,
    cancelledCount: 0,
    totalFrameMs: 0,
    maxFrameMs: 0,
    lastError: null,
  };
}

interface FrameAttempt {
  readonly frameId: number;
  attempt: number;
}

interface PlannedFrame<P> {
  arena: Arena;
  plan: DispatchPlan<P>;
  estimate: SizeEstimate;
}

interface PendingFrame {
  submission: Submission;
  readback: Promise<[Uint8Array, Uint8Array]>;
}

type FrameResult =
  | { kind: 'completed'; pixels: Uint8Array }
  | { kind: 'overflowed'; diagnostics: BumpDiagnostics; overflow: ArenaOverflow };

/**
 * First buffer the diagnostics flag, as an ArenaOverflow against `estimate`
 */
export function overflowFromDiagnostics(
  diagnostics: BumpDiagnostics,
  estimate: SizeEstimate
): ArenaOverflow {
  if (diagnostics.failed & FailureFlag.binning) {
    return new ArenaOverflow({
      requested: diagnostics.binEntries * BIN_ENTRY_BYTES,
      available: estimate.buffers.binData,
      buffer: 'binData',
    });
  }
  if (diagnostics.failed & FailureFlag.tileSegments) {
    return new ArenaOverflow({
      requested: diagnostics.tileSegments * TILE_SEGMENT_BYTES,
      available: estimate.buffers.tileSegments,
      buffer: 'tileSegments',
    });
  }
  return new ArenaOverflow({
    requested: diagnostics.ptclWords * 4,
    available: estimate.buffers.ptcl,
    buffer: 'ptcl',
  });
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RenderCancelled();
  }
}

export class Renderer {
  private readonly estimator: SizeEstimator;
  private readonly onStageTiming: StageTimingHook | null;
  private metrics: RenderMetricsAccumulatorState = createEmptyRenderMetricsState();
  private nextFrameId = 1;

  constructor(options: RendererOptions = {}) {
    this.estimator = options.estimator ?? new ResourceEstimator();
    this.onStageTiming = options.onStageTiming ?? null;
  }

  async render<P>(
    context: RenderContext<P>,
    scene: Scene,
    config: RenderConfig,
    options: RenderOptions = {}
  ): Promise<RenderOutcome> {
    const frame: FrameAttempt = { frameId: this.nextFrameId++, attempt: 0 };
    const machine = new RenderStateMachine();
    const startedAt = performance.now();
    this.metrics.renderCount += 1;

    try {
      context.assertUsable();
      machine.transition('estimating');
      // Settings and programs are read once; changes apply to the next call
      const settings = context.settings.getState();
      const programs = context.programs;
      this.validateConfig(context, programs, config, options.target);
      validateSceneSummary(scene);
      throwIfAborted(options.signal);

      if (context.graph.isEmpty(scene.summary)) {
        const pixels = fillBackground(config.width, config.height, config.baseColor, config.format);
        machine.transition('completed');
        this.metrics.shortCircuitCount += 1;
        return this.finish(machine, frame, startedAt, config, pixels, null, options.target);
      }

      const counter = this.counterFor(context, programs, frame);
      let estimate = await this.estimator.estimate(scene, config, {
        mode: options.estimationMode ?? settings.estimationMode,
        counter,
        safetyMargin: settings.staticSafetyMargin,
      });

      machine.transition('planning');
      frame.attempt = 1;
      let planned = await this.planFrame(context, programs, scene, config, estimate, options.signal);
      machine.transition('dispatching');
      let result = await this.dispatchFrame(context, planned, config, frame);

      if (result.kind === 'overflowed') {
        machine.transition('overflowed');
        console.warn(
          `[Renderer] frame ${frame.frameId} overflowed ${result.overflow.buffer ?? 'arena'}, resizing`,
          result.diagnostics
        );
        machine.transition('resizing');
        this.metrics.retryCount += 1;
        estimate = await this.estimator.resize(scene, config, {
          previous: estimate,
          diagnostics: result.diagnostics,
          counter,
        });

        frame.attempt = 2;
        // Attempt 1 was submitted, so the call runs to completion from here
        planned = await this.planFrame(context, programs, scene, config, estimate, undefined);
        machine.transition('dispatching');
        result = await this.dispatchFrame(context, planned, config, frame);
        if (result.kind === 'overflowed') {
          this.metrics.overflowFailureCount += 1;
          throw new RenderOverflow(result.overflow);
        }
      }

      machine.transition('completed');
      return this.finish(machine, frame, startedAt, config, result.pixels, estimate, options.target);
    } catch (error) {
      machine.fail();
      if (machine.state === 'failed') {
        machine.transition('idle');
      }
      const normalized = this.normalizeError(context, error);
      this.recordFailure(normalized);
      throw normalized;
    }
  }

  getMetricsSnapshot(): RenderMetricsSnapshot {
    const completed = this.metrics.completedCount;
    return {
      renderCount: this.metrics.renderCount,
      completedCount: completed,
      shortCircuitCount: this.metrics.shortCircuitCount,
      retryCount: this.metrics.retryCount,
      overflowFailureCount: this.metrics.overflowFailureCount,
      failureCount: this.metrics.failureCount,
      cancelledCount: this.metrics.cancelledCount,
      avgFrameMs: completed > 0 ? this.metrics.totalFrameMs / completed : 0,
      maxFrameMs: this.metrics.maxFrameMs,
      lastError: this.metrics.lastError,
    };
  }

  resetMetrics(): void {
    this.metrics = createEmptyRenderMetricsState();
  }

  private validateConfig<P>(
    context: RenderContext<P>,
    programs: StagePrograms<P>,
    config: RenderConfig,
    target: Uint8Array | undefined
  ): void {
    const maxDimension = context.device.info.limits.maxTextureDimension2D;
    const checkDimension = (label: string, value: number) => {
      if (!Number.isInteger(value) || value <= 0 || value > maxDimension) {
        throw new UnsupportedConfig(`${label} must be an integer in [1, ${maxDimension}], got ${value}`);
      }
    };
    checkDimension('width', config.width);
    checkDimension('height', config.height);

    if (!ANTIALIASING_MODES.includes(config.antialiasing)) {
      throw new UnsupportedConfig(`unknown antialiasing mode ${String(config.antialiasing)}`);
    }
    if (!OUTPUT_FORMATS.includes(config.format)) {
      throw new UnsupportedConfig(`unknown output format ${String(config.format)}`);
    }
    // Throws when the device has no fine variant for the mode
    context.graph.programFor(programs, 'fine', config);

    const { r, g, b, a } = config.baseColor;
    for (const channel of [r, g, b, a]) {
      if (!Number.isFinite(channel) || channel < 0 || channel > 1) {
        throw new UnsupportedConfig(`base color channels must be in [0, 1], got ${channel}`);
      }
    }

    const outputBytes = config.width * config.height * 4;
    if (target && target.byteLength < outputBytes) {
      throw new UnsupportedConfig(
        `target holds ${target.byteLength} bytes, frame needs ${outputBytes}`
      );
    }
  }

  /**
   * Counting pass wired to report its timings under the current attempt
   */
  private counterFor<P>(
    context: RenderContext<P>,
    programs: StagePrograms<P>,
    frame: FrameAttempt
  ): BufferCounter {
    return {
      count: async (scene, config) => {
        const result = await context.createCountingPass(programs).run(scene, config);
        this.reportTimings(result.timings, frame);
        return result.counts;
      },
    };
  }

  private async planFrame<P>(
    context: RenderContext<P>,
    programs: StagePrograms<P>,
    scene: Scene,
    config: RenderConfig,
    estimate: SizeEstimate,
    signal: AbortSignal | undefined
  ): Promise<PlannedFrame<P>> {
    throwIfAborted(signal);
    const { minStorageBufferOffsetAlignment, maxBufferSize } = context.device.info.limits;
    const arenaBytes = context.graph.arenaBytes(estimate, minStorageBufferOffsetAlignment);
    // A frame arena is a single device buffer
    if (arenaBytes > maxBufferSize) {
      throw new UnsupportedConfig(
        `${config.width}x${config.height} frame needs ${arenaBytes} arena bytes, device maxBufferSize is ${maxBufferSize}`
      );
    }
    const arena = await context.pool.acquire(arenaBytes);
    try {
      throwIfAborted(signal);
      const plan = context.graph.instantiate({ arena, estimate, scene, config, programs });
      return { arena, plan, estimate };
    } catch (error) {
      // Nothing was written or submitted
      arena.release(Fence.signaled('frame-unused'));
      throw error;
    }
  }

  private async dispatchFrame<P>(
    context: RenderContext<P>,
    planned: PlannedFrame<P>,
    config: RenderConfig,
    frame: FrameAttempt
  ): Promise<FrameResult> {
    const { arena, plan, estimate } = planned;
    let pending: PendingFrame;
    try {
      pending = this.submit(context, plan, config);
    } catch (error) {
      arena.release(Fence.signaled('frame-aborted'));
      throw error;
    }
    arena.release(Fence.after(pending.readback, `frame-${frame.frameId}-${frame.attempt}-readback`));

    const [, [bumpBytes, pixels]] = await Promise.all([
      pending.submission.fence.wait(),
      pending.readback,
    ]);
    this.reportTimings(pending.submission.timings, frame);

    const diagnostics = decodeBumpDiagnostics(bumpBytes);
    if (diagnostics.failed & FailureFlag.malformedScene) {
      throw new EstimationError(
        `scene stream does not match its summary (decoded ${diagnostics.drawObjects} draw objects, ${diagnostics.segments} segments)`
      );
    }
    if (diagnostics.failed !== 0) {
      return {
        kind: 'overflowed',
        diagnostics,
        overflow: overflowFromDiagnostics(diagnostics, estimate),
      };
    }
    return { kind: 'completed', pixels };
  }

  private submit<P>(
    context: RenderContext<P>,
    plan: DispatchPlan<P>,
    config: RenderConfig
  ): PendingFrame {
    plan.upload(context.device);
    const submission = context.device.submit(plan.dispatches);

    const bump = plan.region('bump');
    const output = plan.region('output');
    const readback = Promise.all([
      context.device.readBuffer(bump.buffer, bump.offset, bump.size),
      context.device.readBuffer(output.buffer, output.offset, config.width * config.height * 4),
    ]);
    return { submission, readback };
  }

  private finish(
    machine: RenderStateMachine,
    frame: FrameAttempt,
    startedAt: number,
    config: RenderConfig,
    pixels: Uint8Array,
    estimate: SizeEstimate | null,
    target: Uint8Array | undefined
  ): RenderOutcome {
    if (target) {
      target.set(pixels);
    }
    machine.transition('idle');

    const elapsed = performance.now() - startedAt;
    this.metrics.completedCount += 1;
    this.metrics.totalFrameMs += elapsed;
    this.metrics.maxFrameMs = Math.max(this.metrics.maxFrameMs, elapsed);

    return {
      frameId: frame.frameId,
      image: { width: config.width, height: config.height, format: config.format, pixels },
      estimate,
      attempts: frame.attempt,
      shortCircuited: estimate === null,
      states: machine.history,
    };
  }

  private reportTimings(timings: readonly DispatchTiming[], frame: FrameAttempt): void {
    const hook = this.onStageTiming;
    if (!hook) return;
    for (const timing of timings) {
      try {
        hook({ ...timing, frameId: frame.frameId, attempt: frame.attempt });
      } catch (error) {
        console.warn('[Renderer] stage timing hook threw', error);
      }
    }
  }

  private normalizeError<P>(context: RenderContext<P>, error: unknown): unknown {
    if (error instanceof RenderError) return error;
    if (context.isLost) {
      return new DeviceLost(error instanceof Error ? error.message : String(error));
    }
    return error;
  }

  private recordFailure(error: unknown): void {
    if (error instanceof RenderCancelled) {
      this.metrics.cancelledCount += 1;
    } else {
      this.metrics.failureCount += 1;
    }
    this.metrics.lastError = error instanceof Error ? error.message : String(error);
  }
}
