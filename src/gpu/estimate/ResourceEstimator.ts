/**
 * ResourceEstimator - sizes every frame buffer before any memory is touched
 *
 * static:  closed-form bound from the summary counts and target size. Never
 *          touches the device, but a tile covered by many objects can exceed it.
 * dynamic: runs the counting pass and sizes from exact totals.
 */

import { EstimationError } from '../errors';
import { BIN_ENTRY_BYTES, TILE_SEGMENT_BYTES } from '../pipeline/layout';
import type {
  BufferCounts,
  BumpDiagnostics,
  EstimationMode,
  RenderConfig,
  Scene,
  SizeEstimate,
} from '../types';
import {
  DEFAULT_SAFETY_MARGIN,
  frameBufferSizes,
  staticBufferCounts,
  totalBytes,
} from './costTable';
import { validateSceneSummary } from './validateSummary';

/**
 * Source of exact bump-buffer totals for a scene (the counting pass)
 */
export interface BufferCounter {
  count(scene: Scene, config: RenderConfig): Promise<BufferCounts>;
}

export interface EstimateRequest {
  mode: EstimationMode;
  counter: BufferCounter;
  safetyMargin?: number;
}

export interface ResizeRequest {
  previous: SizeEstimate;
  diagnostics: BumpDiagnostics;
  counter: BufferCounter;
}

/**
 * What the renderer needs from an estimator. Tests swap in estimators that
 * deliberately get it wrong.
 */
export interface SizeEstimator {
  estimate(scene: Scene, config: RenderConfig, request: EstimateRequest): Promise<SizeEstimate>;
  resize(scene: Scene, config: RenderConfig, request: ResizeRequest): Promise<SizeEstimate>;
}

function assertMargin(margin: number): void {
  if (!Number.isFinite(margin) || margin < 0) {
    throw new EstimationError(`safety margin must be a non-negative number, got ${margin}`);
  }
}

export class ResourceEstimator implements SizeEstimator {
  private readonly defaultMargin: number;

  constructor(options: { safetyMargin?: number } = {}) {
    const margin = options.safetyMargin ?? DEFAULT_SAFETY_MARGIN;
    assertMargin(margin);
    this.defaultMargin = margin;
  }

  async estimate(
    scene: Scene,
    config: RenderConfig,
    request: EstimateRequest
  ): Promise<SizeEstimate> {
    validateSceneSummary(scene);
    if (request.mode === 'static') {
      return this.estimateStatic(scene, config, request.safetyMargin ?? this.defaultMargin);
    }
    const counts = await request.counter.count(scene, config);
    return this.fromCounts(scene, config, counts);
  }

  /**
   * Exact estimate for a retry: fresh counts, never below what the failed
   * frame asked for
   */
  async resize(scene: Scene, config: RenderConfig, request: ResizeRequest): Promise<SizeEstimate> {
    const counts = await request.counter.count(scene, config);
    return this.fromOverflow(this.fromCounts(scene, config, counts), request.diagnostics);
  }

  estimateStatic(
    scene: Scene,
    config: RenderConfig,
    safetyMargin: number = this.defaultMargin
  ): SizeEstimate {
    assertMargin(safetyMargin);
    const counts = staticBufferCounts(scene.summary, config, safetyMargin);
    const buffers = frameBufferSizes(scene.summary, config, scene.data.byteLength, counts);
    return { mode: 'static', exact: false, buffers, totalBytes: totalBytes(buffers) };
  }

  fromCounts(scene: Scene, config: RenderConfig, counts: BufferCounts): SizeEstimate {
    const buffers = frameBufferSizes(scene.summary, config, scene.data.byteLength, counts);
    return { mode: 'dynamic', exact: true, buffers, totalBytes: totalBytes(buffers) };
  }

  /**
   * Grow `previous` so each bump buffer holds at least the totals a failed
   * frame reported
   */
  fromOverflow(previous: SizeEstimate, diagnostics: BumpDiagnostics): SizeEstimate {
    const buffers = {
      ...previous.buffers,
      binData: Math.max(previous.buffers.binData, diagnostics.binEntries * BIN_ENTRY_BYTES),
      tileSegments: Math.max(
        previous.buffers.tileSegments,
        diagnostics.tileSegments * TILE_SEGMENT_BYTES
      ),
      ptcl: Math.max(previous.buffers.ptcl, diagnostics.ptclWords * 4),
    };
    return { ...previous, buffers, totalBytes: totalBytes(buffers) };
  }
}
