/**
 * Core Types
 *
 * Type definitions shared by the estimator, arenas, pipeline graph and renderer.
 */

/**
 * Sizing strategy for transient buffers
 */
export type EstimationMode = 'static' | 'dynamic';

/**
 * Anti-aliasing mode, selects the fine rasterization program variant
 */
export type AntialiasingMode = 'area' | 'msaa' | 'none';

/**
 * Pixel layout of the rendered image (8 bits per channel, unpremultiplied)
 */
export type OutputFormat = 'rgba8unorm' | 'bgra8unorm';

/**
 * Straight-alpha color, each channel in [0, 1]
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Summary counts published by the scene encoder alongside the encoded bytes.
 * `clipCount` counts begin and end clip markers; `layerCount` is the deepest
 * clip nesting.
 */
export interface SceneSummary {
  pathCount: number;
  drawObjectCount: number;
  clipCount: number;
  glyphCount: number;
  layerCount: number;
  segmentCount: number;
}

/**
 * Encoded scene. Treated as immutable once handed to the renderer.
 */
export interface Scene {
  readonly data: Uint8Array;
  readonly summary: Readonly<SceneSummary>;
}

export interface RenderConfig {
  width: number;
  height: number;
  antialiasing: AntialiasingMode;
  baseColor: Color;
  format: OutputFormat;
}

/**
 * Stages of the main pipeline, in execution order
 */
export type StageName = 'element' | 'binning' | 'coarse' | 'fine';

/**
 * Every program the orchestrator dispatches, including the counting pass
 */
export type ProgramStageName = StageName | 'count';

/**
 * Buffers bound by the main pipeline
 */
export type FrameBufferName =
  | 'config'
  | 'scene'
  | 'drawInfo'
  | 'lines'
  | 'binHeaders'
  | 'binData'
  | 'tileSegments'
  | 'ptcl'
  | 'bump'
  | 'output';

/**
 * Every buffer any program may bind
 */
export type BufferName = FrameBufferName | 'counts';

export type FrameBufferSizes = Record<FrameBufferName, number>;

/**
 * Byte sizes for every frame buffer. A dynamic estimate is exact; a static
 * one is a conservative bound that adversarial overlap can still exceed.
 */
export interface SizeEstimate {
  mode: EstimationMode;
  exact: boolean;
  buffers: FrameBufferSizes;
  totalBytes: number;
}

/**
 * Exact totals reported by the counting pass
 */
export interface BufferCounts {
  binEntries: number;
  tileSegments: number;
  ptclWords: number;
}

/**
 * Decoded bump buffer: failure flags plus the totals each stage asked for.
 * Totals keep counting past capacity so they can size a retry.
 */
export interface BumpDiagnostics {
  failed: number;
  binEntries: number;
  tileSegments: number;
  ptclWords: number;
  drawObjects: number;
  segments: number;
}

export type WorkgroupCount = readonly [number, number, number];

/**
 * Per-dispatch execution time reported by a device
 */
export interface DispatchTiming {
  stage: ProgramStageName;
  durationMs: number;
}

/**
 * Payload of the optional instrumentation hook
 */
export interface StageTiming extends DispatchTiming {
  frameId: number;
  attempt: number;
}

export type StageTimingHook = (timing: StageTiming) => void;

/**
 * Rendered pixels, `width * height * 4` bytes in `format` order
 */
export interface RenderedImage {
  width: number;
  height: number;
  format: OutputFormat;
  pixels: Uint8Array;
}
