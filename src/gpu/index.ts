/**
 * Compute pipeline orchestration
 *
 * Sizes, pools and dispatches the element -> binning -> coarse -> fine chain
 * for an encoded scene, with one resize-and-retry on buffer overflow.
 */

// Types
export type {
  AntialiasingMode,
  BufferCounts,
  BufferName,
  BumpDiagnostics,
  Color,
  DispatchTiming,
  EstimationMode,
  FrameBufferName,
  FrameBufferSizes,
  OutputFormat,
  ProgramStageName,
  RenderConfig,
  RenderedImage,
  Scene,
  SceneSummary,
  SizeEstimate,
  StageName,
  StageTiming,
  StageTimingHook,
  WorkgroupCount,
} from './types';

export {
  AllocationError,
  ArenaOverflow,
  DeviceLost,
  EstimationError,
  RenderCancelled,
  RenderError,
  RenderOverflow,
  UnsupportedConfig,
} from './errors';
export type { RenderErrorCode } from './errors';

// Core
export { RenderContext } from './context';
export type { RenderContextOptions } from './context';
export { Renderer, overflowFromDiagnostics } from './Renderer';
export type {
  RenderMetricsSnapshot,
  RenderOptions,
  RenderOutcome,
  RendererOptions,
} from './Renderer';
export { RenderStateMachine } from './RenderStateMachine';
export type { RenderState } from './RenderStateMachine';
export { FrameProfiler } from './profiler';
export type { StageTimingSummary } from './profiler';

// Backends
export { DEFAULT_DEVICE_LIMITS } from './backend/ComputeDevice';
export type {
  BufferBinding,
  ComputeDevice,
  DeviceBuffer,
  DeviceInfo,
  DeviceLimits,
  DeviceLossInfo,
  DispatchCommand,
  Submission,
} from './backend/ComputeDevice';
export { CpuDevice } from './backend/CpuDevice';
export type { CpuDeviceOptions } from './backend/CpuDevice';
export { WebGpuDevice, storageLayoutEntries } from './backend/WebGpuDevice';
export type { WebGpuProgramDescriptor } from './backend/WebGpuDevice';
export { Fence } from './backend/Fence';
export type { FenceState } from './backend/Fence';
export { createCpuPrograms } from './kernels';
export type { CpuProgram } from './kernels';

// Estimation
export { ResourceEstimator } from './estimate/ResourceEstimator';
export type {
  BufferCounter,
  EstimateRequest,
  ResizeRequest,
  SizeEstimator,
} from './estimate/ResourceEstimator';
export { DEFAULT_SAFETY_MARGIN, STATIC_COST_TABLE } from './estimate/costTable';
export { validateSceneSummary } from './estimate/validateSummary';

// Resources
export { Arena } from './resources/BufferArena';
export type { BufferRegion } from './resources/BufferArena';
export { ArenaPool, MAX_POOL_DEPTH } from './resources/ArenaPool';
export type { ArenaPoolStats } from './resources/ArenaPool';

// Pipeline
export {
  PipelineGraph,
  PIPELINE_STAGES,
  COUNTING_STAGES,
  stageDefinition,
} from './pipeline/PipelineGraph';
export type { StageDefinition, StagePrograms } from './pipeline/PipelineGraph';
export { DispatchPlan } from './pipeline/DispatchPlan';
export { CountingPass } from './pipeline/CountingPass';
export { TILE_SIZE } from './pipeline/layout';

// Utils
export { fillBackground, rgba8 } from './utils/pixels';
