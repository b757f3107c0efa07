/**
 * PipelineGraph - the fixed stage chain and how it binds to a frame
 *
 *   element -> binning -> coarse -> fine
 *
 * Each stage declares the buffers it reads and writes and a pure workgroup
 * formula. The graph holds no per-frame state; `instantiate` builds a fresh
 * DispatchPlan against one arena. Dynamic estimation uses a second template,
 * element -> count, over a smaller buffer set.
 */

import type { BindingAccess, DispatchCommand } from '../backend/ComputeDevice';
import { UnsupportedConfig } from '../errors';
import { countingBufferSizes, type CountingBufferName } from '../estimate/costTable';
import { arenaBytesFor, type Arena, type BufferRegion } from '../resources/BufferArena';
import type {
  AntialiasingMode,
  BufferName,
  FrameBufferName,
  ProgramStageName,
  RenderConfig,
  Scene,
  SceneSummary,
  SizeEstimate,
  StageName,
  WorkgroupCount,
} from '../types';
import { alignTo, divCeil } from '../utils/align';
import { DispatchPlan, type PlanUpload } from './DispatchPlan';
import { BUMP_BYTES, WORKGROUP_SIZE, encodeFrameConfig, tileGrid } from './layout';

/**
 * Compiled program handles, one per stage. Fine has one variant per
 * antialiasing mode; a missing variant means the mode is unsupported.
 */
export interface StagePrograms<P> {
  element: P;
  binning: P;
  coarse: P;
  count: P;
  fine: Partial<Record<AntialiasingMode, P>>;
}

export interface StageBinding {
  name: BufferName;
  access: BindingAccess;
}

export interface StageDefinition {
  name: ProgramStageName;
  bindings: readonly StageBinding[];
  workgroups(summary: SceneSummary, config: RenderConfig): WorkgroupCount;
}

const read = (name: BufferName): StageBinding => ({ name, access: 'read' });
const write = (name: BufferName): StageBinding => ({ name, access: 'read-write' });

const perDrawObject = (summary: SceneSummary): WorkgroupCount => [
  Math.max(1, divCeil(summary.drawObjectCount, WORKGROUP_SIZE)),
  1,
  1,
];

const perTile = (_summary: SceneSummary, config: RenderConfig): WorkgroupCount => {
  const { tilesX, tilesY } = tileGrid(config.width, config.height);
  return [tilesX, tilesY, 1];
};

const ELEMENT_STAGE: StageDefinition = {
  name: 'element',
  bindings: [read('config'), read('scene'), write('drawInfo'), write('lines'), write('bump')],
  workgroups: perDrawObject,
};

export const PIPELINE_STAGES: readonly StageDefinition[] = [
  ELEMENT_STAGE,
  {
    name: 'binning',
    bindings: [
      read('config'),
      read('drawInfo'),
      write('binHeaders'),
      write('binData'),
      write('bump'),
    ],
    workgroups: perDrawObject,
  },
  {
    name: 'coarse',
    bindings: [
      read('config'),
      read('drawInfo'),
      read('lines'),
      read('binHeaders'),
      read('binData'),
      write('tileSegments'),
      write('ptcl'),
      write('bump'),
    ],
    workgroups: perTile,
  },
  {
    name: 'fine',
    bindings: [
      read('config'),
      read('drawInfo'),
      read('tileSegments'),
      read('ptcl'),
      read('bump'),
      write('output'),
    ],
    workgroups: perTile,
  },
];

export const COUNTING_STAGES: readonly StageDefinition[] = [
  ELEMENT_STAGE,
  {
    name: 'count',
    bindings: [read('config'), read('drawInfo'), read('lines'), read('bump'), write('counts')],
    workgroups: () => [1, 1, 1],
  },
];

export function stageDefinition(stage: ProgramStageName): StageDefinition {
  const definition =
    PIPELINE_STAGES.find((candidate) => candidate.name === stage) ??
    COUNTING_STAGES.find((candidate) => candidate.name === stage);
  if (!definition) {
    throw new Error(`[PipelineGraph] unknown stage ${stage}`);
  }
  return definition;
}

/**
 * Allocation order inside a frame arena
 */
export const FRAME_BUFFER_ORDER: readonly FrameBufferName[] = [
  'config',
  'scene',
  'drawInfo',
  'lines',
  'binHeaders',
  'binData',
  'tileSegments',
  'ptcl',
  'bump',
  'output',
];

export const COUNTING_BUFFER_ORDER: readonly CountingBufferName[] = [
  'config',
  'scene',
  'drawInfo',
  'lines',
  'bump',
  'counts',
];

/**
 * Scene bytes zero-padded to a whole number of words
 */
function paddedScene(data: Uint8Array): Uint8Array {
  const size = alignTo(data.byteLength, 4);
  if (data.byteLength === size) return data;
  const padded = new Uint8Array(size);
  padded.set(data);
  return padded;
}

export class PipelineGraph {
  readonly stages: readonly StageDefinition[] = PIPELINE_STAGES;
  readonly countingStages: readonly StageDefinition[] = COUNTING_STAGES;

  get stageOrder(): StageName[] {
    return ['element', 'binning', 'coarse', 'fine'];
  }

  /**
   * Empty scenes skip the pipeline and clear the target to the base color
   */
  isEmpty(summary: SceneSummary): boolean {
    return summary.drawObjectCount === 0;
  }

  /**
   * Bytes an arena needs to hold every frame buffer of `estimate`
   */
  arenaBytes(estimate: SizeEstimate, alignment: number): number {
    return arenaBytesFor(
      FRAME_BUFFER_ORDER.map((name) => estimate.buffers[name]),
      alignment
    );
  }

  countingArenaBytes(scene: Scene, alignment: number): number {
    const sizes = countingBufferSizes(scene.summary, scene.data.byteLength);
    return arenaBytesFor(
      COUNTING_BUFFER_ORDER.map((name) => sizes[name]),
      alignment
    );
  }

  /**
   * Buffer sizes grouped by the stages that bind them
   */
  sizesByStage(
    estimate: SizeEstimate
  ): Record<StageName, Partial<Record<FrameBufferName, number>>> {
    const result: Record<StageName, Partial<Record<FrameBufferName, number>>> = {
      element: {},
      binning: {},
      coarse: {},
      fine: {},
    };
    for (const stage of this.stages) {
      if (stage.name === 'count') continue;
      const sizes = result[stage.name];
      for (const binding of stage.bindings) {
        if (binding.name === 'counts') continue;
        sizes[binding.name] = estimate.buffers[binding.name];
      }
    }
    return result;
  }

  /**
   * Program for `stage`, picking the fine variant for the configured mode
   */
  programFor<P>(programs: StagePrograms<P>, stage: ProgramStageName, config: RenderConfig): P {
    if (stage !== 'fine') {
      return programs[stage];
    }
    const fine = programs.fine[config.antialiasing];
    if (fine === undefined) {
      throw new UnsupportedConfig(`no fine program for ${config.antialiasing} antialiasing`);
    }
    return fine;
  }

  /**
   * Bind the main pipeline to `arena` for one frame
   */
  instantiate<P>(args: {
    arena: Arena;
    estimate: SizeEstimate;
    scene: Scene;
    config: RenderConfig;
    programs: StagePrograms<P>;
  }): DispatchPlan<P> {
    const { arena, estimate, scene, config, programs } = args;
    const regions = new Map<BufferName, BufferRegion>();
    for (const name of FRAME_BUFFER_ORDER) {
      regions.set(name, arena.subAlloc(name, estimate.buffers[name]));
    }

    const configBytes = encodeFrameConfig({
      config,
      summary: scene.summary,
      sceneBytes: scene.data.byteLength,
      regionBytes: estimate.buffers,
    });
    return this.buildPlan('render', this.stages, regions, scene, config, programs, configBytes);
  }

  /**
   * Bind the counting template (element -> count) to a scratch arena
   */
  instantiateCounting<P>(args: {
    arena: Arena;
    scene: Scene;
    config: RenderConfig;
    programs: StagePrograms<P>;
  }): DispatchPlan<P> {
    const { arena, scene, config, programs } = args;
    const sizes = countingBufferSizes(scene.summary, scene.data.byteLength);
    const regions = new Map<BufferName, BufferRegion>();
    for (const name of COUNTING_BUFFER_ORDER) {
      regions.set(name, arena.subAlloc(name, sizes[name]));
    }

    const configBytes = encodeFrameConfig({
      config,
      summary: scene.summary,
      sceneBytes: scene.data.byteLength,
      regionBytes: {},
    });
    return this.buildPlan(
      'count',
      this.countingStages,
      regions,
      scene,
      config,
      programs,
      configBytes
    );
  }

  private buildPlan<P>(
    kind: 'render' | 'count',
    stages: readonly StageDefinition[],
    regions: Map<BufferName, BufferRegion>,
    scene: Scene,
    config: RenderConfig,
    programs: StagePrograms<P>,
    configBytes: Uint8Array
  ): DispatchPlan<P> {
    const regionOf = (name: BufferName): BufferRegion => {
      const region = regions.get(name);
      if (!region) {
        throw new Error(`[PipelineGraph] ${kind} plan is missing the ${name} region`);
      }
      return region;
    };

    const dispatches: DispatchCommand<P>[] = stages.map((stage) => ({
      stage: stage.name,
      program: this.programFor(programs, stage.name, config),
      workgroups: stage.workgroups(scene.summary, config),
      bindings: stage.bindings.map(({ name, access }) => {
        const region = regionOf(name);
        return { name, buffer: region.buffer, offset: region.offset, size: region.size, access };
      }),
    }));

    const uploads: PlanUpload[] = [
      { region: regionOf('config'), data: configBytes },
      { region: regionOf('scene'), data: paddedScene(scene.data) },
      { region: regionOf('bump'), data: new Uint8Array(BUMP_BYTES) },
    ];

    return new DispatchPlan({ kind, regions, uploads, dispatches });
  }
}
