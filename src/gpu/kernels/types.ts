import type { BufferName, ProgramStageName, WorkgroupCount } from '../types';

/**
 * Views over the regions a dispatch bound, keyed by buffer name
 */
export interface CpuBindings {
  view(name: BufferName): DataView;
  has(name: BufferName): boolean;
}

/**
 * Reference implementation of one pipeline stage, run by the CPU device
 */
export interface CpuProgram {
  readonly label: string;
  readonly stage: ProgramStageName;
  run(bindings: CpuBindings, workgroups: WorkgroupCount): void;
}
