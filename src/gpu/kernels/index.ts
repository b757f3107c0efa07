import type { StagePrograms } from '../pipeline/PipelineGraph';
import type { AntialiasingMode } from '../types';
import { binningProgram } from './binning';
import { coarseProgram } from './coarse';
import { countProgram } from './count';
import { elementProgram } from './element';
import { fineProgram } from './fine';
import type { CpuProgram } from './types';

export type { CpuBindings, CpuProgram } from './types';
export { computeTileCoverage } from './coverage';

const ALL_MODES: readonly AntialiasingMode[] = ['area', 'msaa', 'none'];

/**
 * Program set for the CPU device. `modes` limits which fine variants are
 * provided; a config asking for a missing one is rejected before dispatch.
 */
export function createCpuPrograms(
  modes: readonly AntialiasingMode[] = ALL_MODES
): StagePrograms<CpuProgram> {
  const fine: Partial<Record<AntialiasingMode, CpuProgram>> = {};
  for (const mode of modes) {
    fine[mode] = fineProgram(mode);
  }
  return {
    element: elementProgram,
    binning: binningProgram,
    coarse: coarseProgram,
    count: countProgram,
    fine,
  };
}
