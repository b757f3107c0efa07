import { expectedSceneBytes } from '@/encoding/drawTag';
import { EstimationError } from '../errors';
import type { Scene, SceneSummary } from '../types';

// Anything above this is treated as corrupt rather than as a real scene
export const MAX_SUMMARY_COUNT = 1 << 24;

const COUNT_FIELDS: readonly (keyof SceneSummary)[] = [
  'pathCount',
  'drawObjectCount',
  'clipCount',
  'glyphCount',
  'layerCount',
  'segmentCount',
];

/**
 * Reject summaries that cannot describe a real encoded scene
 */
export function validateSceneSummary(scene: Scene): void {
  const summary = scene.summary;
  for (const field of COUNT_FIELDS) {
    const value = summary[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new EstimationError(`${field} must be a non-negative integer, got ${value}`);
    }
    if (value > MAX_SUMMARY_COUNT) {
      throw new EstimationError(`${field}=${value} exceeds ${MAX_SUMMARY_COUNT}`);
    }
  }

  if (summary.clipCount % 2 !== 0) {
    throw new EstimationError(`clipCount=${summary.clipCount} is odd; clips come in begin/end pairs`);
  }
  const clipLayers = summary.clipCount / 2;
  if (summary.drawObjectCount !== summary.pathCount + clipLayers) {
    throw new EstimationError(
      `drawObjectCount=${summary.drawObjectCount} does not match pathCount + clipCount / 2 = ${summary.pathCount + clipLayers}`
    );
  }
  if (summary.pathCount < clipLayers) {
    throw new EstimationError(`pathCount=${summary.pathCount} is smaller than ${clipLayers} clip layers`);
  }
  if (summary.glyphCount > summary.pathCount - clipLayers) {
    throw new EstimationError(
      `glyphCount=${summary.glyphCount} exceeds the ${summary.pathCount - clipLayers} filled paths`
    );
  }
  if (summary.layerCount > clipLayers || (clipLayers > 0 && summary.layerCount === 0)) {
    throw new EstimationError(
      `layerCount=${summary.layerCount} is inconsistent with ${clipLayers} clip layers`
    );
  }

  const expected = expectedSceneBytes(summary);
  if (scene.data.byteLength !== expected) {
    throw new EstimationError(
      `encoded scene is ${scene.data.byteLength} bytes, summary implies ${expected}`
    );
  }
}
