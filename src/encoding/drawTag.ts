/**
 * Scene stream layout
 *
 * The encoded scene is a sequence of draw objects, each starting with a
 * 32-bit tag. All values are little-endian.
 *
 * | Tag        | Words after tag                                        |
 * |------------|--------------------------------------------------------|
 * | Fill       | segCount, fillRule, r, g, b, a (f32), segCount * line  |
 * | BeginClip  | segCount, fillRule, segCount * line                    |
 * | EndClip    | (none)                                                 |
 *
 * A line is four f32 values: x0, y0, x1, y1 in pixel space.
 */

import type { SceneSummary } from '@/gpu/types';

export const DrawTag = {
  Fill: 1,
  BeginClip: 2,
  EndClip: 3,
} as const;

export type DrawTagValue = (typeof DrawTag)[keyof typeof DrawTag];

export const FillRuleCode = {
  nonzero: 0,
  evenodd: 1,
} as const;

export const TAG_BYTES = 4;
export const PATH_HEADER_BYTES = 8; // segCount + fillRule
export const COLOR_BYTES = 16;
export const LINE_BYTES = 16;

/**
 * Exact encoded size implied by a summary. Every path is either a fill or a
 * clip begin; every clip begin has a matching end.
 */
export function expectedSceneBytes(summary: SceneSummary): number {
  const clipLayers = summary.clipCount / 2;
  const fills = summary.pathCount - clipLayers;
  return (
    summary.drawObjectCount * TAG_BYTES +
    summary.pathCount * PATH_HEADER_BYTES +
    fills * COLOR_BYTES +
    summary.segmentCount * LINE_BYTES
  );
}
