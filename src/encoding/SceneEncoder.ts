/**
 * SceneEncoder - builds the binary scene stream consumed by the pipeline
 *
 * Draw objects are appended in paint order. Glyph runs arrive as already
 * flattened outlines and are encoded as ordinary fills.
 */

import type { Color, Scene, SceneSummary } from '@/gpu/types';
import { DrawTag, FillRuleCode } from './drawTag';
import { translatePath, type FillRule, type FlattenedPath } from './path';

const INITIAL_CAPACITY_BYTES = 1024;

export interface GlyphPlacement {
  outline: FlattenedPath;
  x: number;
  y: number;
}

function emptySummary(): SceneSummary {
  return {
    pathCount: 0,
    drawObjectCount: 0,
    clipCount: 0,
    glyphCount: 0,
    layerCount: 0,
    segmentCount: 0,
  };
}

export class SceneEncoder {
  private bytes: Uint8Array;
  private view: DataView;
  private length = 0;
  private summary: SceneSummary = emptySummary();
  private clipDepth = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY_BYTES) {
    this.bytes = new Uint8Array(Math.max(16, initialCapacity));
    this.view = new DataView(this.bytes.buffer);
  }

  /**
   * Fill a path with a solid color
   */
  fill(path: FlattenedPath, color: Color, fillRule: FillRule = 'nonzero'): this {
    this.reserve(28 + path.length * 16);
    this.pushU32(DrawTag.Fill);
    this.pushU32(path.length);
    this.pushU32(FillRuleCode[fillRule]);
    this.pushF32(color.r);
    this.pushF32(color.g);
    this.pushF32(color.b);
    this.pushF32(color.a);
    this.pushLines(path);

    this.summary.pathCount += 1;
    this.summary.drawObjectCount += 1;
    return this;
  }

  /**
   * Start a clip layer; everything until the matching popClip is masked by `path`
   */
  pushClip(path: FlattenedPath, fillRule: FillRule = 'nonzero'): this {
    this.reserve(12 + path.length * 16);
    this.pushU32(DrawTag.BeginClip);
    this.pushU32(path.length);
    this.pushU32(FillRuleCode[fillRule]);
    this.pushLines(path);

    this.clipDepth += 1;
    this.summary.pathCount += 1;
    this.summary.drawObjectCount += 1;
    this.summary.clipCount += 1;
    this.summary.layerCount = Math.max(this.summary.layerCount, this.clipDepth);
    return this;
  }

  popClip(): this {
    if (this.clipDepth === 0) {
      throw new Error('[SceneEncoder] popClip without a matching pushClip');
    }
    this.reserve(4);
    this.pushU32(DrawTag.EndClip);

    this.clipDepth -= 1;
    this.summary.drawObjectCount += 1;
    this.summary.clipCount += 1;
    return this;
  }

  /**
   * Fill each glyph outline at its placement
   */
  glyphRun(glyphs: readonly GlyphPlacement[], color: Color): this {
    for (const glyph of glyphs) {
      this.fill(translatePath(glyph.outline, glyph.x, glyph.y), color, 'nonzero');
      this.summary.glyphCount += 1;
    }
    return this;
  }

  get isEmpty(): boolean {
    return this.summary.drawObjectCount === 0;
  }

  /**
   * Snapshot the encoded stream. The encoder may keep appending afterwards.
   */
  finish(): Scene {
    if (this.clipDepth !== 0) {
      throw new Error(`[SceneEncoder] ${this.clipDepth} clip layer(s) still open`);
    }
    return {
      data: this.bytes.slice(0, this.length),
      summary: { ...this.summary },
    };
  }

  reset(): void {
    this.length = 0;
    this.summary = emptySummary();
    this.clipDepth = 0;
  }

  private pushLines(path: FlattenedPath): void {
    for (const line of path) {
      this.pushF32(line.x0);
      this.pushF32(line.y0);
      this.pushF32(line.x1);
      this.pushF32(line.y1);
    }
    this.summary.segmentCount += path.length;
  }

  private pushU32(value: number): void {
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  private pushF32(value: number): void {
    this.view.setFloat32(this.length, value, true);
    this.length += 4;
  }

  /**
   * Grow by doubling until `bytes` more fit
   */
  private reserve(bytes: number): void {
    const required = this.length + bytes;
    if (required <= this.bytes.length) return;

    let capacity = this.bytes.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.bytes.subarray(0, this.length));
    this.bytes = next;
    this.view = new DataView(next.buffer);
  }
}
