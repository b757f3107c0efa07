/**
 * Element program: decodes the scene stream into fixed-size draw records and
 * a flat line array, and computes each object's tile bounding box clipped to
 * the target and to its enclosing clip layers.
 *
 * The stream is variable length, so the reference program walks it serially
 * regardless of the workgroup count.
 */

import { DrawTag } from '@/encoding/drawTag';
import {
  BumpWord,
  DRAW_INFO_BYTES,
  DrawInfoWord,
  FailureFlag,
  LINE_BYTES,
  TILE_SIZE,
  decodeFrameConfig,
  type FrameConfig,
} from '../pipeline/layout';
import { raiseFailure, writeBumpWord } from './bump';
import type { CpuBindings, CpuProgram } from './types';

type TileBox = [number, number, number, number];

interface OpenClip {
  drawIndex: number;
  lineOffset: number;
  lineCount: number;
  fillRule: number;
  bbox: TileBox;
}

const EMPTY_BOX: TileBox = [0, 0, 0, 0];

function clamp(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max);
}

function normalize(box: TileBox): TileBox {
  return box[0] < box[2] && box[1] < box[3] ? box : EMPTY_BOX;
}

function intersect(a: TileBox, b: TileBox): TileBox {
  return normalize([
    Math.max(a[0], b[0]),
    Math.max(a[1], b[1]),
    Math.min(a[2], b[2]),
    Math.min(a[3], b[3]),
  ]);
}

class ElementDecoder {
  private offset = 0;
  private drawIndex = 0;
  private lineIndex = 0;
  private readonly clips: OpenClip[] = [];
  malformed = false;

  constructor(
    private readonly config: FrameConfig,
    private readonly scene: DataView,
    private readonly drawInfo: DataView,
    private readonly lines: DataView
  ) {}

  get decodedDrawObjects(): number {
    return this.drawIndex;
  }

  get decodedSegments(): number {
    return this.lineIndex;
  }

  run(): void {
    const end = Math.min(this.config.sceneBytes, this.scene.byteLength);
    while (this.offset < end && !this.malformed) {
      if (this.drawIndex >= this.config.drawObjectCount) {
        this.malformed = true;
        break;
      }
      const tag = this.readU32(end);
      if (tag === null) break;

      if (tag === DrawTag.Fill || tag === DrawTag.BeginClip) {
        this.decodePath(tag, end);
      } else if (tag === DrawTag.EndClip) {
        this.decodeEndClip();
      } else {
        this.malformed = true;
      }
    }

    if (
      this.clips.length > 0 ||
      this.drawIndex !== this.config.drawObjectCount ||
      this.lineIndex !== this.config.segmentCount
    ) {
      this.malformed = true;
    }
  }

  private decodePath(tag: number, end: number): void {
    const segCount = this.readU32(end);
    const fillRule = this.readU32(end);
    if (segCount === null || fillRule === null) return;

    const color: [number, number, number, number] = [0, 0, 0, 0];
    if (tag === DrawTag.Fill) {
      if (this.offset + 16 > end) {
        this.malformed = true;
        return;
      }
      const a = this.scene.getFloat32(this.offset + 12, true);
      // Stored straight, kept premultiplied downstream
      color[0] = this.scene.getFloat32(this.offset, true) * a;
      color[1] = this.scene.getFloat32(this.offset + 4, true) * a;
      color[2] = this.scene.getFloat32(this.offset + 8, true) * a;
      color[3] = a;
      this.offset += 16;
    }

    if (
      this.offset + segCount * LINE_BYTES > end ||
      this.lineIndex + segCount > this.config.segmentCount
    ) {
      this.malformed = true;
      return;
    }

    const lineOffset = this.lineIndex;
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (let i = 0; i < segCount; i++) {
      const x0 = this.scene.getFloat32(this.offset, true);
      const y0 = this.scene.getFloat32(this.offset + 4, true);
      const x1 = this.scene.getFloat32(this.offset + 8, true);
      const y1 = this.scene.getFloat32(this.offset + 12, true);
      this.offset += LINE_BYTES;

      const base = this.lineIndex * LINE_BYTES;
      this.lines.setFloat32(base, x0, true);
      this.lines.setFloat32(base + 4, y0, true);
      this.lines.setFloat32(base + 8, x1, true);
      this.lines.setFloat32(base + 12, y1, true);
      this.lineIndex++;

      minX = Math.min(minX, x0, x1);
      minY = Math.min(minY, y0, y1);
      maxX = Math.max(maxX, x0, x1);
      maxY = Math.max(maxY, y0, y1);
    }

    let bbox: TileBox = EMPTY_BOX;
    if (segCount > 0) {
      const { tilesX, tilesY } = this.config;
      bbox = normalize([
        clamp(Math.floor(minX / TILE_SIZE), tilesX),
        clamp(Math.floor(minY / TILE_SIZE), tilesY),
        clamp(Math.ceil(maxX / TILE_SIZE), tilesX),
        clamp(Math.ceil(maxY / TILE_SIZE), tilesY),
      ]);
    }
    const enclosing = this.clips[this.clips.length - 1];
    if (enclosing) {
      bbox = intersect(bbox, enclosing.bbox);
    }

    this.writeDrawInfo({
      tag,
      fillRule,
      lineOffset,
      lineCount: segCount,
      color,
      bbox,
      clipDepth: this.clips.length,
    });

    if (tag === DrawTag.BeginClip) {
      this.clips.push({ drawIndex: this.drawIndex, lineOffset, lineCount: segCount, fillRule, bbox });
    }
    this.drawIndex++;
  }

  private decodeEndClip(): void {
    const begin = this.clips.pop();
    if (!begin) {
      this.malformed = true;
      return;
    }
    this.writeDrawInfo({
      tag: DrawTag.EndClip,
      fillRule: begin.fillRule,
      lineOffset: begin.lineOffset,
      lineCount: begin.lineCount,
      color: [0, 0, 0, 0],
      bbox: begin.bbox,
      clipDepth: this.clips.length,
    });
    this.drawIndex++;
  }

  private writeDrawInfo(record: {
    tag: number;
    fillRule: number;
    lineOffset: number;
    lineCount: number;
    color: [number, number, number, number];
    bbox: TileBox;
    clipDepth: number;
  }): void {
    const base = this.drawIndex * DRAW_INFO_BYTES;
    const setWord = (w: number, value: number) =>
      this.drawInfo.setUint32(base + w * 4, value, true);
    setWord(DrawInfoWord.tag, record.tag);
    setWord(DrawInfoWord.fillRule, record.fillRule);
    setWord(DrawInfoWord.lineOffset, record.lineOffset);
    setWord(DrawInfoWord.lineCount, record.lineCount);
    for (let i = 0; i < 4; i++) {
      this.drawInfo.setFloat32(base + (DrawInfoWord.color + i) * 4, record.color[i] ?? 0, true);
      setWord(DrawInfoWord.bbox + i, record.bbox[i] ?? 0);
    }
    setWord(DrawInfoWord.clipDepth, record.clipDepth);
  }

  private readU32(end: number): number | null {
    if (this.offset + 4 > end) {
      this.malformed = true;
      return null;
    }
    const value = this.scene.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }
}

export function runElement(bindings: CpuBindings): void {
  const config = decodeFrameConfig(bindings.view('config'));
  const bump = bindings.view('bump');
  const decoder = new ElementDecoder(
    config,
    bindings.view('scene'),
    bindings.view('drawInfo'),
    bindings.view('lines')
  );
  decoder.run();

  writeBumpWord(bump, BumpWord.drawObjects, decoder.decodedDrawObjects);
  writeBumpWord(bump, BumpWord.segments, decoder.decodedSegments);
  if (decoder.malformed) {
    raiseFailure(bump, FailureFlag.malformedScene);
  }
}

export const elementProgram: CpuProgram = {
  label: 'element',
  stage: 'element',
  run: (bindings) => runElement(bindings),
};
