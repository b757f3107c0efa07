import { describe, expect, it } from 'vitest';
import { DrawTag, FillRuleCode, expectedSceneBytes } from './drawTag';
import { polygon, rectPath, translatePath } from './path';
import { SceneEncoder } from './SceneEncoder';

const RED = { r: 1, g: 0, b: 0, a: 1 };

describe('SceneEncoder', () => {
  it('encodes a fill as tag, header, color and lines', () => {
    const scene = new SceneEncoder().fill(rectPath(0, 0, 16, 8), RED, 'evenodd').finish();
    const view = new DataView(scene.data.buffer, scene.data.byteOffset, scene.data.byteLength);

    expect(scene.data.byteLength).toBe(92);
    expect(view.getUint32(0, true)).toBe(DrawTag.Fill);
    expect(view.getUint32(4, true)).toBe(4);
    expect(view.getUint32(8, true)).toBe(FillRuleCode.evenodd);
    expect(view.getFloat32(12, true)).toBe(1);
    expect(view.getFloat32(24, true)).toBe(1);
    // first line: (0,0) -> (16,0)
    expect([28, 32, 36, 40].map((offset) => view.getFloat32(offset, true))).toEqual([0, 0, 16, 0]);
    expect(scene.summary).toEqual({
      pathCount: 1,
      drawObjectCount: 1,
      clipCount: 0,
      glyphCount: 0,
      layerCount: 0,
      segmentCount: 4,
    });
  });

  it('counts clip markers and nesting depth', () => {
    const scene = new SceneEncoder()
      .pushClip(rectPath(0, 0, 32, 32))
      .pushClip(rectPath(4, 4, 8, 8))
      .fill(rectPath(0, 0, 16, 16), RED)
      .popClip()
      .popClip()
      .finish();

    expect(scene.summary).toEqual({
      pathCount: 3,
      drawObjectCount: 5,
      clipCount: 4,
      glyphCount: 0,
      layerCount: 2,
      segmentCount: 12,
    });
    expect(scene.data.byteLength).toBe(expectedSceneBytes(scene.summary));
  });

  it('places glyph outlines and counts them as fills', () => {
    const outline = polygon([
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 0, y: 6 },
    ]);
    const scene = new SceneEncoder()
      .glyphRun(
        [
          { outline, x: 10, y: 20 },
          { outline, x: 15, y: 20 },
        ],
        RED
      )
      .finish();
    const view = new DataView(scene.data.buffer, scene.data.byteOffset, scene.data.byteLength);

    expect(scene.summary.glyphCount).toBe(2);
    expect(scene.summary.pathCount).toBe(2);
    expect(view.getFloat32(28, true)).toBe(10);
    expect(view.getFloat32(32, true)).toBe(20);
    // second glyph starts after 28 + 3 * 16 bytes
    expect(view.getFloat32(76 + 28, true)).toBe(15);
  });

  it('rejects unbalanced clips', () => {
    expect(() => new SceneEncoder().popClip()).toThrow('popClip without a matching pushClip');
    expect(() => new SceneEncoder().pushClip(rectPath(0, 0, 4, 4)).finish()).toThrow(
      '1 clip layer(s) still open'
    );
  });

  it('grows past its initial capacity', () => {
    const encoder = new SceneEncoder(16);
    for (let i = 0; i < 50; i++) {
      encoder.fill(rectPath(i, i, 2, 2), RED);
    }
    const scene = encoder.finish();

    expect(scene.summary.drawObjectCount).toBe(50);
    expect(scene.data.byteLength).toBe(50 * 92);
    const view = new DataView(scene.data.buffer);
    expect(view.getFloat32(49 * 92 + 28, true)).toBe(49);
  });

  it('starts over after reset', () => {
    const encoder = new SceneEncoder().fill(rectPath(0, 0, 1, 1), RED);
    expect(encoder.isEmpty).toBe(false);

    encoder.reset();

    expect(encoder.isEmpty).toBe(true);
    expect(encoder.finish().data.byteLength).toBe(0);
  });
});

describe('path helpers', () => {
  it('closes polygons and skips degenerate edges', () => {
    const path = polygon([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 4 },
    ]);

    expect(path).toEqual([
      { x0: 0, y0: 0, x1: 4, y1: 0 },
      { x0: 4, y0: 0, x1: 4, y1: 4 },
      { x0: 4, y0: 4, x1: 0, y1: 0 },
    ]);
  });

  it('returns the same path for a zero translation', () => {
    const path = rectPath(0, 0, 2, 2);
    expect(translatePath(path, 0, 0)).toBe(path);
  });
});
