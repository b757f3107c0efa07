import type { Color, OutputFormat } from '../types';

export type PremultipliedColor = [number, number, number, number];

export function premultiply(color: Color): PremultipliedColor {
  return [color.r * color.a, color.g * color.a, color.b * color.a, color.a];
}

export function toUnorm8(value: number): number {
  if (!(value > 0)) return 0;
  if (value >= 1) return 255;
  return Math.round(value * 255);
}

/**
 * Store one premultiplied pixel as unpremultiplied 8-bit channels.
 * Must stay in sync with the fine program so cleared and rasterized
 * frames agree byte for byte.
 */
export function packPixel(
  r: number,
  g: number,
  b: number,
  a: number,
  format: OutputFormat,
  dest: Uint8Array,
  byteOffset: number
): void {
  const inv = a > 0 ? 1 / a : 0;
  const r8 = toUnorm8(r * inv);
  const g8 = toUnorm8(g * inv);
  const b8 = toUnorm8(b * inv);
  if (format === 'bgra8unorm') {
    dest[byteOffset] = b8;
    dest[byteOffset + 2] = r8;
  } else {
    dest[byteOffset] = r8;
    dest[byteOffset + 2] = b8;
  }
  dest[byteOffset + 1] = g8;
  dest[byteOffset + 3] = toUnorm8(a);
}

export function fillBackground(
  width: number,
  height: number,
  color: Color,
  format: OutputFormat
): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  if (pixels.length === 0) return pixels;

  const [r, g, b, a] = premultiply(color);
  packPixel(r, g, b, a, format, pixels, 0);
  for (let offset = 4; offset < pixels.length; offset += 4) {
    pixels.copyWithin(offset, 0, 4);
  }
  return pixels;
}

/**
 * Convenience for building colors from 8-bit channel values
 */
export function rgba8(r: number, g: number, b: number, a: number = 255): Color {
  return { r: r / 255, g: g / 255, b: b / 255, a: a / 255 };
}
