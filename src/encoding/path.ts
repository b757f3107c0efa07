/**
 * Flattened path helpers. Curves are flattened upstream; the encoder only
 * ever sees straight line segments.
 */

export type FillRule = 'nonzero' | 'evenodd';

export interface Point {
  x: number;
  y: number;
}

export interface LineSegment {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type FlattenedPath = readonly LineSegment[];

/**
 * Closed polygon through `points` (the closing edge is added)
 */
export function polygon(points: readonly Point[]): FlattenedPath {
  if (points.length < 2) return [];
  const lines: LineSegment[] = [];
  for (let i = 0; i < points.length; i++) {
    const from = points[i];
    const to = points[(i + 1) % points.length];
    if (!from || !to) continue;
    if (from.x === to.x && from.y === to.y) continue;
    lines.push({ x0: from.x, y0: from.y, x1: to.x, y1: to.y });
  }
  return lines;
}

export function rectPath(x: number, y: number, width: number, height: number): FlattenedPath {
  return polygon([
    { x, y },
    { x: x + width, y },
    { x: x + width, y: y + height },
    { x, y: y + height },
  ]);
}

/**
 * Regular polygon approximating a circle
 */
export function circlePath(cx: number, cy: number, radius: number, sides: number = 32): FlattenedPath {
  const count = Math.max(3, Math.floor(sides));
  const points: Point[] = [];
  for (let i = 0; i < count; i++) {
    const theta = (i / count) * Math.PI * 2;
    points.push({ x: cx + Math.cos(theta) * radius, y: cy + Math.sin(theta) * radius });
  }
  return polygon(points);
}

export function translatePath(path: FlattenedPath, dx: number, dy: number): FlattenedPath {
  if (dx === 0 && dy === 0) return path;
  return path.map((line) => ({
    x0: line.x0 + dx,
    y0: line.y0 + dy,
    x1: line.x1 + dx,
    y1: line.y1 + dy,
  }));
}
