/**
 * Точка в пространстве миссии, метры.
 * x — вдоль фасада, y — вторая ось сканирования, z — третья ось (отступ от стены / высота взлёта).
 */
export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface Bounds2D {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export const ORIGIN: Position = { x: 0, y: 0, z: 0 };

export function distance(a: Position, b: Position): number {
  return Math.sqrt((b.x - a.x) ** 2 + (b.y - a.y) ** 2 + (b.z - a.z) ** 2);
}

/** Прямоугольник, ограничивающий точки в плоскости x/y. Пустой список даёт нулевой бокс. */
export function boundingBox(points: readonly Position[]): Bounds2D {
  if (points.length === 0) {
    return { minX: 0, maxX: 0, minY: 0, maxY: 0 };
  }
  let minX = points[0].x;
  let maxX = points[0].x;
  let minY = points[0].y;
  let maxY = points[0].y;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }
  return { minX, maxX, minY, maxY };
}

/** Линейная интерполяция a → b, t ∈ [0, 1]. */
export function lerp(a: Position, b: Position, t: number): Position {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatPosition(p: Position, digits = 2): string {
  return `(${p.x.toFixed(digits)}, ${p.y.toFixed(digits)}, ${p.z.toFixed(digits)})`;
}
