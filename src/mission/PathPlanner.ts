import type { Position } from '../core/Geometry';
import { boundingBox, distance } from '../core/Geometry';
import type { VehicleProfile } from '../core/Config';
import type { Quad } from '../core/Detection';
import type { Window } from './WindowRegistry';

/**
 * Построчное покрытие окна: строки от minY с шагом spacing, пока y <= maxY.
 * Каждая строка проходится в одну сторону: (minX, y) → (maxX, y).
 * y накапливается сложением, поэтому последняя строка может оказаться чуть ниже maxY.
 */
export function coveragePattern(corners: Quad, spacing: number): Position[] {
  const points: Position[] = [];
  const { minX, maxX, minY, maxY } = boundingBox(corners);
  const z = corners[0].z;
  for (let y = minY; y <= maxY; y += spacing) {
    points.push({ x: minX, y, z });
    points.push({ x: maxX, y, z });
  }
  return points;
}

/**
 * Маршрут мойки: окна по возрастанию center.y, для каждого точка подхода
 * (отступ approachStandoff по z) и покрытие. Маршрут замыкается на первую точку.
 */
export function planPath(windows: readonly Window[], profile: VehicleProfile): Position[] {
  const ordered = [...windows].sort((a, b) => a.center.y - b.center.y);
  const path: Position[] = [];
  for (const w of ordered) {
    path.push({ x: w.center.x, y: w.center.y, z: w.center.z - profile.approachStandoff });
    path.push(...coveragePattern(w.corners, profile.coverageSpacing));
  }
  if (path.length > 0) {
    path.push({ ...path[0] });
  }
  return path;
}

export function pathLength(path: readonly Position[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    total += distance(path[i - 1], path[i]);
  }
  return total;
}
