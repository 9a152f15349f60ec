import type { Position } from './Geometry';
import type { RandomSource } from './Random';
import { uniform } from './Random';

/** Четыре угла окна в одной плоскости z, по порядку обхода. */
export type Quad = readonly [Position, Position, Position, Position];

/**
 * Наблюдение окна, которое отдаёт детектор. Центр и размер вычисляет реестр.
 */
export interface WindowObservation {
  corners: Quad;
}

/**
 * Источник детекций. Вызывается контроллером не чаще раза за тик сканирования.
 */
export interface DetectionSource {
  detect(position: Position): WindowObservation | null;
}

/**
 * Генерирует случайный прямоугольник окна перед аппаратом:
 * ширина 0.8–2.5 м, высота 0.8–1.8 м, смещение x ±5, y +2…+10, z ±2 от текущей позиции.
 */
export class RandomWindowDetector implements DetectionSource {
  constructor(private readonly rng: RandomSource) {}

  detect(position: Position): WindowObservation {
    const width = uniform(this.rng, 0.8, 2.5);
    const height = uniform(this.rng, 0.8, 1.8);
    const x = position.x + uniform(this.rng, -5, 5);
    const y = position.y + uniform(this.rng, 2, 10);
    const z = position.z + uniform(this.rng, -2, 2);
    return { corners: rectangle(x, y, z, width, height) };
  }
}

/** Прямоугольник с нижним левым углом (x, y) в плоскости z. */
export function rectangle(x: number, y: number, z: number, width: number, height: number): Quad {
  return [
    { x, y, z },
    { x: x + width, y, z },
    { x: x + width, y: y + height, z },
    { x, y: y + height, z },
  ];
}
