import type { Position } from '../core/Geometry';
import { boundingBox, distance } from '../core/Geometry';
import type { Quad, WindowObservation } from '../core/Detection';

/**
 * Окно фасада. id выдаётся в порядке детекции и не переиспользуется.
 */
export interface Window {
  id: number;
  corners: Quad;
  center: Position;
  size: { width: number; height: number };
  cleaned: boolean;
}

/** Ключ дедупликации: центр, округлённый до 0.1 м по каждой оси. */
export function positionKey(p: Position): string {
  return `${Math.round(p.x * 10)}:${Math.round(p.y * 10)}:${Math.round(p.z * 10)}`;
}

export function isPlanar(corners: Quad): boolean {
  return corners.every((c) => c.z === corners[0].z);
}

export class WindowRegistry {
  private windows: Window[] = [];
  private nextId = 1;

  /**
   * Записывает наблюдение как новое окно. Непланарное наблюдение отбрасывается (null).
   * Дубликаты остаются до вызова deduplicate().
   */
  record(obs: WindowObservation): Window | null {
    if (!isPlanar(obs.corners)) return null;
    const box = boundingBox(obs.corners);
    const z = obs.corners[0].z;
    const window: Window = {
      id: this.nextId++,
      corners: obs.corners,
      center: { x: (box.minX + box.maxX) / 2, y: (box.minY + box.maxY) / 2, z },
      size: { width: box.maxX - box.minX, height: box.maxY - box.minY },
      cleaned: false,
    };
    this.windows.push(window);
    return window;
  }

  /**
   * Оставляет первое окно на каждый ключ позиции, сохраняя порядок.
   * @returns Сколько окон удалено
   */
  deduplicate(): number {
    const unique = new Map<string, Window>();
    for (const w of this.windows) {
      const key = positionKey(w.center);
      if (!unique.has(key)) unique.set(key, w);
    }
    const removed = this.windows.length - unique.size;
    this.windows = [...unique.values()];
    return removed;
  }

  /** Помечает вымытыми все окна, чей центр строго ближе radius к точке. */
  markCleanedNear(point: Position, radius: number): Window[] {
    const hit = this.windows.filter((w) => distance(w.center, point) < radius);
    for (const w of hit) w.cleaned = true;
    return hit;
  }

  all(): readonly Window[] {
    return this.windows;
  }

  get size(): number {
    return this.windows.length;
  }

  cleanedCount(): number {
    return this.windows.filter((w) => w.cleaned).length;
  }
}
