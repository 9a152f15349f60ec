import type { Position } from '../core/Geometry';
import { distance, formatPosition, lerp } from '../core/Geometry';
import type { VehicleProfile } from '../core/Config';
import type { Effector } from '../core/Actions';
import type { AppLogger } from '../core/Logger';

export type MoveFailure = 'altitude-ceiling' | 'effector';

export interface MoveResult {
  ok: boolean;
  /** Последняя достигнутая точка (цель при успехе). */
  position: Position;
  /** Суммарное время успешно пройденных отрезков, с. */
  elapsed: number;
  reason?: MoveFailure;
}

/**
 * Безопасное перемещение: длинные отрезки дробятся на равные подшаги,
 * каждый подшаг проверяется по потолку высоты и исполняется через Effector.
 *
 * Потолок сравнивается со второй координатой цели (y), а не с z.
 */
export class MotionExecutor {
  constructor(
    private readonly effector: Effector,
    private readonly profile: VehicleProfile,
    private readonly logger: AppLogger,
  ) {}

  /** Подшаги отрезка from → to: floor(d / segmentLength) + 1 равных частей. */
  segment(from: Position, to: Position): Position[] {
    const steps = Math.floor(distance(from, to) / this.profile.segmentLength) + 1;
    const points: Position[] = [];
    for (let i = 1; i <= steps; i++) {
      points.push(i === steps ? to : lerp(from, to, i / steps));
    }
    return points;
  }

  async moveTo(from: Position, target: Position): Promise<MoveResult> {
    let position = from;
    let elapsed = 0;
    // стек отрезков; вершина — следующий к исполнению
    const pending: Position[] = [target];

    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      const d = distance(position, next);

      if (d > this.profile.segmentThreshold) {
        this.logger.debug(`MotionExecutor: ${d.toFixed(2)}m exceeds ${this.profile.segmentThreshold}m, splitting`);
        pending.push(...this.segment(position, next).reverse());
        continue;
      }

      if (next.y > this.profile.maxAltitude) {
        this.logger.warn(`MotionExecutor: cannot exceed max altitude of ${this.profile.maxAltitude}m (target ${formatPosition(next)})`);
        return { ok: false, position, elapsed, reason: 'altitude-ceiling' };
      }

      const seconds = d / this.profile.cruiseSpeed;
      let done = false;
      try {
        done = await this.effector.perform({ kind: 'move', target: next, seconds });
      } catch (e) {
        this.logger.error(`MotionExecutor: effector error: ${e instanceof Error ? e.message : String(e)}`);
      }
      if (!done) {
        return { ok: false, position, elapsed, reason: 'effector' };
      }
      this.logger.debug(`MotionExecutor: at ${formatPosition(next)} (distance: ${d.toFixed(2)}m, time: ${seconds.toFixed(1)}s)`);
      position = next;
      elapsed += seconds;
    }

    return { ok: true, position, elapsed };
  }
}
