import type { Position } from './Geometry';
import { formatPosition } from './Geometry';
import type { VehicleProfile } from './Config';
import type { AppLogger } from './Logger';

/** Команда физическому исполнителю. */
export type EffectorCommand =
  | { kind: 'takeoff'; target: Position }
  | { kind: 'move'; target: Position; seconds: number }
  | { kind: 'clean' }
  | { kind: 'land'; target: Position }
  | { kind: 'hover'; seconds: number }
  | { kind: 'recharge' }
  | { kind: 'refill' };

/**
 * Граница с железом: выполняет действие, блокируясь на его длительность.
 * Возвращает false, если действие не удалось.
 */
export interface Effector {
  perform(cmd: EffectorCommand): Promise<boolean>;
}

export interface ActionsConfig {
  /** Логировать ли каждое действие. */
  enableActions?: boolean;
  /** Реально ждать длительность действия. */
  realtime?: boolean;
  /** Множитель реальной задержки (1 = секунда на секунду). */
  timeScale?: number;
}

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/** Логическая длительность команды в секундах. */
export function commandDuration(cmd: EffectorCommand, profile: VehicleProfile): number {
  switch (cmd.kind) {
    case 'takeoff': return profile.durations.takeoff;
    case 'move': return cmd.seconds;
    case 'hover': return cmd.seconds;
    case 'clean': return profile.durations.clean;
    case 'recharge': return profile.durations.recharge;
    case 'refill': return profile.durations.refill;
    case 'land': return 0;
  }
}

function describe(cmd: EffectorCommand): string {
  switch (cmd.kind) {
    case 'takeoff': return `takeoff to ${formatPosition(cmd.target)}`;
    case 'move': return `move to ${formatPosition(cmd.target)} (${cmd.seconds.toFixed(1)}s)`;
    case 'land': return `land at ${formatPosition(cmd.target)}`;
    case 'hover': return `hover ${cmd.seconds}s`;
    case 'clean': return 'spray fluid and wipe';
    case 'recharge': return 'recharge battery';
    case 'refill': return 'refill cleaning fluid';
  }
}

/**
 * Симулированный исполнитель: всегда успешен, опционально спит реальное время.
 */
export class Actions implements Effector {
  private readonly enableActions: boolean;
  private readonly realtime: boolean;
  private readonly timeScale: number;

  constructor(
    cfg: ActionsConfig,
    private readonly profile: VehicleProfile,
    private readonly logger: AppLogger,
  ) {
    this.enableActions = cfg.enableActions ?? true;
    this.realtime = cfg.realtime ?? false;
    this.timeScale = Math.max(0, cfg.timeScale ?? 1);
  }

  async perform(cmd: EffectorCommand): Promise<boolean> {
    if (this.enableActions) {
      this.logger.debug(`Actions: ${describe(cmd)}`);
    }
    if (this.realtime) {
      const ms = commandDuration(cmd, this.profile) * this.timeScale * 1000;
      if (ms > 0) await sleep(ms);
    }
    return true;
  }
}
