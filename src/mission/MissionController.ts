import type { Position } from '../core/Geometry';
import { formatPosition, samePosition } from '../core/Geometry';
import type { VehicleProfile } from '../core/Config';
import { VEHICLE_PROFILE } from '../core/Config';
import type { Effector, EffectorCommand } from '../core/Actions';
import { commandDuration } from '../core/Actions';
import type { DetectionSource, Quad } from '../core/Detection';
import type { RandomSource } from '../core/Random';
import type { AppLogger } from '../core/Logger';
import { createLogger } from '../core/Logger';
import type { MissionContext, Transition } from './MissionContext';
import { MissionState, createMissionContext } from './MissionContext';
import { MotionExecutor } from './MotionExecutor';
import { planPath, pathLength } from './PathPlanner';
import type { Window } from './WindowRegistry';

export interface MissionDeps {
  effector: Effector;
  detector: DetectionSource;
  /** Гейт детекции за тик сканирования. */
  rng: RandomSource;
  logger?: AppLogger;
  profile?: VehicleProfile;
  /** Готовый агрегат миссии; по умолчанию создаётся новый с домом в home. */
  context?: MissionContext;
  home?: Position;
}

/** Состояние миссии для внешнего наблюдателя (копия, не ссылка). */
export interface MissionSnapshot {
  state: MissionState;
  position: Position;
  battery: number;
  fluid: number;
  windows: Window[];
  waypoints: number;
  clock: number;
}

export interface MissionSummary {
  windowsTotal: number;
  windowsCleaned: number;
  battery: number;
  fluid: number;
  finalState: MissionState;
  elapsedSeconds: number;
  /** Оценка времени мойки вымытых окон по площади и производительности, мин. */
  estimatedCleaningMinutes: number;
}

function copyWindow(w: Window): Window {
  const [a, b, c, d] = w.corners;
  const corners: Quad = [{ ...a }, { ...b }, { ...c }, { ...d }];
  return { ...w, corners, center: { ...w.center }, size: { ...w.size } };
}

/**
 * Машина состояний миссии: взлёт → сканирование → планирование → мойка → возврат.
 * Публичные операции не бросают исключений: результат — boolean плюс смена состояния.
 */
export class MissionController {
  private readonly ctx: MissionContext;
  private readonly motion: MotionExecutor;
  private readonly profile: VehicleProfile;
  private readonly logger: AppLogger;

  constructor(private readonly deps: MissionDeps) {
    this.profile = deps.profile ?? VEHICLE_PROFILE;
    this.logger = deps.logger ?? createLogger();
    this.ctx = deps.context ?? createMissionContext(this.profile, deps.home);
    this.motion = new MotionExecutor(deps.effector, this.profile, this.logger);
  }

  get state(): MissionState { return this.ctx.state; }
  get position(): Position { return { ...this.ctx.position }; }
  get windows(): readonly Window[] { return this.ctx.registry.all(); }
  get path(): readonly Position[] { return this.ctx.path; }
  get transitions(): readonly Transition[] { return this.ctx.transitions; }

  async takeoff(): Promise<boolean> {
    if (this.ctx.state !== MissionState.IDLE) {
      this.logger.warn(`Cannot takeoff - vehicle not idle (${this.ctx.state})`);
      return false;
    }
    const target = { ...this.ctx.home, z: this.ctx.home.z + this.profile.takeoffAltitude };
    this.logger.info('Taking off...');
    if (!(await this.perform({ kind: 'takeoff', target }))) {
      this.logger.warn('Takeoff failed');
      return false;
    }
    this.ctx.position = target;
    this.setState(MissionState.SCANNING);
    return true;
  }

  /**
   * Сканирование фасада: duration тиков по 1 с. На каждом тике детектор срабатывает
   * с вероятностью detectionProbability; батарея тратится на каждом тике.
   * При низком заряде — досрочный возврат домой.
   */
  async scan(duration = 60): Promise<boolean> {
    if (this.ctx.state !== MissionState.SCANNING) {
      this.logger.warn(`Cannot scan - vehicle not in scanning mode (${this.ctx.state})`);
      return false;
    }
    const { resources } = this.ctx;
    this.logger.info(`Scanning building for ${duration} seconds...`);
    for (let tick = 0; tick < duration; tick++) {
      if (this.deps.rng.random() < this.profile.detectionProbability) {
        this.detectWindow(tick);
      }
      resources.depleteBattery(this.profile.scanBatteryPerTick);
      if (resources.isBatteryLow()) {
        await this.triggerLowBattery();
        break;
      }
      await this.perform({ kind: 'hover', seconds: this.profile.durations.scanTick });
    }
    this.setState(MissionState.MAPPING);
    this.logger.info('Scanning complete. Processing window data...');
    this.processWindowData();
    return true;
  }

  /** Дедупликация реестра. Состояние не меняется. */
  processWindowData(): number {
    const removed = this.ctx.registry.deduplicate();
    this.logger.info(`Identified ${this.ctx.registry.size} unique windows (${removed} duplicates dropped)`);
    return this.ctx.registry.size;
  }

  planCleaningPath(): boolean {
    if (this.ctx.state === MissionState.EMERGENCY) {
      this.logger.warn('Cannot plan - mission is in EMERGENCY');
      return false;
    }
    if (this.ctx.registry.size === 0) {
      this.logger.warn('No windows detected - scan first');
      return false;
    }
    this.setState(MissionState.PATH_PLANNING);
    this.ctx.path = planPath(this.ctx.registry.all(), this.profile);
    this.logger.info(`Generated path with ${this.ctx.path.length} waypoints (${pathLength(this.ctx.path).toFixed(1)}m)`);
    return true;
  }

  async executeCleaning(): Promise<boolean> {
    if (this.ctx.state === MissionState.EMERGENCY) {
      this.logger.warn('Cannot clean - mission is in EMERGENCY');
      return false;
    }
    if (this.ctx.path.length === 0) {
      this.logger.warn('No cleaning path - plan path first');
      return false;
    }
    const { resources, registry } = this.ctx;
    this.setState(MissionState.CLEANING);
    this.logger.info('Starting cleaning sequence...');

    for (const [i, point] of this.ctx.path.entries()) {
      if (resources.isBatteryCritical()) {
        await this.triggerEmergency(`critical battery level (${resources.battery.toFixed(1)}%)`);
        return false;
      }
      if (resources.isFluidLow()) {
        this.logger.warn(`Out of cleaning fluid (${resources.fluid.toFixed(1)}%), aborting cleaning`);
        this.setState(MissionState.RETURNING);
        break;
      }
      if (!(await this.move(point))) {
        await this.triggerEmergency(`movement to waypoint ${i} failed`);
        return false;
      }
      if (i % 10 > 1 && !(await this.perform({ kind: 'clean' }))) {
        this.logger.warn(`Cleaning activation failed at waypoint ${i}`);
      }
      resources.depleteBattery(this.profile.waypointBatteryCost);
      resources.depleteFluid(this.profile.waypointFluidCost);
      for (const w of registry.markCleanedNear(point, this.profile.cleanRadius)) {
        this.logger.debug(`Window ${w.id} cleaned`);
      }
    }

    this.logger.info(`Cleaning sequence complete: ${registry.cleanedCount()}/${registry.size} windows cleaned`);
    this.setState(MissionState.RETURNING);
    await this.returnToHome();
    return true;
  }

  /**
   * Возврат домой и посадка. В EMERGENCY не выполняется.
   * @returns Результат перемещения домой; посадка выполняется в любом случае
   */
  async returnToHome(): Promise<boolean> {
    if (this.ctx.state === MissionState.EMERGENCY) {
      return false;
    }
    this.logger.info('Returning to home position...');
    this.setState(MissionState.RETURNING);
    const moved = await this.move(this.ctx.home);
    if (!moved) {
      this.logger.warn(`Return to home failed at ${formatPosition(this.ctx.position)}`);
    }
    await this.land();
    return moved;
  }

  /**
   * Посадка. В EMERGENCY — вертикально в текущей точке, состояние остаётся EMERGENCY.
   * Иначе — перелёт домой, посадка и IDLE.
   */
  async land(): Promise<boolean> {
    this.logger.info('Landing...');
    const here = this.ctx.position;
    if (this.ctx.state === MissionState.EMERGENCY) {
      await this.touchDown({ x: here.x, y: here.y, z: this.ctx.home.z });
      return true;
    }
    const atHome = samePosition(here, this.ctx.home) || (await this.move(this.ctx.home));
    const stopped = this.ctx.position;
    const spot = atHome ? this.ctx.home : { x: stopped.x, y: stopped.y, z: this.ctx.home.z };
    await this.touchDown(spot);
    this.setState(MissionState.IDLE);
    return true;
  }

  /** Сброс после аварийной посадки (наземное обслуживание). */
  clearEmergency(): boolean {
    if (this.ctx.state !== MissionState.EMERGENCY) return false;
    this.ctx.path = [];
    this.setState(MissionState.IDLE);
    return true;
  }

  async recharge(): Promise<void> {
    this.logger.info('Recharging battery...');
    await this.perform({ kind: 'recharge' });
    this.ctx.resources.recharge();
    this.logger.info('Battery fully charged');
  }

  async refillFluid(): Promise<void> {
    this.logger.info('Refilling cleaning fluid...');
    await this.perform({ kind: 'refill' });
    this.ctx.resources.refill();
    this.logger.info('Cleaning fluid refilled');
  }

  snapshot(): MissionSnapshot {
    return {
      state: this.ctx.state,
      position: { ...this.ctx.position },
      battery: this.ctx.resources.battery,
      fluid: this.ctx.resources.fluid,
      windows: this.ctx.registry.all().map(copyWindow),
      waypoints: this.ctx.path.length,
      clock: this.ctx.clock,
    };
  }

  summarize(): MissionSummary {
    const windows = this.ctx.registry.all();
    const cleanedArea = windows
      .filter((w) => w.cleaned)
      .reduce((sum, w) => sum + w.size.width * w.size.height, 0);
    return {
      windowsTotal: windows.length,
      windowsCleaned: this.ctx.registry.cleanedCount(),
      battery: this.ctx.resources.battery,
      fluid: this.ctx.resources.fluid,
      finalState: this.ctx.state,
      elapsedSeconds: this.ctx.clock,
      estimatedCleaningMinutes: cleanedArea / this.profile.cleaningRate,
    };
  }

  private detectWindow(tick: number): void {
    const obs = this.deps.detector.detect({ ...this.ctx.position });
    if (!obs) return;
    const window = this.ctx.registry.record(obs);
    if (window) {
      this.logger.info(`Detected window ${window.id} at position ${formatPosition(window.center)} (tick ${tick})`);
    } else {
      this.logger.warn(`Rejected non-planar window observation at tick ${tick}`);
    }
  }

  private async triggerLowBattery(): Promise<void> {
    this.logger.warn(`Low battery (${this.ctx.resources.battery.toFixed(1)}%)!`);
    this.setState(MissionState.RETURNING);
    await this.returnToHome();
  }

  private async triggerEmergency(reason: string): Promise<void> {
    this.logger.error(`EMERGENCY: ${reason}. Stopping all operations and landing immediately`);
    this.setState(MissionState.EMERGENCY);
    await this.land();
  }

  private async touchDown(spot: Position): Promise<void> {
    if (await this.perform({ kind: 'land', target: spot })) {
      this.ctx.position = { ...spot };
    } else {
      this.logger.error(`Landing at ${formatPosition(spot)} failed`);
    }
  }

  private async move(target: Position): Promise<boolean> {
    const result = await this.motion.moveTo(this.ctx.position, target);
    this.ctx.position = result.position;
    this.ctx.clock += result.elapsed;
    return result.ok;
  }

  private async perform(cmd: EffectorCommand): Promise<boolean> {
    let ok = false;
    try {
      ok = await this.deps.effector.perform(cmd);
    } catch (e) {
      this.logger.error(`Effector ${cmd.kind} error: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (ok) this.ctx.clock += commandDuration(cmd, this.profile);
    return ok;
  }

  private setState(to: MissionState): void {
    const from = this.ctx.state;
    if (from === to) return;
    this.ctx.transitions.push({ from, to, at: this.ctx.clock });
    this.ctx.state = to;
    this.logger.info(`State: ${from} -> ${to}`);
  }
}
