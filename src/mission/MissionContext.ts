import type { Position } from '../core/Geometry';
import { ORIGIN } from '../core/Geometry';
import type { VehicleProfile } from '../core/Config';
import { ResourceManager } from './ResourceManager';
import { WindowRegistry } from './WindowRegistry';

export const MissionState = {
  IDLE: 'IDLE',
  SCANNING: 'SCANNING',
  MAPPING: 'MAPPING',
  PATH_PLANNING: 'PATH_PLANNING',
  CLEANING: 'CLEANING',
  RETURNING: 'RETURNING',
  EMERGENCY: 'EMERGENCY',
} as const;

export type MissionState = typeof MissionState[keyof typeof MissionState];

export interface Transition {
  from: MissionState;
  to: MissionState;
  /** Логическое время перехода, с. */
  at: number;
}

/**
 * Агрегат миссии. Единственный владелец — MissionController; никто другой его не мутирует.
 */
export interface MissionContext {
  state: MissionState;
  position: Position;
  readonly home: Position;
  readonly resources: ResourceManager;
  readonly registry: WindowRegistry;
  path: Position[];
  /** Логические часы миссии, с. */
  clock: number;
  readonly transitions: Transition[];
}

export function createMissionContext(profile: VehicleProfile, home: Position = ORIGIN): MissionContext {
  return {
    state: MissionState.IDLE,
    position: { ...home },
    home: { ...home },
    resources: new ResourceManager(profile.thresholds),
    registry: new WindowRegistry(),
    path: [],
    clock: 0,
    transitions: [],
  };
}
