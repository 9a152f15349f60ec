import fs from 'fs';
import path from 'path';

/**
 * Профиль аппарата. Константы фиксированы и не читаются из settings.jsonc:
 * от них зависят геометрия маршрута и пороги ресурсов.
 */
export interface VehicleProfile {
  /** Крейсерская скорость, м/с. */
  cruiseSpeed: number;
  /** Производительность мойки, м²/мин (только для сводки). */
  cleaningRate: number;
  /** Потолок по второй координате цели, м. */
  maxAltitude: number;
  /** Поле зрения камеры [гор, верт], градусы. Информационно. */
  cameraFov: [number, number];
  /** Шаг строк покрытия окна, м. */
  coverageSpacing: number;
  /** Радиус, в пределах которого пролёт мимо центра окна засчитывается как мойка, м. */
  cleanRadius: number;
  /** Отступ точки подхода от плоскости окна, м. */
  approachStandoff: number;
  /** Перемещения длиннее этого порога дробятся, м. */
  segmentThreshold: number;
  /** Номинальная длина подшага при дроблении, м. */
  segmentLength: number;
  /** Высота взлёта над домом, м. */
  takeoffAltitude: number;
  /** Вероятность срабатывания детектора за тик сканирования. */
  detectionProbability: number;
  /** Расход батареи за тик сканирования, %. */
  scanBatteryPerTick: number;
  /** Расход на одну пройденную точку маршрута, %. */
  waypointBatteryCost: number;
  waypointFluidCost: number;
  thresholds: {
    batteryCritical: number;
    batteryLow: number;
    fluidLow: number;
  };
  /** Длительности физических действий, секунды логических часов. */
  durations: {
    takeoff: number;
    scanTick: number;
    clean: number;
    recharge: number;
    refill: number;
  };
}

export const VEHICLE_PROFILE: Readonly<VehicleProfile> = {
  cruiseSpeed: 1.0,
  cleaningRate: 0.5,
  maxAltitude: 50,
  cameraFov: [60, 40],
  coverageSpacing: 0.3,
  cleanRadius: 1.0,
  approachStandoff: 0.5,
  segmentThreshold: 10,
  segmentLength: 5,
  takeoffAltitude: 5,
  detectionProbability: 0.1,
  scanBatteryPerTick: 0.05,
  waypointBatteryCost: 0.1,
  waypointFluidCost: 0.2,
  thresholds: { batteryCritical: 10, batteryLow: 15, fluidLow: 5 },
  durations: { takeoff: 2, scanTick: 1, clean: 0.5, recharge: 2, refill: 1.5 },
};

/**
 * Настройки запуска. Загружаются из settings.jsonc в корне проекта поверх дефолтов.
 */
export interface AppSettings {
  /** Уровень логирования winston. */
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  /** Seed для генератора детекций и вероятностного гейта сканирования. */
  seed: number;
  mission: {
    /** Длительность сканирования фасада, тики (секунды). */
    scanSeconds: number;
  };
  /** Параметры исполнителя физических действий. */
  actions: {
    /** Логировать ли каждое действие. */
    enableActions: boolean;
    /** Реально ждать длительность действия (иначе только логические часы). */
    realtime: boolean;
    /** Множитель реальной задержки относительно логической длительности. */
    timeScale: number;
  };
}

/** Дефолтные значения на случай отсутствия settings.jsonc или его полей. */
export const DEFAULT_SETTINGS: AppSettings = {
  logLevel: 'info',
  seed: 42,
  mission: { scanSeconds: 60 },
  actions: { enableActions: true, realtime: false, timeScale: 0.01 },
};

/** Свежая копия дефолтов: вызывающий может менять результат, не трогая DEFAULT_SETTINGS. */
export function defaultSettings(): AppSettings {
  return {
    ...DEFAULT_SETTINGS,
    mission: { ...DEFAULT_SETTINGS.mission },
    actions: { ...DEFAULT_SETTINGS.actions },
  };
}

const LOG_LEVELS: ReadonlyArray<AppSettings['logLevel']> = ['error', 'warn', 'info', 'debug'];

// Удаление комментариев из JSONC (// ... и /* ... */)
export function stripJsonComments(input: string): string {
  const out = input.replace(/\/\*[\s\S]*?\*\//g, '');
  return out.replace(/(^|[^:])\/\/.*$/gm, (_m, g1: string | undefined) => g1 ?? '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteOr(value: unknown, fallback: number, min = -Infinity): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= min ? value : fallback;
}

function boolOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function isLogLevel(value: unknown): value is AppSettings['logLevel'] {
  return LOG_LEVELS.some((l) => l === value);
}

/**
 * Накладывает распарсенный JSON на дефолты. Некорректные поля игнорируются по одному,
 * остальные применяются.
 */
export function mergeSettings(parsed: unknown): AppSettings {
  if (!isRecord(parsed)) return defaultSettings();
  const mission = isRecord(parsed.mission) ? parsed.mission : {};
  const actions = isRecord(parsed.actions) ? parsed.actions : {};
  return {
    logLevel: isLogLevel(parsed.logLevel) ? parsed.logLevel : DEFAULT_SETTINGS.logLevel,
    seed: Math.floor(finiteOr(parsed.seed, DEFAULT_SETTINGS.seed)),
    mission: {
      scanSeconds: Math.floor(finiteOr(mission.scanSeconds, DEFAULT_SETTINGS.mission.scanSeconds, 0)),
    },
    actions: {
      enableActions: boolOr(actions.enableActions, DEFAULT_SETTINGS.actions.enableActions),
      realtime: boolOr(actions.realtime, DEFAULT_SETTINGS.actions.realtime),
      timeScale: finiteOr(actions.timeScale, DEFAULT_SETTINGS.actions.timeScale, 0),
    },
  };
}

/**
 * Загружает настройки из settings.jsonc. При ошибке чтения/парсинга возвращает дефолты,
 * чтобы не падать на старте.
 *
 * @param file Путь к файлу; по умолчанию settings.jsonc в текущей директории
 */
export function loadSettings(file = path.resolve(process.cwd(), 'settings.jsonc')): AppSettings {
  if (!fs.existsSync(file)) return defaultSettings();
  try {
    const raw = fs.readFileSync(file, 'utf-8');
    const parsed: unknown = JSON.parse(stripJsonComments(raw));
    return mergeSettings(parsed);
  } catch {
    return defaultSettings();
  }
}
