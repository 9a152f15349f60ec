import type { MissionController } from './MissionController';

/**
 * Контекст раннера миссии. Предоставляет сервисы, доступные всем фазам.
 */
export interface IStateContext {
  /** Логирование сообщений фазы (в обёртку winston). */
  log: (msg: string) => void;
  /** Контроллер миссии, единственный владелец её состояния. */
  mission: MissionController;
  /** Длительность сканирования, тики. */
  scanSeconds: number;
}

/**
 * Фаза раннера. Подготовка в `enter`, основная работа в `execute`, очистка в `exit`.
 */
export interface IState {
  /** Человекочитаемое имя фазы (для логов/отладки). */
  name: string;
  enter?(ctx: IStateContext): Promise<void> | void;
  /**
   * Основная работа фазы.
   * @returns Следующая фаза или `void`, чтобы остановить раннер
   */
  execute(ctx: IStateContext): Promise<IState | void> | IState | void;
  exit?(ctx: IStateContext): Promise<void> | void;
}
