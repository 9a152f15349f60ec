import type { IState, IStateContext } from '../State';
import { CleanState } from './CleanState';
import { ServiceState } from './ServiceState';
import { MissionState } from '../MissionContext';

export class PlanState implements IState {
  name = 'PlanState';

  async execute(ctx: IStateContext): Promise<IState> {
    if (ctx.mission.planCleaningPath()) {
      return new CleanState();
    }
    // Окон нет — возврат домой и посадка
    if (ctx.mission.state !== MissionState.IDLE) {
      ctx.log(`[${this.name}] nothing to clean, returning home`);
      await ctx.mission.returnToHome();
    }
    return new ServiceState();
  }
}
