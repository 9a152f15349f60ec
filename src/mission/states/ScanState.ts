import type { IState, IStateContext } from '../State';
import { PlanState } from './PlanState';

/**
 * ScanState: сканирует фасад и передаёт найденные окна в планирование.
 */
export class ScanState implements IState {
  name = 'ScanState';

  async execute(ctx: IStateContext): Promise<IState> {
    await ctx.mission.scan(ctx.scanSeconds);
    ctx.log(`[${this.name}] windows=${ctx.mission.windows.length}`);
    return new PlanState();
  }
}
