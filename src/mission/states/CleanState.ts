import type { IState, IStateContext } from '../State';
import { ServiceState } from './ServiceState';

export class CleanState implements IState {
  name = 'CleanState';

  async execute(ctx: IStateContext): Promise<IState> {
    const ok = await ctx.mission.executeCleaning();
    if (!ok) {
      ctx.log(`[${this.name}] cleaning aborted in ${ctx.mission.state}`);
    }
    return new ServiceState();
  }
}
