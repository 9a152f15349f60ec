import type { IState, IStateContext } from '../State';
import { ScanState } from './ScanState';

export class TakeoffState implements IState {
  name = 'TakeoffState';

  async enter(ctx: IStateContext): Promise<void> {
    ctx.log(`[${this.name}] enter`);
  }

  async execute(ctx: IStateContext): Promise<IState | void> {
    const ok = await ctx.mission.takeoff();
    if (!ok) {
      ctx.log(`[${this.name}] takeoff refused, stopping`);
      return;
    }
    return new ScanState();
  }
}
