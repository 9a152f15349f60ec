import type { IState, IStateContext } from '../State';

/**
 * ServiceState: наземное обслуживание после миссии — зарядка и заправка. Конечная фаза.
 */
export class ServiceState implements IState {
  name = 'ServiceState';

  async execute(ctx: IStateContext): Promise<void> {
    await ctx.mission.recharge();
    await ctx.mission.refillFluid();
  }

  async exit(ctx: IStateContext): Promise<void> {
    ctx.log(`[${this.name}] exit`);
  }
}
