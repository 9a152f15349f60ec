import type { IState, IStateContext } from './State';

export class StateMachine {
  private current: IState | null = null;
  private readonly ctx: IStateContext;
  private readonly visited: string[] = [];
  private stopped = false;

  constructor(initial: IState, ctx: IStateContext) {
    this.current = initial;
    this.ctx = ctx;
  }

  getCurrentStateName(): string | undefined {
    return this.current?.name;
  }

  /** Имена фаз в порядке входа. */
  history(): readonly string[] {
    return this.visited;
  }

  /** Request graceful stop. The machine will finish current execute() and then exit the loop. */
  stop(): void {
    this.stopped = true;
  }

  async start(maxSteps = 100): Promise<void> {
    let steps = 0;
    while (this.current && steps < maxSteps && !this.stopped) {
      if (steps === 0) {
        this.visited.push(this.current.name);
        await this.current.enter?.(this.ctx);
      }
      const next = await this.current.execute(this.ctx);
      if (this.stopped) { break; }
      if (next && next !== this.current) {
        await this.current.exit?.(this.ctx);
        this.current = next;
        this.visited.push(next.name);
        await this.current.enter?.(this.ctx);
      } else if (!next) {
        // No transition requested; stop
        await this.current.exit?.(this.ctx);
        this.current = null;
        break;
      }
      steps++;
    }
  }
}
