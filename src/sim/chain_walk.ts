import type { Environment, StepResult } from '../env';

export type ChainAction = 'left' | 'right';

export const CHAIN_ACTIONS: readonly ChainAction[] = ['left', 'right'];

/**
 * Demo environment: a line of `length` cells starting in the middle. Reaching
 * the right end pays +1, the left end -1; both end the episode.
 */
export class ChainWalk implements Environment<number, ChainAction> {
  private position = 0;

  constructor(readonly length = 7) {
    if (!Number.isInteger(length) || length < 3) {
      throw new RangeError(`ChainWalk needs at least 3 cells, got ${length}`);
    }
  }

  get start(): number {
    return Math.floor(this.length / 2);
  }

  reset(): number {
    this.position = this.start;
    return this.position;
  }

  actions(): readonly ChainAction[] {
    return CHAIN_ACTIONS;
  }

  step(action: ChainAction): StepResult<number> {
    this.position += action === 'right' ? 1 : -1;
    if (this.position >= this.length - 1) return { nextState: null, reward: 1 };
    if (this.position <= 0) return { nextState: null, reward: -1 };
    return { nextState: this.position, reward: 0 };
  }
}
