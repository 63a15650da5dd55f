import { PreconditionError } from './errors';

/** A value that changes with training time `t` (episodes, steps, ...). */
export interface Decay {
  evaluate(t: number): number;
}

export interface LinearOptions {
  /** Value at t = 0. */
  from: number;
  /** Value reached at t = `over`. */
  to: number;
  /** Horizon over which the value moves from `from` to `to`. */
  over: number;
  /** Hold `to` past the horizon. Defaults to true. */
  clamp?: boolean;
}

/**
 * v(t) = from + (to - from) * t / over
 *
 * With `clamp: false` the line keeps going past the horizon, which is how the
 * importance-sampling exponent is annealed.
 */
export class Linear implements Decay {
  private readonly from: number;
  private readonly to: number;
  private readonly rate: number;
  private readonly clamp: boolean;

  constructor(options: LinearOptions) {
    if (!(options.over > 0) || !Number.isFinite(options.over)) {
      throw new PreconditionError(`Linear horizon must be a positive number, got ${options.over}`);
    }
    if (!Number.isFinite(options.from) || !Number.isFinite(options.to)) {
      throw new PreconditionError('Linear endpoints must be finite', { from: options.from, to: options.to });
    }
    this.from = options.from;
    this.to = options.to;
    this.rate = (options.to - options.from) / options.over;
    this.clamp = options.clamp ?? true;
  }

  evaluate(t: number): number {
    const v = this.from + this.rate * t;
    if (!this.clamp) return v;
    return this.from <= this.to ? Math.min(v, this.to) : Math.max(v, this.to);
  }
}
