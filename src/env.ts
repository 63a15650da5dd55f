export interface StepResult<S> {
  /** `null` when the episode has ended. */
  nextState: S | null;
  reward: number;
}

/**
 * Minimal episodic environment consumed by the runner. Simulation rules live in
 * the implementation; the memory only ever sees `S` and `A` values.
 */
export interface Environment<S, A> {
  reset(): S;
  /** Actions available in the current state. */
  actions(): readonly A[];
  step(action: A): StepResult<S>;
}
