/** Source of randomness shared by move generation, rollouts and the driver. */
export interface Rng {
  /** Return a float in [0, 1) */
  nextFloat(): number;
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * Callbacks a search engine makes into a game. States are immutable values;
 * `stateKey` gives the value identity the engine keys its statistics by.
 */
export interface ISearchGame<TState> {
  /** Value identity of a position (equal positions, equal keys) */
  stateKey(state: TState): string;

  /** Every legal successor, or an empty list on a terminal state */
  enumerateMoves(state: TState): TState[];

  /** One uniformly random legal successor, or null on a terminal state */
  randomMove(state: TState, rng: Rng): TState | null;

  isTerminal(state: TState): boolean;

  /**
   * Reward for the player to move on a terminal state.
   * Must throw on a non-terminal state.
   */
  reward(state: TState): number;
}

/** The two entry points the self-play loop needs from a search engine. */
export interface ISearchEngine<TState> {
  /** Run `count` rollouts anchored at `state`, updating search statistics. */
  runSimulations(state: TState, count: number): void;

  /** Choose one successor of `state` from the legal set. */
  selectMove(state: TState): TState;
}

export interface Outcome {
  /** Label of the winning side, or null for a draw / unfinished game */
  winner: string | null;
  draw: boolean;
  reason: string;
}
