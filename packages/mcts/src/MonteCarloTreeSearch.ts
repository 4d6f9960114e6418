/**
 * Monte Carlo Tree Search over any ISearchGame.
 *
 * Uses UCT (Upper Confidence Bound applied to Trees) for selection:
 *
 *   UCT = Q/N + C * sqrt(ln(N_parent) / N)
 *
 * where Q is the total reward of a node from the point of view of the player
 * who moved into it, N its visit count and C the exploration weight.
 *
 * Rollouts play uniformly random moves to the end of the game. Rewards are
 * zero-sum, so they are negated at every ply on the way back up.
 */
import {
  ContractErrorCode,
  ContractViolation,
  ISearchEngine,
  ISearchGame,
  Rng,
  createRng,
} from "@ttt-mcts/core";

export const DEFAULT_EXPLORATION_WEIGHT = 1;

export interface MonteCarloTreeSearchOptions<TState> {
  game: ISearchGame<TState>;
  explorationWeight?: number;
  rng?: Rng;
}

export interface NodeStats {
  visits: number;
  totalReward: number;
}

export class MonteCarloTreeSearch<TState> implements ISearchEngine<TState> {
  private game: ISearchGame<TState>;
  private explorationWeight: number;
  private rng: Rng;

  private totals = new Map<string, number>();
  private visits = new Map<string, number>();
  /** Expanded nodes and their successors */
  private children = new Map<string, TState[]>();

  constructor(opts: MonteCarloTreeSearchOptions<TState>) {
    this.game = opts.game;
    this.explorationWeight = opts.explorationWeight ?? DEFAULT_EXPLORATION_WEIGHT;
    this.rng = opts.rng ?? createRng();

    if (!(this.explorationWeight >= 0)) {
      throw new Error(`explorationWeight must be non-negative, got ${this.explorationWeight}`);
    }
  }

  runSimulations(state: TState, count: number): void {
    for (let i = 0; i < count; i++) {
      this.doRollout(state);
    }
  }

  /**
   * Choose the best successor of `state`: the child with the highest average
   * reward. A state the tree has never expanded gets a random move instead.
   */
  selectMove(state: TState): TState {
    if (this.game.isTerminal(state)) {
      throw new ContractViolation(
        ContractErrorCode.SELECT_ON_TERMINAL,
        `selectMove called on terminal state ${this.game.stateKey(state)}`
      );
    }

    const children = this.children.get(this.game.stateKey(state));
    if (!children) {
      const random = this.game.randomMove(state, this.rng);
      if (random === null) {
        throw new Error(`No legal move from non-terminal state ${this.game.stateKey(state)}`);
      }
      return random;
    }

    let best = children[0];
    let bestScore = -Infinity;
    for (const child of children) {
      const score = this.averageReward(child);
      if (score > bestScore) {
        best = child;
        bestScore = score;
      }
    }
    return best;
  }

  /** One iteration of select -> expand -> simulate -> backpropagate. */
  doRollout(state: TState): void {
    const path = this.select(state);
    const leaf = path[path.length - 1];
    this.expand(leaf);
    const reward = this.simulate(leaf);
    this.backpropagate(path, reward);
  }

  getStats(state: TState): NodeStats | null {
    const key = this.game.stateKey(state);
    const visits = this.visits.get(key);
    if (visits === undefined) return null;
    return { visits, totalReward: this.totals.get(key) ?? 0 };
  }

  /** Number of expanded nodes in the tree */
  get size(): number {
    return this.children.size;
  }

  private averageReward(state: TState): number {
    const key = this.game.stateKey(state);
    const n = this.visits.get(key) ?? 0;
    if (n === 0) return -Infinity; // avoid unseen moves
    return (this.totals.get(key) ?? 0) / n;
  }

  /** Descend until reaching an unexpanded or terminal node, or an unexplored child. */
  private select(state: TState): TState[] {
    const path: TState[] = [];
    let node = state;
    for (;;) {
      path.push(node);
      const children = this.children.get(this.game.stateKey(node));
      if (!children || children.length === 0) {
        return path;
      }
      const unexplored = children.filter((c) => !this.children.has(this.game.stateKey(c)));
      if (unexplored.length > 0) {
        path.push(unexplored[this.rng.nextInt(unexplored.length)]);
        return path;
      }
      node = this.uctSelect(node, children);
    }
  }

  private expand(state: TState): void {
    const key = this.game.stateKey(state);
    if (this.children.has(key)) return;
    this.children.set(key, this.game.enumerateMoves(state));
  }

  /**
   * Random playout from `state`. Returns the reward from the point of view of
   * the player who moved into `state`.
   */
  private simulate(state: TState): number {
    let node = state;
    let invert = true;
    for (;;) {
      if (this.game.isTerminal(node)) {
        const reward = this.game.reward(node);
        return invert ? -reward : reward;
      }
      const next = this.game.randomMove(node, this.rng);
      if (next === null) {
        throw new Error(`No legal move from non-terminal state ${this.game.stateKey(node)}`);
      }
      node = next;
      invert = !invert;
    }
  }

  private backpropagate(path: TState[], reward: number): void {
    let value = reward;
    for (let i = path.length - 1; i >= 0; i--) {
      const key = this.game.stateKey(path[i]);
      this.visits.set(key, (this.visits.get(key) ?? 0) + 1);
      this.totals.set(key, (this.totals.get(key) ?? 0) + value);
      value = -value;
    }
  }

  private uctSelect(state: TState, children: TState[]): TState {
    // All children are expanded, so all have been visited at least once.
    const logParent = Math.log(this.visits.get(this.game.stateKey(state)) ?? 1);

    let best = children[0];
    let bestScore = -Infinity;
    for (const child of children) {
      const key = this.game.stateKey(child);
      const n = this.visits.get(key) ?? 1;
      const q = this.totals.get(key) ?? 0;
      const score = q / n + this.explorationWeight * Math.sqrt(logParent / n);
      if (score > bestScore) {
        best = child;
        bestScore = score;
      }
    }
    return best;
  }
}
