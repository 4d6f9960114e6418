import { ISearchGame, Outcome } from "@ttt-mcts/core";

// ---------------------------------------------------------------------------
// Game UI: text rendering for the terminal
// ---------------------------------------------------------------------------

/**
 * Text rendering that each game module provides so the CLI can print any
 * game without per-game logic.
 */
export interface GameUISpec<TState> {
  /** Player labels in turn order (e.g. ["X", "O"]) */
  playerLabels: string[];

  /** Hint shown to a human entering a move (e.g. "Enter 1-9") */
  inputHint: string;

  /** Max possible moves, or null if unbounded. */
  maxTurns: number | null;

  /** Render the board as a multi-line string. */
  renderBoard(state: TState): string;

  /** One-line announcement (e.g. "X wins"), or null if nothing to announce. */
  renderStatus(state: TState): string | null;

  /** Parse raw user input into a move index, or return null if unparseable. */
  parseInput(raw: string): number | null;

  /** Format a move index for logs and prompts. */
  formatMove(index: number): string;
}

/** One row of the training dataset, already in its serialized codes. */
export interface TrainingRecord {
  /** Per-cell codes of the position before the move */
  state: string[];
  /** Code of the player who moved */
  turn: string;
  /** Index of the cell that was played */
  action: number;
}

// ---------------------------------------------------------------------------
// Self-play game module
// ---------------------------------------------------------------------------

/**
 * What the self-play driver needs from a game on top of the search callbacks.
 *
 * Every function must be deterministic given the same inputs (randomness
 * comes only through the `Rng` argument of `randomMove`).
 */
export interface ISelfPlayGame<TState> extends ISearchGame<TState> {
  /** Unique identifier for this game (e.g., "tictactoe") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  readonly ui: GameUISpec<TState>;

  /** Build the root state of a new game */
  init(): TState;

  /** Apply the move at `index` for the player to move */
  applyMove(state: TState, index: number): TState;

  /** True when `state` was produced by a uniformly random move */
  isRandomTransition(state: TState): boolean;

  /** Encode the transition `prev` -> `next` as a dataset row */
  toTrainingRecord(prev: TState, next: TState): TrainingRecord;

  /** Check a dataset row read back from disk; returns a reason or null */
  validateRecord(record: TrainingRecord): string | null;

  /** Outcome of a terminal state */
  getOutcome(state: TState): Outcome;
}
