import type Logger from "bunyan";
import { ISearchEngine, Outcome, Rng, createRng } from "@ttt-mcts/core";
import { ISelfPlayGame } from "./interfaces/ISelfPlayGame";
import { DatasetRecorder } from "./DatasetRecorder";

export const DEFAULT_SIMULATIONS = 100;
export const DEFAULT_GAMES = 500;
const PROGRESS_EVERY = 50;

export interface MoveEvent<TState> {
  gameIndex: number;
  /** 1-based move number within the game */
  moveNumber: number;
  state: TState;
  /** Rendered board after the move */
  board: string;
  /** Announcement line (e.g. "X wins"), or null */
  status: string | null;
  /** Whether the move went into the dataset */
  recorded: boolean;
}

export interface SelfPlayDriverOptions<TState> {
  game: ISelfPlayGame<TState>;
  /** Called once per game; each game searches with a fresh tree */
  createEngine: (rng: Rng) => ISearchEngine<TState>;
  recorder?: DatasetRecorder;
  /** Rollouts per move (default 100) */
  simulations?: number;
  /** Games per run() (default 500) */
  games?: number;
  /** Probability that the driver plays a uniformly random move instead of asking the engine */
  randomMoveRate?: number;
  rng?: Rng;
  logger?: Logger;
  onMove?: (event: MoveEvent<TState>) => void;
}

export interface GameSummary {
  gameIndex: number;
  moves: number;
  recorded: number;
  outcome: Outcome;
}

export interface SelfPlayResult {
  gamesCompleted: number;
  /** Win count per winner label */
  wins: Record<string, number>;
  draws: number;
  records: number;
  averageMoves: number;
  durationMs: number;
}

/**
 * Plays games of one module against itself through a search engine and logs
 * every search-chosen transition into a DatasetRecorder.
 *
 * Fully synchronous: driver -> engine round-trip -> state update -> record.
 */
export class SelfPlayDriver<TState> {
  private game: ISelfPlayGame<TState>;
  private createEngine: (rng: Rng) => ISearchEngine<TState>;
  private recorder: DatasetRecorder;
  private simulations: number;
  private games: number;
  private randomMoveRate: number;
  private rng: Rng;
  private log?: Logger;
  private onMove?: (event: MoveEvent<TState>) => void;

  constructor(opts: SelfPlayDriverOptions<TState>) {
    this.game = opts.game;
    this.createEngine = opts.createEngine;
    this.recorder = opts.recorder ?? new DatasetRecorder();
    this.simulations = opts.simulations ?? DEFAULT_SIMULATIONS;
    this.games = opts.games ?? DEFAULT_GAMES;
    this.randomMoveRate = opts.randomMoveRate ?? 0;
    this.rng = opts.rng ?? createRng();
    this.log = opts.logger?.child({ component: "selfplay", gameId: opts.game.gameId });
    this.onMove = opts.onMove;

    if (!Number.isInteger(this.simulations) || this.simulations < 1) {
      throw new Error(`simulations must be a positive integer, got ${this.simulations}`);
    }
    if (!Number.isInteger(this.games) || this.games < 0) {
      throw new Error(`games must be a non-negative integer, got ${this.games}`);
    }
    if (!(this.randomMoveRate >= 0 && this.randomMoveRate <= 1)) {
      throw new Error(`randomMoveRate must be within [0, 1], got ${this.randomMoveRate}`);
    }
  }

  getRecorder(): DatasetRecorder {
    return this.recorder;
  }

  /**
   * Play one game from the root state to a terminal state.
   */
  playGame(gameIndex = 0): GameSummary {
    const engine = this.createEngine(this.rng);
    let state = this.game.init();
    let moves = 0;
    let recorded = 0;

    while (!this.game.isTerminal(state)) {
      let next: TState;
      let forcedRandom = false;

      if (this.randomMoveRate > 0 && this.rng.nextFloat() < this.randomMoveRate) {
        const random = this.game.randomMove(state, this.rng);
        if (random === null) {
          throw new Error("randomMove returned null on a non-terminal state");
        }
        next = random;
        forcedRandom = true;
      } else {
        engine.runSimulations(state, this.simulations);
        next = engine.selectMove(state);
      }

      const record = !forcedRandom && !this.game.isRandomTransition(next);
      if (record) {
        this.recorder.record(this.game.toTrainingRecord(state, next));
        recorded++;
      }

      state = next;
      moves++;

      this.onMove?.({
        gameIndex,
        moveNumber: moves,
        state,
        board: this.game.ui.renderBoard(state),
        status: this.game.ui.renderStatus(state),
        recorded: record,
      });
    }

    const outcome = this.game.getOutcome(state);
    this.log?.debug({ gameIndex, moves, recorded, winner: outcome.winner }, "Game finished");
    return { gameIndex, moves, recorded, outcome };
  }

  /**
   * Play the configured number of games sequentially.
   */
  run(): SelfPlayResult {
    const startTime = Date.now();
    const wins: Record<string, number> = {};
    let draws = 0;
    let totalMoves = 0;

    this.log?.info(
      { games: this.games, simulations: this.simulations, randomMoveRate: this.randomMoveRate },
      "Self-play started"
    );

    for (let i = 0; i < this.games; i++) {
      const summary = this.playGame(i);
      totalMoves += summary.moves;

      if (summary.outcome.winner !== null) {
        wins[summary.outcome.winner] = (wins[summary.outcome.winner] ?? 0) + 1;
      } else {
        draws++;
      }

      if ((i + 1) % PROGRESS_EVERY === 0 && i + 1 < this.games) {
        this.log?.info({ completed: i + 1, records: this.recorder.size }, "Self-play progress");
      }
    }

    const result: SelfPlayResult = {
      gamesCompleted: this.games,
      wins,
      draws,
      records: this.recorder.size,
      averageMoves: this.games > 0 ? totalMoves / this.games : 0,
      durationMs: Date.now() - startTime,
    };

    this.log?.info(result, "Self-play finished");
    return result;
  }
}
