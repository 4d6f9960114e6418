import {
  ContractErrorCode,
  ContractViolation,
  Outcome,
} from "@ttt-mcts/core";
import { ISelfPlayGame } from "@ttt-mcts/engine";
import { TicTacToeUI } from "./ui";
import { BoardState, initialState, otherPlayer, stateKey } from "./state";
import { applyMove, enumerateMoves, randomMove } from "./actions";
import { toTrainingRecord, validateRecord } from "./observation";

export function isTerminal(state: BoardState): boolean {
  return state.terminal;
}

/**
 * Reward for the player to move on a finished board: -1 when the opponent
 * has just won, 0 for a draw. The mover can never be the winner of the board
 * they are about to act on, so +1 is never returned.
 */
export function reward(state: BoardState): -1 | 0 {
  if (!state.terminal) {
    throw new ContractViolation(
      ContractErrorCode.REWARD_ON_NONTERMINAL,
      `reward called on nonterminal board ${stateKey(state)}`
    );
  }
  if (state.winner === state.turn) {
    // It's the winner's turn again: move generation or turn alternation is broken.
    throw new ContractViolation(
      ContractErrorCode.REWARD_ON_UNREACHABLE,
      `reward called on unreachable board ${stateKey(state)}`
    );
  }
  if (state.winner === otherPlayer(state.turn)) {
    return -1;
  }
  if (state.winner === null) {
    return 0;
  }
  throw new ContractViolation(
    ContractErrorCode.UNKNOWN_WINNER,
    `board has unknown winner ${String(state.winner)}`
  );
}

export function getOutcome(state: BoardState): Outcome {
  if (state.winner !== null) {
    return { winner: state.winner, draw: false, reason: "three_in_a_row" };
  }
  if (state.terminal) {
    return { winner: null, draw: true, reason: "board_full" };
  }
  return { winner: null, draw: false, reason: "game_in_progress" };
}

export const TicTacToeModule: ISelfPlayGame<BoardState> = {
  gameId: "tictactoe",
  name: "Tic-Tac-Toe",
  ui: TicTacToeUI,

  init: initialState,
  applyMove: (state, index) => applyMove(state, index),
  stateKey,
  enumerateMoves,
  randomMove,
  isTerminal,
  reward,
  isRandomTransition: (state) => state.fromRandomMove,
  toTrainingRecord,
  validateRecord,
  getOutcome,
};
