import { ContractErrorCode, ContractViolation, Rng } from "@ttt-mcts/core";
import { BOARD_CELLS, BoardState, createState, otherPlayer, stateKey } from "./state";

export function emptyCells(state: BoardState): number[] {
  const cells: number[] = [];
  for (let i = 0; i < BOARD_CELLS; i++) {
    if (state.board[i] === "") cells.push(i);
  }
  return cells;
}

export function isLegalMove(state: BoardState, index: number): boolean {
  return (
    !state.terminal &&
    Number.isInteger(index) &&
    index >= 0 &&
    index < BOARD_CELLS &&
    state.board[index] === ""
  );
}

/**
 * Place the mover's mark at `index` and return the successor state.
 */
export function applyMove(
  state: BoardState,
  index: number,
  fromRandomMove = false
): BoardState {
  if (state.terminal) {
    throw new ContractViolation(
      ContractErrorCode.MOVE_ON_TERMINAL,
      `Cannot move on finished board ${stateKey(state)}`,
      { index }
    );
  }
  if (!isLegalMove(state, index)) {
    throw new ContractViolation(
      ContractErrorCode.ILLEGAL_MOVE,
      `Cell ${index} is not playable on board ${stateKey(state)}`,
      { index }
    );
  }

  const board = [...state.board];
  board[index] = state.turn;
  return createState(board, otherPlayer(state.turn), fromRandomMove);
}

/** One successor per empty cell in ascending cell order; none once terminal. */
export function enumerateMoves(state: BoardState): BoardState[] {
  if (state.terminal) {
    return [];
  }
  return emptyCells(state).map((i) => applyMove(state, i));
}

export function randomMove(state: BoardState, rng: Rng): BoardState | null {
  if (state.terminal) {
    return null;
  }
  const empty = emptyCells(state);
  return applyMove(state, empty[rng.nextInt(empty.length)], true);
}
