import { ContractErrorCode, ContractViolation } from "@ttt-mcts/core";
import { TrainingRecord } from "@ttt-mcts/engine";
import { BOARD_CELLS, BoardState, CellValue, Player, inferTurn, stateFromBoard, stateKey } from "./state";

// Dataset codes: empty -> "0", X -> "1", O -> "-1"; an unset mover is "0".
const CELL_CODES: Record<CellValue, string> = { "": "0", X: "1", O: "-1" };

export function encodeCell(cell: CellValue): string {
  return CELL_CODES[cell];
}

export function encodeTurn(turn: Player | null): string {
  if (turn === "X") return "1";
  if (turn === "O") return "-1";
  return "0";
}

/** Per-cell codes of a position, in board order */
export function encodeSnapshot(state: BoardState): string[] {
  return state.board.map(encodeCell);
}

export function decodeCell(code: string): CellValue {
  switch (code) {
    case "0":
      return "";
    case "1":
      return "X";
    case "-1":
      return "O";
    default:
      throw new Error(`Unknown cell code "${code}"`);
  }
}

export function decodeTurn(code: string): Player {
  if (code === "1") return "X";
  if (code === "-1") return "O";
  throw new Error(`Unknown turn code "${code}"`);
}

/**
 * Index of the one cell `prev.turn` filled between `prev` and `next`.
 */
export function findAction(prev: BoardState, next: BoardState): number {
  const changed: number[] = [];
  for (let i = 0; i < BOARD_CELLS; i++) {
    if (prev.board[i] !== next.board[i]) changed.push(i);
  }
  if (
    changed.length !== 1 ||
    prev.board[changed[0]] !== "" ||
    next.board[changed[0]] !== prev.turn
  ) {
    throw new ContractViolation(
      ContractErrorCode.NOT_A_SINGLE_MOVE,
      `Boards ${stateKey(prev)} and ${stateKey(next)} are not one move apart`,
      { changed }
    );
  }
  return changed[0];
}

/** Encode the transition `prev` -> `next`; the snapshot is taken before the move. */
export function toTrainingRecord(prev: BoardState, next: BoardState): TrainingRecord {
  return {
    state: encodeSnapshot(prev),
    turn: encodeTurn(prev.turn),
    action: findAction(prev, next),
  };
}

export function decodeSnapshot(codes: readonly string[], turn: string): BoardState {
  if (codes.length !== BOARD_CELLS) {
    throw new Error(`Expected ${BOARD_CELLS} cells, got ${codes.length}`);
  }
  return stateFromBoard(codes.map(decodeCell), decodeTurn(turn));
}

/**
 * Check a record read back from a dataset: codes, turn parity, a position
 * still in play, and an empty target cell. Returns the reason it is invalid,
 * or null.
 */
export function validateRecord(record: TrainingRecord): string | null {
  let state: BoardState;
  try {
    state = decodeSnapshot(record.state, record.turn);
    const expected = inferTurn(state.board);
    if (expected !== state.turn) {
      return `Turn ${record.turn} does not match the marks on the board (expected ${encodeTurn(expected)})`;
    }
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }

  if (state.terminal) {
    return "Snapshot is already a finished game";
  }
  if (!Number.isInteger(record.action) || record.action < 0 || record.action >= BOARD_CELLS) {
    return `Action ${record.action} is outside 0-${BOARD_CELLS - 1}`;
  }
  if (state.board[record.action] !== "") {
    return `Action ${record.action} targets an occupied cell`;
  }
  return null;
}
