/** Player marks; X always moves first */
export type Player = "X" | "O";

/** Cell values: "X", "O", or "" for empty */
export type CellValue = Player | "";

/** 3x3 board represented as a flat array of 9 cells (row-major) */
export type Board = readonly CellValue[];

export const BOARD_CELLS = 9;

/**
 * An immutable tic-tac-toe position. `winner` and `terminal` are derived from
 * `board` whenever a state is built and never set independently.
 */
export interface BoardState {
  readonly board: Board;
  /** Player to move next */
  readonly turn: Player;
  readonly winner: Player | null;
  /** A line is complete or no empty cell remains */
  readonly terminal: boolean;
  /** Reached through a uniformly random move rather than a search choice */
  readonly fromRandomMove: boolean;
}

/** All possible winning lines (indices into the flat board array) */
export const WIN_LINES: readonly (readonly [number, number, number])[] = [
  // Rows
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  // Columns
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  // Diagonals
  [0, 4, 8],
  [2, 4, 6],
];

export function emptyBoard(): CellValue[] {
  return ["", "", "", "", "", "", "", "", ""];
}

export function checkWinner(board: Board): Player | null {
  for (const [a, b, c] of WIN_LINES) {
    const mark = board[a];
    if (mark !== "" && mark === board[b] && mark === board[c]) {
      return mark;
    }
  }
  return null;
}

export function isBoardFull(board: Board): boolean {
  return board.every((cell) => cell !== "");
}

export function otherPlayer(player: Player): Player {
  return player === "X" ? "O" : "X";
}

export function countMarks(board: Board): Record<Player, number> {
  const counts: Record<Player, number> = { X: 0, O: 0 };
  for (const cell of board) {
    if (cell !== "") counts[cell]++;
  }
  return counts;
}

/**
 * Build a frozen state, deriving winner and terminal from the board.
 */
export function createState(
  board: Board,
  turn: Player,
  fromRandomMove = false
): BoardState {
  if (board.length !== BOARD_CELLS) {
    throw new Error(`Board must have ${BOARD_CELLS} cells, got ${board.length}`);
  }
  const winner = checkWinner(board);
  return Object.freeze({
    board: Object.freeze([...board]),
    turn,
    winner,
    terminal: winner !== null || isBoardFull(board),
    fromRandomMove,
  });
}

/** Empty board, X to move. */
export function initialState(): BoardState {
  return createState(emptyBoard(), "X");
}

/**
 * Player to move on a board reached by alternating play from an empty board.
 * Throws when the mark counts cannot arise that way.
 */
export function inferTurn(board: Board): Player {
  const { X, O } = countMarks(board);
  if (X === O) return "X";
  if (X === O + 1) return "O";
  throw new Error(`Mark counts X=${X} O=${O} cannot arise from alternating play`);
}

/** Build a state from an arbitrary board; turn is inferred when omitted. */
export function stateFromBoard(board: Board, turn: Player = inferTurn(board)): BoardState {
  return createState(board, turn);
}

/** Value identity of a position; provenance is not part of it. */
export function stateKey(state: BoardState): string {
  return `${state.board.map((c) => c || "-").join("")}:${state.turn}`;
}
