import { GameUISpec } from "@ttt-mcts/engine";
import { BoardState } from "./state";

/**
 * 3x3 grid with 1-based row and column labels:
 *
 *     1 2 3
 *   1 X   O
 *   2   X
 *   3 O
 */
export function renderBoard(state: BoardState): string {
  const toChar = (i: number) => state.board[i] || " ";
  const lines = ["  1 2 3"];
  for (let row = 0; row < 3; row++) {
    const cells = [0, 1, 2].map((col) => toChar(row * 3 + col));
    lines.push(`${row + 1} ${cells.join(" ")}`);
  }
  return lines.join("\n");
}

export const TicTacToeUI: GameUISpec<BoardState> = {
  playerLabels: ["X", "O"],

  inputHint: "Enter 1-9, or row and column (e.g. 2 3)",

  maxTurns: 9,

  renderBoard,

  renderStatus(state: BoardState): string | null {
    return state.winner ? `${state.winner} wins` : null;
  },

  parseInput(raw: string): number | null {
    const trimmed = raw.trim();
    if (/^[1-9]$/.test(trimmed)) {
      return parseInt(trimmed, 10) - 1;
    }
    const rowCol = /^([1-3])[\s,]+([1-3])$/.exec(trimmed);
    if (rowCol) {
      return (parseInt(rowCol[1], 10) - 1) * 3 + (parseInt(rowCol[2], 10) - 1);
    }
    return null;
  },

  formatMove(index: number): string {
    return `row ${Math.floor(index / 3) + 1}, col ${(index % 3) + 1}`;
  },
};
