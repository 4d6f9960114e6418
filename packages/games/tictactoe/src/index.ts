export { TicTacToeModule, reward, isTerminal, getOutcome } from "./rules";
export {
  applyMove,
  enumerateMoves,
  randomMove,
  emptyCells,
  isLegalMove,
} from "./actions";
export {
  WIN_LINES,
  BOARD_CELLS,
  checkWinner,
  countMarks,
  createState,
  emptyBoard,
  inferTurn,
  initialState,
  isBoardFull,
  otherPlayer,
  stateFromBoard,
  stateKey,
} from "./state";
export type { BoardState, Board, CellValue, Player } from "./state";
export {
  decodeSnapshot,
  decodeTurn,
  encodeSnapshot,
  encodeTurn,
  findAction,
  toTrainingRecord,
  validateRecord,
} from "./observation";
export { TicTacToeUI, renderBoard } from "./ui";
