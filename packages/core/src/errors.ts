/**
 * Fail-fast precondition failures. Each one signals a logic defect in the
 * caller (or in move generation), never an environmental fault, so nothing
 * catches and retries these.
 */
export enum ContractErrorCode {
  /** reward() asked on a state that is still in play */
  REWARD_ON_NONTERMINAL = "REWARD_ON_NONTERMINAL",
  /** reward() asked on a board the player to move has already won */
  REWARD_ON_UNREACHABLE = "REWARD_ON_UNREACHABLE",
  /** winner field holds a value outside the known set */
  UNKNOWN_WINNER = "UNKNOWN_WINNER",
  /** move applied to an occupied or out-of-range cell */
  ILLEGAL_MOVE = "ILLEGAL_MOVE",
  /** move applied to a finished game */
  MOVE_ON_TERMINAL = "MOVE_ON_TERMINAL",
  /** two consecutive states do not differ by exactly one placement */
  NOT_A_SINGLE_MOVE = "NOT_A_SINGLE_MOVE",
  /** search engine asked to choose a move on a finished game */
  SELECT_ON_TERMINAL = "SELECT_ON_TERMINAL",
}

export class ContractViolation extends Error {
  readonly code: ContractErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ContractErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ContractViolation";
    this.code = code;
    this.details = details;
  }
}

export function isContractViolation(
  err: unknown,
  code?: ContractErrorCode
): err is ContractViolation {
  return (
    err instanceof ContractViolation && (code === undefined || err.code === code)
  );
}
