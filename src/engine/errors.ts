export type LedgerErrorCode =
  | "INVALID_SPLIT_INPUT"
  | "INVALID_TRANSACTION"
  | "NO_OUTSTANDING_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_PARTICIPANT_PAIR"
  | "NOT_FOUND";

/**
 * Base class for every recoverable ledger failure.
 * Callers branch on `code`; the message is meant to be shown to the user.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidSplitInputError extends LedgerError {
  constructor(message: string) {
    super("INVALID_SPLIT_INPUT", message);
  }
}

export class InvalidTransactionError extends LedgerError {
  constructor(message: string) {
    super("INVALID_TRANSACTION", message);
  }
}

export class NoOutstandingBalanceError extends LedgerError {
  constructor(message = "There is no outstanding balance to settle") {
    super("NO_OUTSTANDING_BALANCE", message);
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(message = "Settlement amount must be greater than zero") {
    super("INVALID_AMOUNT", message);
  }
}

export class InvalidParticipantPairError extends LedgerError {
  constructor(participantId: string) {
    super(
      "INVALID_PARTICIPANT_PAIR",
      `Cannot compute a balance between ${participantId} and themselves`
    );
  }
}

export class NotFoundError extends LedgerError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} ${id} not found`);
  }
}
