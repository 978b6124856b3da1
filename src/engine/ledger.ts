import type { PayerContribution, Settlement, Transaction } from "../types/index.js";
import { CurrencyBalance } from "./CurrencyBalance.js";
import {
  InvalidParticipantPairError,
  InvalidSplitInputError,
  InvalidTransactionError,
} from "./errors.js";

/** Net positions within this distance of zero count as neither creditor nor debtor. */
export const NET_EPSILON = 0.1;

/**
 * Payer contributions of a transaction. Records from before multi-payer
 * support carry only `legacyPayerId`, who is taken to have paid the total.
 */
export function effectivePayers(transaction: Transaction): PayerContribution[] {
  if (transaction.payers.length > 0) {
    return transaction.payers;
  }

  if (transaction.legacyPayerId) {
    return [{ participantId: transaction.legacyPayerId, amount: transaction.totalAmount }];
  }

  return [];
}

/** paid − owed for everyone who paid or owes in the transaction. */
export function netPositions(transaction: Transaction): Map<string, number> {
  const positions = new Map<string, number>();

  for (const payer of effectivePayers(transaction)) {
    positions.set(payer.participantId, (positions.get(payer.participantId) ?? 0) + payer.amount);
  }

  for (const split of transaction.splits) {
    positions.set(split.participantId, (positions.get(split.participantId) ?? 0) - split.amount);
  }

  return positions;
}

export function involvesParticipant(transaction: Transaction, participantId: string): boolean {
  return (
    effectivePayers(transaction).some((payer) => payer.participantId === participantId) ||
    transaction.splits.some((split) => split.participantId === participantId)
  );
}

export function involvesBoth(transaction: Transaction, personA: string, personB: string): boolean {
  return involvesParticipant(transaction, personA) && involvesParticipant(transaction, personB);
}

/**
 * Signed balance between two participants of one transaction.
 *
 * Each debtor's debt is spread over the creditors in proportion to how much
 * each creditor is owed. This is not a minimal-transfer plan.
 *
 * @returns Positive if personB owes personA, negative if personA owes personB
 */
export function pairwiseBalance(
  transaction: Transaction,
  personA: string,
  personB: string
): number {
  if (personA === personB) {
    throw new InvalidParticipantPairError(personA);
  }

  const positions = netPositions(transaction);
  const netA = positions.get(personA) ?? 0;
  const netB = positions.get(personB) ?? 0;

  let totalCredit = 0;
  for (const net of positions.values()) {
    if (net > NET_EPSILON) {
      totalCredit += net;
    }
  }

  if (totalCredit <= NET_EPSILON) {
    return 0;
  }

  if (netA > NET_EPSILON && netB < -NET_EPSILON) {
    return Math.abs(netB) * (netA / totalCredit);
  }

  if (netA < -NET_EPSILON && netB > NET_EPSILON) {
    return -(Math.abs(netA) * (netB / totalCredit));
  }

  return 0;
}

/**
 * What `other` owes `viewer` across shared transactions and direct settlements,
 * per currency. Positive = other owes viewer.
 */
export function aggregateBalance(
  transactions: readonly Transaction[],
  settlements: readonly Settlement[],
  viewerId: string,
  otherId: string
): CurrencyBalance {
  if (viewerId === otherId) {
    throw new InvalidParticipantPairError(viewerId);
  }

  const balance = new CurrencyBalance();

  for (const transaction of transactions) {
    if (!involvesBoth(transaction, viewerId, otherId)) continue;
    balance.add(pairwiseBalance(transaction, viewerId, otherId), transaction.currency);
  }

  for (const settlement of settlements) {
    if (settlement.from === otherId && settlement.to === viewerId) {
      // Their payment reduces what they owe
      balance.subtract(settlement.amount, settlement.currency);
    } else if (settlement.from === viewerId && settlement.to === otherId) {
      balance.add(settlement.amount, settlement.currency);
    }
  }

  return balance;
}

/** Transactions involving both participants, newest first. */
export function mutualTransactions(
  transactions: readonly Transaction[],
  personA: string,
  personB: string
): Transaction[] {
  return transactions
    .filter((transaction) => involvesBoth(transaction, personA, personB))
    .sort((a, b) => b.date.getTime() - a.date.getTime());
}

function sumAmounts(entries: readonly { amount: number }[]): number {
  return entries.reduce((total, entry) => total + entry.amount, 0);
}

/**
 * Check the stored-record invariants: payers and splits each sum to the total.
 * @throws InvalidTransactionError for amount or payer problems
 * @throws InvalidSplitInputError when the splits don't reconcile
 */
export function validateTransaction(transaction: Transaction): void {
  if (!transaction.title.trim()) {
    throw new InvalidTransactionError("Please enter a title");
  }

  if (!Number.isInteger(transaction.totalAmount) || transaction.totalAmount <= 0) {
    throw new InvalidTransactionError("Amount must be greater than zero");
  }

  const payers = effectivePayers(transaction);
  if (payers.length === 0) {
    throw new InvalidTransactionError("Select at least one payer");
  }

  if (new Set(payers.map((payer) => payer.participantId)).size !== payers.length) {
    throw new InvalidTransactionError("Each payer can only be listed once");
  }

  if (payers.some((payer) => !Number.isInteger(payer.amount) || payer.amount < 0)) {
    throw new InvalidTransactionError("Paid-by amounts must be whole, non-negative amounts");
  }

  if (sumAmounts(payers) !== transaction.totalAmount) {
    throw new InvalidTransactionError("Paid-by amounts must equal the total");
  }

  if (transaction.splits.length === 0) {
    throw new InvalidSplitInputError("Select at least one person to split with");
  }

  if (new Set(transaction.splits.map((split) => split.participantId)).size !== transaction.splits.length) {
    throw new InvalidSplitInputError("Each person can only appear once in the split");
  }

  if (transaction.splits.some((split) => !Number.isInteger(split.amount) || split.amount < 0)) {
    throw new InvalidSplitInputError("Split amounts must be whole, non-negative amounts");
  }

  if (sumAmounts(transaction.splits) !== transaction.totalAmount) {
    throw new InvalidSplitInputError("Split amounts must equal the total");
  }
}
