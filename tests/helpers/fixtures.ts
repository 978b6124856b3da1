import type { PayerContribution, Settlement, Transaction } from "../../src/types/index.js";

let sequence = 0;

/** A transaction whose splits are given as a participant → amount record. */
export function makeTransaction(params: {
  payers: PayerContribution[] | Record<string, number>;
  splits: Record<string, number>;
  currency?: string;
  date?: Date;
  groupId?: string;
  title?: string;
  id?: string;
}): Transaction {
  const payers = Array.isArray(params.payers)
    ? params.payers
    : Object.entries(params.payers).map(([participantId, amount]) => ({ participantId, amount }));
  const splits = Object.entries(params.splits).map(([participantId, amount]) => ({
    participantId,
    amount,
    rawInput: 0,
  }));
  const totalAmount = splits.reduce((total, split) => total + split.amount, 0);

  sequence += 1;
  return {
    id: params.id ?? `txn${sequence}`,
    title: params.title ?? "Dinner",
    totalAmount,
    currency: params.currency ?? "USD",
    date: params.date ?? new Date("2024-01-01T12:00:00Z"),
    splitMethod: "amount",
    payers,
    splits,
    groupId: params.groupId,
    createdBy: payers[0]?.participantId ?? "me",
  };
}

export function makeSettlement(params: {
  from: string;
  to: string;
  amount: number;
  currency?: string;
  date?: Date;
  groupId?: string;
}): Settlement {
  sequence += 1;
  return {
    id: `stl${sequence}`,
    from: params.from,
    to: params.to,
    amount: params.amount,
    currency: params.currency ?? "USD",
    date: params.date ?? new Date("2024-01-02T12:00:00Z"),
    isFullSettlement: false,
    groupId: params.groupId,
  };
}
