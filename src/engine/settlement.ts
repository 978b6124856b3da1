import type { Settlement } from "../types/index.js";
import type { CurrencyBalance } from "./CurrencyBalance.js";
import { InvalidAmountError, NoOutstandingBalanceError } from "./errors.js";

/** Outstanding balances at or below this many minor units are treated as settled. */
export const SETTLEMENT_TOLERANCE = 1;

export interface SettlementAmount {
  amount: number;
  capped: boolean;
  isFullSettlement: boolean;
  /** True when the other side pays the viewer (outstanding balance is positive). */
  paidToViewer: boolean;
}

/**
 * Work out how much to settle against an outstanding balance.
 *
 * An omitted request settles in full. A request above the outstanding amount
 * is capped to it and flagged, not rejected.
 *
 * @throws NoOutstandingBalanceError when the balance is within tolerance of zero
 * @throws InvalidAmountError when the request is not a positive whole amount
 */
export function resolveSettlementAmount(
  outstandingBalance: number,
  requestedAmount?: number
): SettlementAmount {
  if (!Number.isFinite(outstandingBalance) || Math.abs(outstandingBalance) <= SETTLEMENT_TOLERANCE) {
    throw new NoOutstandingBalanceError();
  }

  const cap = Math.round(Math.abs(outstandingBalance));
  const requested = requestedAmount ?? cap;

  if (!Number.isFinite(requested) || !Number.isInteger(requested)) {
    throw new InvalidAmountError("Settlement amount must be a whole number of minor units");
  }

  const amount = Math.min(requested, cap);
  if (amount <= 0) {
    throw new InvalidAmountError();
  }

  return {
    amount,
    capped: requested > cap,
    isFullSettlement: amount === cap,
    paidToViewer: outstandingBalance > 0,
  };
}

export interface CreateSettlementInput {
  id: string;
  viewerId: string;
  otherId: string;
  currency: string;
  /** Positive = other owes the viewer. */
  outstandingBalance: number;
  requestedAmount?: number;
  date: Date;
  note?: string;
  groupId?: string;
}

export interface SettlementResult {
  settlement: Settlement;
  capped: boolean;
  requestedAmount: number;
}

export function createSettlement(input: CreateSettlementInput): SettlementResult {
  const resolved = resolveSettlementAmount(input.outstandingBalance, input.requestedAmount);

  const settlement: Settlement = {
    id: input.id,
    from: resolved.paidToViewer ? input.otherId : input.viewerId,
    to: resolved.paidToViewer ? input.viewerId : input.otherId,
    amount: resolved.amount,
    currency: input.currency,
    date: input.date,
    note: input.note,
    isFullSettlement: resolved.isFullSettlement,
    groupId: input.groupId,
  };

  return {
    settlement,
    capped: resolved.capped,
    requestedAmount: input.requestedAmount ?? resolved.amount,
  };
}

export interface CounterpartBalance {
  participantId: string;
  balance: CurrencyBalance;
}

export interface SettleAllOptions {
  makeId: () => string;
  date: Date;
  note?: string;
  groupId?: string;
}

/**
 * Full settlements for every non-zero currency with every counterpart.
 * Counterparts keep their given order; currencies within one are sorted by code.
 */
export function planSettleAll(
  viewerId: string,
  counterparts: readonly CounterpartBalance[],
  options: SettleAllOptions
): Settlement[] {
  const planned: Settlement[] = [];

  for (const { participantId, balance } of counterparts) {
    if (participantId === viewerId) continue;

    const entries = balance
      .nonZero()
      .filter((entry) => Math.abs(entry.amount) > SETTLEMENT_TOLERANCE)
      .sort((a, b) => a.code.localeCompare(b.code));

    for (const { code, amount } of entries) {
      const { settlement } = createSettlement({
        id: options.makeId(),
        viewerId,
        otherId: participantId,
        currency: code,
        outstandingBalance: amount,
        date: options.date,
        note: options.note,
        groupId: options.groupId,
      });
      planned.push(settlement);
    }
  }

  return planned;
}
