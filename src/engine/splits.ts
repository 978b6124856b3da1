import type { PayerContribution, SplitMethod, SplitShare } from "../types/index.js";
import { InvalidSplitInputError } from "./errors.js";

/** Percentages may miss 100 by this much before the split is rejected. */
export const PERCENTAGE_TOLERANCE = 0.1;

// Absorbs binary noise such as 4999.999999999999 before flooring
const FLOAT_SLACK = 1e-9;

export type RawInputs = Readonly<Record<string, number>> | ReadonlyMap<string, number>;

export interface SplitWarning {
  code: "ADJUSTMENT_CLAMPED";
  participantId: string;
  requestedAmount: number;
  appliedAmount: number;
}

export interface SplitComputation {
  splits: SplitShare[];
  warnings: SplitWarning[];
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * De-duplicate participants and sort them by id.
 * Every remainder minor unit is handed out in this order.
 */
export function orderParticipants(participants: readonly string[]): string[] {
  return Array.from(new Set(participants)).sort(compareIds);
}

function isMap(inputs: RawInputs): inputs is ReadonlyMap<string, number> {
  return inputs instanceof Map;
}

function readInput(inputs: RawInputs, participantId: string): number {
  const value = isMap(inputs) ? inputs.get(participantId) : inputs[participantId];
  return value ?? 0;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Split an integer into `count` parts that differ by at most one.
 * The first parts receive the remainder. Works for negative totals too.
 */
export function distributeEvenly(total: number, count: number): number[] {
  if (count <= 0) return [];

  const base = Math.floor(total / count);
  const remainder = total - base * count;

  return Array.from({ length: count }, (_, index) => base + (index < remainder ? 1 : 0));
}

/**
 * Largest-remainder allocation of `total` minor units by weight.
 * Ties on the fractional part go to the earlier index.
 */
export function allocateProportionally(total: number, weights: readonly number[]): number[] {
  const weightSum = sum(weights);
  if (weightSum <= 0) {
    return weights.map(() => 0);
  }

  const exact = weights.map((weight) => (total * weight) / weightSum);
  const amounts = exact.map((value) => Math.floor(value + FLOAT_SLACK));
  let remainder = total - sum(amounts);

  const byFraction = exact
    .map((value, index) => ({ index, fraction: value - amounts[index] }))
    .sort((a, b) => b.fraction - a.fraction || a.index - b.index);

  for (const { index } of byFraction) {
    if (remainder <= 0) break;
    amounts[index] += 1;
    remainder -= 1;
  }

  return amounts;
}

function toShares(ids: readonly string[], amounts: readonly number[], rawInputs: readonly number[]): SplitShare[] {
  return ids.map((participantId, index) => ({
    participantId,
    amount: amounts[index],
    rawInput: rawInputs[index],
  }));
}

/**
 * Split an amount equally among participants.
 * @returns One share per participant in id order; the first `total mod n` get one extra minor unit
 */
export function splitEqually(totalAmount: number, participants: readonly string[]): SplitShare[] {
  const ids = orderParticipants(participants);
  if (ids.length === 0) {
    throw new InvalidSplitInputError("Cannot split among zero participants");
  }

  const amounts = distributeEvenly(totalAmount, ids.length);
  return toShares(ids, amounts, ids.map(() => 0));
}

/**
 * Validate exact per-participant amounts. Never auto-corrects a mismatch.
 * @throws InvalidSplitInputError if the amounts don't sum to the total
 */
export function splitByExactAmounts(
  totalAmount: number,
  participants: readonly string[],
  amounts: RawInputs
): SplitShare[] {
  const ids = orderParticipants(participants);
  const values = ids.map((id) => readInput(amounts, id));

  values.forEach((value, index) => {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidSplitInputError(
        `Amount for ${ids[index]} must be a whole, non-negative number of minor units`
      );
    }
  });

  const totalShares = sum(values);
  if (totalShares !== totalAmount) {
    throw new InvalidSplitInputError(
      `Exact amounts must sum to total (${totalAmount}), got ${totalShares}`
    );
  }

  return toShares(ids, values, values);
}

/**
 * Split an amount by percentages that total 100 (within 0.1).
 * @throws InvalidSplitInputError on out-of-range values or a wrong total
 */
export function splitByPercentage(
  totalAmount: number,
  participants: readonly string[],
  percentages: RawInputs
): SplitShare[] {
  const ids = orderParticipants(participants);
  const values = ids.map((id) => readInput(percentages, id));

  values.forEach((value, index) => {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new InvalidSplitInputError(
        `Percentage for ${ids[index]} must be between 0 and 100`
      );
    }
  });

  const totalPercentage = sum(values);
  if (Math.abs(totalPercentage - 100) > PERCENTAGE_TOLERANCE + FLOAT_SLACK) {
    throw new InvalidSplitInputError(
      `Percentages must total 100% (got ${Number(totalPercentage.toFixed(2))}%)`
    );
  }

  return toShares(ids, allocateProportionally(totalAmount, values), values);
}

/**
 * Split an amount by whole-number share counts.
 * @throws InvalidSplitInputError when a count is invalid or all counts are zero
 */
export function splitByShares(
  totalAmount: number,
  participants: readonly string[],
  shares: RawInputs
): SplitShare[] {
  const ids = orderParticipants(participants);
  const values = ids.map((id) => readInput(shares, id));

  values.forEach((value, index) => {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidSplitInputError(
        `Shares for ${ids[index]} must be a whole, non-negative number`
      );
    }
  });

  if (sum(values) === 0) {
    throw new InvalidSplitInputError("Enter shares for at least one person");
  }

  return toShares(ids, allocateProportionally(totalAmount, values), values);
}

// Removes `amount` from the candidates as evenly as possible without going below zero
function takeEvenly(amounts: number[], candidates: readonly number[], amount: number): void {
  let remaining = amount;
  let pool = candidates.filter((index) => amounts[index] > 0);

  while (remaining > 0 && pool.length > 0) {
    const parts = distributeEvenly(remaining, pool.length);
    pool.forEach((index, position) => {
      const taken = Math.min(amounts[index], parts[position]);
      amounts[index] -= taken;
      remaining -= taken;
    });
    pool = pool.filter((index) => amounts[index] > 0);
  }
}

/**
 * Equal base split plus signed per-participant adjustments.
 *
 * The adjustments' net is taken from (or given to) the participants without an
 * adjustment, or from everyone when all are adjusted. A share pushed below zero
 * is clamped to zero and reported; the excess is recovered evenly from the
 * other positive shares so the total stays exact.
 */
export function splitByAdjustment(
  totalAmount: number,
  participants: readonly string[],
  adjustments: RawInputs
): SplitComputation {
  const ids = orderParticipants(participants);
  if (ids.length === 0) {
    throw new InvalidSplitInputError("Cannot split among zero participants");
  }

  const values = ids.map((id) => readInput(adjustments, id));
  values.forEach((value, index) => {
    if (!Number.isInteger(value)) {
      throw new InvalidSplitInputError(
        `Adjustment for ${ids[index]} must be a whole number of minor units`
      );
    }
  });

  if (sum(values) > totalAmount) {
    throw new InvalidSplitInputError("Adjustments cannot exceed the total amount");
  }

  const amounts = distributeEvenly(totalAmount, ids.length).map(
    (base, index) => base + values[index]
  );

  const unadjusted = ids.map((_, index) => index).filter((index) => values[index] === 0);
  const receivers = unadjusted.length > 0 ? unadjusted : ids.map((_, index) => index);
  const residual = distributeEvenly(totalAmount - sum(amounts), receivers.length);
  receivers.forEach((index, position) => {
    amounts[index] += residual[position];
  });

  const warnings: SplitWarning[] = [];
  const clamped = new Set<number>();
  amounts.forEach((amount, index) => {
    if (amount < 0) {
      warnings.push({
        code: "ADJUSTMENT_CLAMPED",
        participantId: ids[index],
        requestedAmount: amount,
        appliedAmount: 0,
      });
      amounts[index] = 0;
      clamped.add(index);
    }
  });

  const excess = sum(amounts) - totalAmount;
  if (excess > 0) {
    const donors = ids.map((_, index) => index).filter((index) => !clamped.has(index));
    takeEvenly(amounts, donors, excess);
  }

  return { splits: toShares(ids, amounts, values), warnings };
}

/**
 * Produce per-participant owed amounts that sum exactly to `totalAmount`.
 * @throws InvalidSplitInputError if the inputs don't reconcile for the method
 */
export function computeSplits(
  totalAmount: number,
  method: SplitMethod,
  participants: readonly string[],
  rawInputs: RawInputs = {}
): SplitComputation {
  if (!Number.isInteger(totalAmount) || totalAmount < 0) {
    throw new InvalidSplitInputError(
      "Total amount must be a whole, non-negative number of minor units"
    );
  }

  if (orderParticipants(participants).length === 0) {
    throw new InvalidSplitInputError("Select at least one person to split with");
  }

  switch (method) {
    case "equal":
      return { splits: splitEqually(totalAmount, participants), warnings: [] };

    case "amount":
      return { splits: splitByExactAmounts(totalAmount, participants, rawInputs), warnings: [] };

    case "percentage":
      return { splits: splitByPercentage(totalAmount, participants, rawInputs), warnings: [] };

    case "shares":
      return { splits: splitByShares(totalAmount, participants, rawInputs), warnings: [] };

    case "adjustment":
      return splitByAdjustment(totalAmount, participants, rawInputs);

    default: {
      const unknown: never = method;
      throw new InvalidSplitInputError(`Unknown split method: ${String(unknown)}`);
    }
  }
}

/**
 * Recompute stored splits for an edited total, keeping each participant's
 * proportion. Exact-amount inputs follow the new amounts.
 */
export function rescaleSplits(
  splits: readonly SplitShare[],
  newTotal: number,
  method: SplitMethod
): SplitShare[] {
  const weights = splits.map((split) => split.amount);
  const amounts =
    sum(weights) > 0
      ? allocateProportionally(newTotal, weights)
      : distributeEvenly(newTotal, splits.length);

  return splits.map((split, index) => ({
    participantId: split.participantId,
    amount: amounts[index],
    rawInput: method === "amount" ? amounts[index] : split.rawInput,
  }));
}

/** Rescale payer contributions to an edited total; a sole payer covers all of it. */
export function rescalePayers(
  payers: readonly PayerContribution[],
  newTotal: number
): PayerContribution[] {
  if (payers.length === 1) {
    return [{ participantId: payers[0].participantId, amount: newTotal }];
  }

  const weights = payers.map((payer) => payer.amount);
  const amounts =
    sum(weights) > 0
      ? allocateProportionally(newTotal, weights)
      : distributeEvenly(newTotal, payers.length);

  return payers.map((payer, index) => ({
    participantId: payer.participantId,
    amount: amounts[index],
  }));
}
