import type {
  BillingCycle,
  BillingStatus,
  Subscription,
  SubscriptionPayment,
  SubscriptionSettlement,
} from "../types/index.js";
import { CurrencyBalance } from "./CurrencyBalance.js";
import type { MemberBalanceSummary } from "./aggregate.js";
import { fromMinorUnits, getCurrency } from "./currency.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEKS_PER_MONTH = 4.33;
const DAYS_PER_MONTH = 30.44;
const DUE_SOON_DAYS = 7;

/** Everyone sharing the subscription, the viewer included. Never less than 1. */
export function subscriberCount(subscription: Subscription, viewerId: string): number {
  if (!subscription.isShared) return 1;
  return Math.max(memberCount(subscription, viewerId) + 1, 1);
}

/** Subscribers other than the viewer. */
export function memberCount(subscription: Subscription, viewerId: string): number {
  if (!subscription.isShared) return 0;
  return new Set(subscription.subscribers.filter((id) => id !== viewerId)).size;
}

export function myShare(subscription: Subscription, viewerId: string): number {
  if (!subscription.isShared) return subscription.amount;
  return subscription.amount / subscriberCount(subscription, viewerId);
}

export function monthlyEquivalent(subscription: Subscription): number {
  switch (subscription.cycle) {
    case "weekly":
      return subscription.amount * WEEKS_PER_MONTH;
    case "monthly":
      return subscription.amount;
    case "yearly":
      return subscription.amount / 12;
    case "custom":
      return subscription.amount * (DAYS_PER_MONTH / Math.max(1, subscription.customCycleDays));
  }
}

export function yearlyEquivalent(subscription: Subscription): number {
  return monthlyEquivalent(subscription) * 12;
}

function addMonthsClamped(date: Date, months: number): Date {
  const target = new Date(date.getTime());
  const day = target.getUTCDate();
  target.setUTCDate(1);
  target.setUTCMonth(target.getUTCMonth() + months);
  const lastDay = new Date(
    Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)
  ).getUTCDate();
  target.setUTCDate(Math.min(day, lastDay));
  return target;
}

/** The billing date one cycle after `from`. Month arithmetic clamps to month end (UTC). */
export function nextBillingDate(cycle: BillingCycle, customCycleDays: number, from: Date): Date {
  switch (cycle) {
    case "weekly":
      return new Date(from.getTime() + 7 * DAY_MS);
    case "monthly":
      return addMonthsClamped(from, 1);
    case "yearly":
      return addMonthsClamped(from, 12);
    case "custom":
      return new Date(from.getTime() + Math.max(1, customCycleDays) * DAY_MS);
  }
}

export function daysUntilNextBilling(subscription: Subscription, now: Date): number {
  return Math.trunc((subscription.nextBillingDate.getTime() - now.getTime()) / DAY_MS);
}

export function billingStatus(subscription: Subscription, now: Date): BillingStatus {
  if (!subscription.isActive) return "paused";

  const days = daysUntilNextBilling(subscription, now);
  if (days < 0) return "overdue";
  if (days <= DUE_SOON_DAYS) return "due";
  return "upcoming";
}

function paymentsOf(subscription: Subscription, payments: readonly SubscriptionPayment[]) {
  return payments.filter((payment) => payment.subscriptionId === subscription.id);
}

function settlementsOf(subscription: Subscription, settlements: readonly SubscriptionSettlement[]) {
  return settlements.filter((settlement) => settlement.subscriptionId === subscription.id);
}

/**
 * Viewer's position across the whole subscription.
 * Positive = members owe the viewer, negative = the viewer owes members.
 */
export function subscriptionUserBalance(
  subscription: Subscription,
  payments: readonly SubscriptionPayment[],
  settlements: readonly SubscriptionSettlement[],
  viewerId: string
): number {
  if (!subscription.isShared || !subscription.isActive) return 0;

  const count = subscriberCount(subscription, viewerId);
  let balance = 0;

  for (const payment of paymentsOf(subscription, payments)) {
    const amountPerMember = payment.amount / count;
    if (payment.payerId === viewerId) {
      balance += payment.amount - amountPerMember;
    } else {
      balance -= amountPerMember;
    }
  }

  for (const settlement of settlementsOf(subscription, settlements)) {
    if (settlement.to === viewerId) {
      balance -= settlement.amount;
    } else if (settlement.from === viewerId) {
      balance += settlement.amount;
    }
  }

  return balance;
}

/** Positive = the member owes the viewer. */
export function subscriptionBalanceWith(
  subscription: Subscription,
  payments: readonly SubscriptionPayment[],
  settlements: readonly SubscriptionSettlement[],
  viewerId: string,
  memberId: string
): number {
  if (!subscription.isShared || !subscription.isActive || memberId === viewerId) return 0;

  const count = subscriberCount(subscription, viewerId);
  let balance = 0;

  for (const payment of paymentsOf(subscription, payments)) {
    const amountPerMember = payment.amount / count;
    if (payment.payerId === viewerId) {
      balance += amountPerMember;
    } else if (payment.payerId === memberId) {
      balance -= amountPerMember;
    }
  }

  for (const settlement of settlementsOf(subscription, settlements)) {
    if (settlement.from === memberId && settlement.to === viewerId) {
      balance -= settlement.amount;
    } else if (settlement.from === viewerId && settlement.to === memberId) {
      balance += settlement.amount;
    }
  }

  return balance;
}

/**
 * Balance and amount paid for every non-viewer subscriber, in one pass over
 * payments and settlements. Sorted by participant id.
 */
export function subscriptionMemberBalances(
  subscription: Subscription,
  payments: readonly SubscriptionPayment[],
  settlements: readonly SubscriptionSettlement[],
  viewerId: string
): MemberBalanceSummary[] {
  if (!subscription.isShared || !subscription.isActive) return [];

  const count = subscriberCount(subscription, viewerId);
  const members = Array.from(new Set(subscription.subscribers))
    .filter((id) => id !== viewerId)
    .sort();

  const balanceByMember = new Map(members.map((id) => [id, 0]));
  const paidByMember = new Map(members.map((id) => [id, 0]));

  for (const payment of paymentsOf(subscription, payments)) {
    const amountPerMember = payment.amount / count;

    if (payment.payerId === viewerId) {
      for (const id of members) {
        balanceByMember.set(id, (balanceByMember.get(id) ?? 0) + amountPerMember);
      }
    } else if (balanceByMember.has(payment.payerId)) {
      paidByMember.set(payment.payerId, (paidByMember.get(payment.payerId) ?? 0) + payment.amount);
      balanceByMember.set(
        payment.payerId,
        (balanceByMember.get(payment.payerId) ?? 0) - amountPerMember
      );
    }
  }

  for (const settlement of settlementsOf(subscription, settlements)) {
    if (settlement.to === viewerId && balanceByMember.has(settlement.from)) {
      balanceByMember.set(
        settlement.from,
        (balanceByMember.get(settlement.from) ?? 0) - settlement.amount
      );
    } else if (settlement.from === viewerId && balanceByMember.has(settlement.to)) {
      balanceByMember.set(
        settlement.to,
        (balanceByMember.get(settlement.to) ?? 0) + settlement.amount
      );
    }
  }

  return members.map((participantId) => ({
    participantId,
    balance: new CurrencyBalance().add(balanceByMember.get(participantId) ?? 0, subscription.currency),
    totalPaid: new CurrencyBalance().add(paidByMember.get(participantId) ?? 0, subscription.currency),
  }));
}

function csvField(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatPlain(amount: number, currency: string): string {
  return fromMinorUnits(amount, currency).toFixed(getCurrency(currency).minorUnits);
}

/**
 * CSV of a subscription's payments, newest first:
 * Date,Amount,Paid By,Split Amount,Notes
 */
export function exportPaymentHistory(
  subscription: Subscription,
  payments: readonly SubscriptionPayment[],
  viewerId: string,
  names: ReadonlyMap<string, string>
): string {
  const count = subscriberCount(subscription, viewerId);
  const lines = ["Date,Amount,Paid By,Split Amount,Notes"];

  const sorted = paymentsOf(subscription, payments).sort(
    (a, b) => b.date.getTime() - a.date.getTime()
  );

  for (const payment of sorted) {
    const payerName =
      payment.payerId === viewerId ? "You" : names.get(payment.payerId) ?? "Unknown";
    const splitAmount =
      subscription.isShared && count > 1
        ? formatPlain(payment.amount / count, subscription.currency)
        : "";

    lines.push(
      [
        payment.date.toISOString().slice(0, 10),
        formatPlain(payment.amount, subscription.currency),
        csvField(payerName),
        splitAmount,
        csvField(payment.note ?? ""),
      ].join(",")
    );
  }

  return lines.join("\n");
}
