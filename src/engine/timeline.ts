import type { Settlement, Transaction } from "../types/index.js";
import { mutualTransactions } from "./ledger.js";

export type TimelineItem =
  | { kind: "transaction"; date: Date; transaction: Transaction }
  | { kind: "settlement"; date: Date; settlement: Settlement };

export interface TimelineDay {
  day: string; // YYYY-MM-DD, UTC
  items: TimelineItem[];
}

/** Everything two people share, oldest first. */
export function buildTimeline(
  transactions: readonly Transaction[],
  settlements: readonly Settlement[],
  viewerId: string,
  otherId: string
): TimelineItem[] {
  const items: TimelineItem[] = mutualTransactions(transactions, viewerId, otherId).map(
    (transaction) => ({ kind: "transaction", date: transaction.date, transaction })
  );

  for (const settlement of settlements) {
    const betweenPair =
      (settlement.from === viewerId && settlement.to === otherId) ||
      (settlement.from === otherId && settlement.to === viewerId);
    if (betweenPair) {
      items.push({ kind: "settlement", date: settlement.date, settlement });
    }
  }

  // Stable: same-instant transactions stay ahead of settlements
  return items.sort((a, b) => a.date.getTime() - b.date.getTime());
}

/** Buckets consecutive items by UTC day. Expects date-ordered input. */
export function groupTimelineByDay(items: readonly TimelineItem[]): TimelineDay[] {
  const days: TimelineDay[] = [];

  for (const item of items) {
    const day = item.date.toISOString().slice(0, 10);
    const last = days[days.length - 1];
    if (last && last.day === day) {
      last.items.push(item);
    } else {
      days.push({ day, items: [item] });
    }
  }

  return days;
}
