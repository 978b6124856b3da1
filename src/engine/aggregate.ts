import type { Group, LedgerSnapshot } from "../types/index.js";
import { CurrencyBalance } from "./CurrencyBalance.js";
import { aggregateBalance, effectivePayers, involvesParticipant } from "./ledger.js";

export interface MemberBalanceSummary {
  participantId: string;
  balance: CurrencyBalance; // positive = member owes the viewer
  totalPaid: CurrencyBalance;
}

export interface PersonBalance {
  participantId: string;
  balance: CurrencyBalance;
}

export interface HomeSummary {
  youOwe: CurrencyBalance; // magnitudes, always positive
  owedToYou: CurrencyBalance;
}

/** Balance between the viewer and one person across all shared history. */
export function personBalance(
  snapshot: LedgerSnapshot,
  viewerId: string,
  personId: string
): CurrencyBalance {
  return aggregateBalance(snapshot.transactions, snapshot.settlements, viewerId, personId);
}

/** Everyone who shares a transaction or a settlement with the viewer, sorted by id. */
export function counterpartIds(snapshot: LedgerSnapshot, viewerId: string): string[] {
  const ids = new Set<string>();

  for (const transaction of snapshot.transactions) {
    if (!involvesParticipant(transaction, viewerId)) continue;
    for (const payer of effectivePayers(transaction)) ids.add(payer.participantId);
    for (const split of transaction.splits) ids.add(split.participantId);
  }

  for (const settlement of snapshot.settlements) {
    if (settlement.from === viewerId) ids.add(settlement.to);
    if (settlement.to === viewerId) ids.add(settlement.from);
  }

  ids.delete(viewerId);
  return Array.from(ids).sort();
}

/** Person-level balances for everyone except the viewer. */
export function personBalances(
  snapshot: LedgerSnapshot,
  viewerId: string,
  participantIds: readonly string[]
): PersonBalance[] {
  return Array.from(new Set(participantIds))
    .filter((id) => id !== viewerId)
    .map((participantId) => ({
      participantId,
      balance: personBalance(snapshot, viewerId, participantId),
    }));
}

function scopeToGroup(snapshot: LedgerSnapshot, groupId: string): LedgerSnapshot {
  return {
    transactions: snapshot.transactions.filter((t) => t.groupId === groupId),
    settlements: snapshot.settlements.filter((s) => s.groupId === groupId),
  };
}

function otherMembers(group: Group, viewerId: string): string[] {
  return Array.from(new Set(group.members))
    .filter((id) => id !== viewerId)
    .sort();
}

/** Viewer's balance with one member, counting only this group's records. */
export function groupBalanceWith(
  group: Group,
  snapshot: LedgerSnapshot,
  viewerId: string,
  memberId: string
): CurrencyBalance {
  const scoped = scopeToGroup(snapshot, group.id);
  return aggregateBalance(scoped.transactions, scoped.settlements, viewerId, memberId);
}

/** Viewer's total in the group. Positive = members owe the viewer. */
export function groupBalance(
  group: Group,
  snapshot: LedgerSnapshot,
  viewerId: string
): CurrencyBalance {
  const scoped = scopeToGroup(snapshot, group.id);
  const total = new CurrencyBalance();

  for (const memberId of otherMembers(group, viewerId)) {
    total.merge(aggregateBalance(scoped.transactions, scoped.settlements, viewerId, memberId));
  }

  return total;
}

export function groupMemberBalances(
  group: Group,
  snapshot: LedgerSnapshot,
  viewerId: string
): MemberBalanceSummary[] {
  const scoped = scopeToGroup(snapshot, group.id);

  return otherMembers(group, viewerId).map((participantId) => {
    const totalPaid = new CurrencyBalance();
    for (const transaction of scoped.transactions) {
      for (const payer of effectivePayers(transaction)) {
        if (payer.participantId === participantId) {
          totalPaid.add(payer.amount, transaction.currency);
        }
      }
    }

    return {
      participantId,
      balance: aggregateBalance(scoped.transactions, scoped.settlements, viewerId, participantId),
      totalPaid,
    };
  });
}

/**
 * Roll person balances up into "you owe" and "you are owed" per currency.
 * Currencies are never netted against each other.
 */
export function homeSummary(balances: Iterable<CurrencyBalance>): HomeSummary {
  const youOwe = new CurrencyBalance();
  const owedToYou = new CurrencyBalance();

  for (const balance of balances) {
    for (const { code, amount } of balance.nonZero()) {
      if (amount < 0) {
        youOwe.add(-amount, code);
      } else {
        owedToYou.add(amount, code);
      }
    }
  }

  return { youOwe, owedToYou };
}

function byPrimaryMagnitude(a: PersonBalance, b: PersonBalance): number {
  return Math.abs(b.balance.primaryAmount) - Math.abs(a.balance.primaryAmount);
}

/** People the viewer owes in any currency, largest debt first. */
export function peopleYouOwe(balances: readonly PersonBalance[]): PersonBalance[] {
  return balances.filter((entry) => entry.balance.hasNegative).sort(byPrimaryMagnitude);
}

export function peopleWhoOweYou(balances: readonly PersonBalance[]): PersonBalance[] {
  return balances.filter((entry) => entry.balance.hasPositive).sort(byPrimaryMagnitude);
}
