import { createRepositories } from "../storage/index.js";
import type { AppDatabase, Repositories } from "../storage/index.js";
import {
  aggregateBalance,
  counterpartIds,
  createSettlement,
  planSettleAll,
  InvalidParticipantPairError,
  NotFoundError,
} from "../engine/index.js";
import type { CounterpartBalance, SettlementResult } from "../engine/index.js";
import type { LedgerSnapshot, Settlement } from "../types/index.js";
import { createId } from "./ids.js";

export interface SettleUpParams {
  viewerId: string;
  otherId: string;
  currency?: string;
  /** Omit to settle in full. */
  amount?: number;
  note?: string;
  groupId?: string;
  date?: Date;
}

export interface SettleAllParams {
  viewerId: string;
  /** Limit the batch to these people. Defaults to everyone with a balance. */
  participantIds?: string[];
  note?: string;
  groupId?: string;
  date?: Date;
}

/**
 * Records settlements. Every write re-reads the ledger inside the same SQLite
 * transaction, so the amount is capped against committed state.
 */
export class SettlementService {
  private db: AppDatabase;
  private defaultCurrency: string;

  constructor(db: AppDatabase, defaultCurrency: string) {
    this.db = db;
    this.defaultCurrency = defaultCurrency;
  }

  async settleUp(params: SettleUpParams): Promise<SettlementResult> {
    if (params.viewerId === params.otherId) {
      throw new InvalidParticipantPairError(params.viewerId);
    }

    const currency = (params.currency ?? this.defaultCurrency).toUpperCase();

    return this.db.transaction((tx) => {
      const repos = createRepositories(tx, this.defaultCurrency);
      const snapshot = this.readSnapshot(repos, params.groupId);
      const outstanding = aggregateBalance(
        snapshot.transactions,
        snapshot.settlements,
        params.viewerId,
        params.otherId
      ).get(currency);

      const result = createSettlement({
        id: createId("stl"),
        viewerId: params.viewerId,
        otherId: params.otherId,
        currency,
        outstandingBalance: outstanding,
        requestedAmount: params.amount,
        date: params.date ?? new Date(),
        note: params.note,
        groupId: params.groupId,
      });

      repos.settlements.create(result.settlement);
      return result;
    });
  }

  /**
   * Settle every non-zero balance in every currency. Balances are recomputed
   * inside the transaction; all records are written or none are.
   */
  async settleAll(params: SettleAllParams): Promise<Settlement[]> {
    return this.db.transaction((tx) => {
      const repos = createRepositories(tx, this.defaultCurrency);
      const snapshot = this.readSnapshot(repos, params.groupId);

      const ids = params.participantIds ?? this.defaultCounterparts(repos, snapshot, params);
      const counterparts: CounterpartBalance[] = Array.from(new Set(ids))
        .filter((id) => id !== params.viewerId)
        .map((participantId) => ({
          participantId,
          balance: aggregateBalance(
            snapshot.transactions,
            snapshot.settlements,
            params.viewerId,
            participantId
          ),
        }));

      const planned = planSettleAll(params.viewerId, counterparts, {
        makeId: () => createId("stl"),
        date: params.date ?? new Date(),
        note: params.note,
        groupId: params.groupId,
      });

      for (const settlement of planned) {
        repos.settlements.create(settlement);
      }

      return planned;
    });
  }

  private readSnapshot(repos: Repositories, groupId?: string): LedgerSnapshot {
    if (!groupId) {
      return {
        transactions: repos.transactions.findAll(),
        settlements: repos.settlements.findAll(),
      };
    }

    if (!repos.groups.findById(groupId)) {
      throw new NotFoundError("Group", groupId);
    }

    return {
      transactions: repos.transactions.findByGroupId(groupId),
      settlements: repos.settlements.findByGroupId(groupId),
    };
  }

  private defaultCounterparts(
    repos: Repositories,
    snapshot: LedgerSnapshot,
    params: SettleAllParams
  ): string[] {
    if (params.groupId) {
      return repos.groups.findById(params.groupId)?.members ?? [];
    }
    return counterpartIds(snapshot, params.viewerId);
  }
}
