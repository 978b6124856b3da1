import type { Executor } from "./db.js";
import { ParticipantRepo } from "./repos/ParticipantRepo.js";
import { GroupRepo } from "./repos/GroupRepo.js";
import { TransactionRepo } from "./repos/TransactionRepo.js";
import { SettlementRepo } from "./repos/SettlementRepo.js";
import { SubscriptionRepo } from "./repos/SubscriptionRepo.js";

export interface Repositories {
  participants: ParticipantRepo;
  groups: GroupRepo;
  transactions: TransactionRepo;
  settlements: SettlementRepo;
  subscriptions: SubscriptionRepo;
}

/** Bind every repository to one executor, so they can share a SQLite transaction. */
export function createRepositories(db: Executor, defaultCurrency: string): Repositories {
  return {
    participants: new ParticipantRepo(db),
    groups: new GroupRepo(db),
    transactions: new TransactionRepo(db, defaultCurrency),
    settlements: new SettlementRepo(db, defaultCurrency),
    subscriptions: new SubscriptionRepo(db, defaultCurrency),
  };
}
