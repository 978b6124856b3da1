import { createRepositories } from "../storage/index.js";
import type { AppDatabase } from "../storage/index.js";
import { BalanceService } from "./BalanceService.js";
import { GroupService } from "./GroupService.js";
import { ParticipantService } from "./ParticipantService.js";
import { SettlementService } from "./SettlementService.js";
import { SubscriptionService } from "./SubscriptionService.js";
import { TransactionService } from "./TransactionService.js";

export { BalanceService, GroupService, ParticipantService, SettlementService, SubscriptionService, TransactionService };
export type { GroupBalances, HomeOverview } from "./BalanceService.js";
export type { SettleAllParams, SettleUpParams } from "./SettlementService.js";
export type {
  CreateSubscriptionParams,
  SubscriptionBalances,
  SubscriptionSettlementResult,
} from "./SubscriptionService.js";
export type {
  CreateTransactionParams,
  TransactionResult,
  UpdateTransactionParams,
} from "./TransactionService.js";
export { createId } from "./ids.js";

export interface Services {
  participants: ParticipantService;
  groups: GroupService;
  transactions: TransactionService;
  balances: BalanceService;
  settlements: SettlementService;
  subscriptions: SubscriptionService;
}

export function createServices(db: AppDatabase, defaultCurrency: string): Services {
  const repos = createRepositories(db, defaultCurrency);

  return {
    participants: new ParticipantService(repos.participants),
    groups: new GroupService(repos.groups, repos.participants),
    transactions: new TransactionService(db, defaultCurrency),
    balances: new BalanceService(repos.transactions, repos.settlements, repos.groups),
    settlements: new SettlementService(db, defaultCurrency),
    subscriptions: new SubscriptionService(db, defaultCurrency),
  };
}
