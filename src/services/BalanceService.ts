import type { GroupRepo, SettlementRepo, TransactionRepo } from "../storage/index.js";
import {
  buildTimeline,
  counterpartIds,
  groupBalance,
  groupMemberBalances,
  groupTimelineByDay,
  homeSummary,
  peopleWhoOweYou,
  peopleYouOwe,
  personBalance,
  personBalances,
  NotFoundError,
} from "../engine/index.js";
import type {
  CurrencyBalance,
  HomeSummary,
  MemberBalanceSummary,
  PersonBalance,
  TimelineDay,
} from "../engine/index.js";
import type { Group, LedgerSnapshot } from "../types/index.js";

export interface GroupBalances {
  group: Group;
  total: CurrencyBalance;
  members: MemberBalanceSummary[];
}

export interface HomeOverview extends HomeSummary {
  youOwePeople: PersonBalance[];
  owesYouPeople: PersonBalance[];
}

export class BalanceService {
  private transactionRepo: TransactionRepo;
  private settlementRepo: SettlementRepo;
  private groupRepo: GroupRepo;

  constructor(transactionRepo: TransactionRepo, settlementRepo: SettlementRepo, groupRepo: GroupRepo) {
    this.transactionRepo = transactionRepo;
    this.settlementRepo = settlementRepo;
    this.groupRepo = groupRepo;
  }

  async getSnapshot(): Promise<LedgerSnapshot> {
    return {
      transactions: this.transactionRepo.findAll(),
      settlements: this.settlementRepo.findAll(),
    };
  }

  async getPersonBalance(viewerId: string, personId: string): Promise<CurrencyBalance> {
    return personBalance(await this.getSnapshot(), viewerId, personId);
  }

  /** Balances with everyone the viewer has history with. */
  async getPersonBalances(viewerId: string): Promise<PersonBalance[]> {
    const snapshot = await this.getSnapshot();
    return personBalances(snapshot, viewerId, counterpartIds(snapshot, viewerId));
  }

  async getHomeSummary(viewerId: string): Promise<HomeOverview> {
    const balances = await this.getPersonBalances(viewerId);
    const summary = homeSummary(balances.map((entry) => entry.balance));

    return {
      ...summary,
      youOwePeople: peopleYouOwe(balances),
      owesYouPeople: peopleWhoOweYou(balances),
    };
  }

  async getGroupBalances(groupId: string, viewerId: string): Promise<GroupBalances> {
    const group = this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }

    const snapshot: LedgerSnapshot = {
      transactions: this.transactionRepo.findByGroupId(groupId),
      settlements: this.settlementRepo.findByGroupId(groupId),
    };

    return {
      group,
      total: groupBalance(group, snapshot, viewerId),
      members: groupMemberBalances(group, snapshot, viewerId),
    };
  }

  async getTimeline(viewerId: string, otherId: string): Promise<TimelineDay[]> {
    const snapshot = await this.getSnapshot();
    return groupTimelineByDay(
      buildTimeline(snapshot.transactions, snapshot.settlements, viewerId, otherId)
    );
  }
}
