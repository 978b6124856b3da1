import { createRepositories } from "../storage/index.js";
import type { AppDatabase, Repositories } from "../storage/index.js";
import {
  exportPaymentHistory,
  nextBillingDate,
  resolveSettlementAmount,
  subscriptionBalanceWith,
  subscriptionMemberBalances,
  subscriptionUserBalance,
  InvalidAmountError,
  InvalidParticipantPairError,
  InvalidTransactionError,
  NotFoundError,
} from "../engine/index.js";
import type { MemberBalanceSummary } from "../engine/index.js";
import type {
  BillingCycle,
  Subscription,
  SubscriptionPayment,
  SubscriptionSettlement,
} from "../types/index.js";
import { createId } from "./ids.js";

export interface CreateSubscriptionParams {
  id?: string;
  name: string;
  amount: number;
  currency?: string;
  cycle: BillingCycle;
  customCycleDays?: number;
  isShared?: boolean;
  subscribers?: string[];
  startDate?: Date;
}

export interface SubscriptionBalances {
  subscription: Subscription;
  userBalance: number;
  members: MemberBalanceSummary[];
}

export interface SubscriptionSettlementResult {
  settlement: SubscriptionSettlement;
  capped: boolean;
  requestedAmount: number;
}

const DEFAULT_CUSTOM_CYCLE_DAYS = 30;

export class SubscriptionService {
  private db: AppDatabase;
  private defaultCurrency: string;
  private repos: Repositories;

  constructor(db: AppDatabase, defaultCurrency: string) {
    this.db = db;
    this.defaultCurrency = defaultCurrency;
    this.repos = createRepositories(db, defaultCurrency);
  }

  async createSubscription(params: CreateSubscriptionParams): Promise<Subscription> {
    if (!params.name.trim()) {
      throw new InvalidTransactionError("Please enter a subscription name");
    }
    if (!Number.isInteger(params.amount) || params.amount <= 0) {
      throw new InvalidAmountError("Subscription amount must be greater than zero");
    }

    const customCycleDays = params.customCycleDays ?? DEFAULT_CUSTOM_CYCLE_DAYS;
    const now = new Date();

    return this.repos.subscriptions.create({
      id: params.id ?? createId("sub"),
      name: params.name.trim(),
      amount: params.amount,
      currency: params.currency ?? this.defaultCurrency,
      cycle: params.cycle,
      customCycleDays,
      isShared: params.isShared ?? false,
      isActive: true,
      subscribers: params.subscribers ?? [],
      nextBillingDate: params.startDate ?? nextBillingDate(params.cycle, customCycleDays, now),
      createdAt: now,
    });
  }

  async getSubscription(id: string): Promise<Subscription | null> {
    return this.repos.subscriptions.findById(id);
  }

  async getSubscriptions(): Promise<Subscription[]> {
    return this.repos.subscriptions.findAll();
  }

  async setActive(id: string, isActive: boolean): Promise<Subscription> {
    this.requireSubscription(this.repos, id);
    const updated = this.repos.subscriptions.update(id, { isActive });
    if (!updated) {
      throw new NotFoundError("Subscription", id);
    }
    return updated;
  }

  /** Record a billing payment and move the next billing date one cycle past it. */
  async recordPayment(params: {
    subscriptionId: string;
    payerId: string;
    amount?: number;
    date?: Date;
    note?: string;
  }): Promise<SubscriptionPayment> {
    return this.db.transaction((tx) => {
      const repos = createRepositories(tx, this.defaultCurrency);
      const subscription = this.requireSubscription(repos, params.subscriptionId);

      const amount = params.amount ?? subscription.amount;
      if (!Number.isInteger(amount) || amount <= 0) {
        throw new InvalidAmountError("Payment amount must be greater than zero");
      }

      const date = params.date ?? new Date();
      const payment = repos.subscriptions.addPayment({
        id: createId("sbp"),
        subscriptionId: subscription.id,
        payerId: params.payerId,
        amount,
        date,
        note: params.note,
      });

      repos.subscriptions.update(subscription.id, {
        nextBillingDate: nextBillingDate(subscription.cycle, subscription.customCycleDays, date),
      });

      return payment;
    });
  }

  async getBalances(subscriptionId: string, viewerId: string): Promise<SubscriptionBalances> {
    const subscription = this.requireSubscription(this.repos, subscriptionId);
    const payments = this.repos.subscriptions.findPayments(subscriptionId);
    const settlements = this.repos.subscriptions.findSettlements(subscriptionId);

    return {
      subscription,
      userBalance: subscriptionUserBalance(subscription, payments, settlements, viewerId),
      members: subscriptionMemberBalances(subscription, payments, settlements, viewerId),
    };
  }

  /** Settle the viewer's balance with one member, capped to what is outstanding. */
  async settle(params: {
    subscriptionId: string;
    viewerId: string;
    memberId: string;
    amount?: number;
    note?: string;
    date?: Date;
  }): Promise<SubscriptionSettlementResult> {
    if (params.viewerId === params.memberId) {
      throw new InvalidParticipantPairError(params.viewerId);
    }

    return this.db.transaction((tx) => {
      const repos = createRepositories(tx, this.defaultCurrency);
      const subscription = this.requireSubscription(repos, params.subscriptionId);
      const outstanding = subscriptionBalanceWith(
        subscription,
        repos.subscriptions.findPayments(subscription.id),
        repos.subscriptions.findSettlements(subscription.id),
        params.viewerId,
        params.memberId
      );

      const resolved = resolveSettlementAmount(outstanding, params.amount);
      const settlement = repos.subscriptions.addSettlement({
        id: createId("sbs"),
        subscriptionId: subscription.id,
        from: resolved.paidToViewer ? params.memberId : params.viewerId,
        to: resolved.paidToViewer ? params.viewerId : params.memberId,
        amount: resolved.amount,
        date: params.date ?? new Date(),
        note: params.note,
      });

      return {
        settlement,
        capped: resolved.capped,
        requestedAmount: params.amount ?? resolved.amount,
      };
    });
  }

  async exportPayments(subscriptionId: string, viewerId: string): Promise<string> {
    const subscription = this.requireSubscription(this.repos, subscriptionId);
    const payments = this.repos.subscriptions.findPayments(subscriptionId);

    const payerIds = Array.from(new Set(payments.map((payment) => payment.payerId)));
    const names = new Map(
      this.repos.participants.findByIds(payerIds).map((participant) => [participant.id, participant.name])
    );

    return exportPaymentHistory(subscription, payments, viewerId, names);
  }

  async deleteSubscription(id: string): Promise<void> {
    this.requireSubscription(this.repos, id);
    this.repos.subscriptions.delete(id);
  }

  private requireSubscription(repos: Repositories, id: string): Subscription {
    const subscription = repos.subscriptions.findById(id);
    if (!subscription) {
      throw new NotFoundError("Subscription", id);
    }
    return subscription;
  }
}
