// All amounts are INTEGER MINOR UNITS of their currency (cents, or whole yen for JPY)
export const SPLIT_METHODS = ["equal", "amount", "percentage", "shares", "adjustment"] as const;

export type SplitMethod = (typeof SPLIT_METHODS)[number];

export interface Participant {
  id: string;
  name: string;
  phone?: string;
}

export interface Group {
  id: string;
  name: string;
  members: string[]; // Participant IDs
  createdAt: Date;
  createdBy: string; // Participant ID
}

export interface PayerContribution {
  participantId: string;
  amount: number;
}

export interface SplitShare {
  participantId: string;
  amount: number;
  rawInput: number; // percentage, share count, exact amount or signed adjustment
}

export interface Transaction {
  id: string;
  title: string;
  totalAmount: number;
  currency: string;
  date: Date;
  splitMethod: SplitMethod;
  payers: PayerContribution[];
  splits: SplitShare[];
  note?: string;
  groupId?: string;
  legacyPayerId?: string; // single payer of records created before multi-payer support
  createdBy: string;
}

export interface Settlement {
  id: string;
  from: string; // Participant ID
  to: string; // Participant ID
  amount: number; // always positive
  currency: string;
  date: Date;
  note?: string;
  isFullSettlement: boolean;
  groupId?: string;
}

export const BILLING_CYCLES = ["weekly", "monthly", "yearly", "custom"] as const;

export type BillingCycle = (typeof BILLING_CYCLES)[number];

export type BillingStatus = "upcoming" | "due" | "overdue" | "paused";

export interface Subscription {
  id: string;
  name: string;
  amount: number;
  currency: string;
  cycle: BillingCycle;
  customCycleDays: number;
  isShared: boolean;
  isActive: boolean;
  subscribers: string[]; // Participant IDs, may include the viewer
  nextBillingDate: Date;
  createdAt: Date;
}

export interface SubscriptionPayment {
  id: string;
  subscriptionId: string;
  payerId: string;
  amount: number;
  date: Date;
  note?: string;
}

export interface SubscriptionSettlement {
  id: string;
  subscriptionId: string;
  from: string;
  to: string;
  amount: number;
  date: Date;
  note?: string;
}

/** Plain records the engine needs to compute person-level balances. */
export interface LedgerSnapshot {
  transactions: Transaction[];
  settlements: Settlement[];
}
