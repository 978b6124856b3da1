import { sqliteTable, text, integer, real, primaryKey } from "drizzle-orm/sqlite-core";
import { BILLING_CYCLES, SPLIT_METHODS } from "../types/index.js";

// Keep in sync with SCHEMA_SQL in ./migrate.ts

export const participants = sqliteTable("participants", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  phone: text("phone"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const groups = sqliteTable("groups", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  createdBy: text("created_by").notNull().references(() => participants.id),
});

export const groupMembers = sqliteTable(
  "group_members",
  {
    groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
    participantId: text("participant_id")
      .notNull()
      .references(() => participants.id, { onDelete: "cascade" }),
    joinedAt: integer("joined_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.groupId, table.participantId] }),
  })
);

export const transactions = sqliteTable("transactions", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  totalAmount: integer("total_amount").notNull(), // minor units
  currency: text("currency"), // NULL = configured default
  date: integer("date", { mode: "timestamp_ms" }).notNull(),
  splitMethod: text("split_method", { enum: SPLIT_METHODS }).notNull(),
  note: text("note"),
  groupId: text("group_id").references(() => groups.id, { onDelete: "set null" }),
  payerId: text("payer_id"), // single payer of legacy rows
  createdBy: text("created_by").notNull(),
});

export const transactionPayers = sqliteTable(
  "transaction_payers",
  {
    transactionId: text("transaction_id")
      .notNull()
      .references(() => transactions.id, { onDelete: "cascade" }),
    participantId: text("participant_id").notNull(),
    amount: integer("amount").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.transactionId, table.participantId] }),
  })
);

export const transactionSplits = sqliteTable(
  "transaction_splits",
  {
    transactionId: text("transaction_id")
      .notNull()
      .references(() => transactions.id, { onDelete: "cascade" }),
    participantId: text("participant_id").notNull(),
    amount: integer("amount").notNull(),
    rawInput: real("raw_input").notNull().default(0),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.transactionId, table.participantId] }),
  })
);

export const settlements = sqliteTable("settlements", {
  id: text("id").primaryKey(),
  fromId: text("from_id").notNull(),
  toId: text("to_id").notNull(),
  amount: integer("amount").notNull(),
  currency: text("currency"),
  date: integer("date", { mode: "timestamp_ms" }).notNull(),
  note: text("note"),
  isFullSettlement: integer("is_full_settlement", { mode: "boolean" }).notNull().default(false),
  groupId: text("group_id").references(() => groups.id, { onDelete: "set null" }),
});

export const subscriptions = sqliteTable("subscriptions", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  amount: integer("amount").notNull(),
  currency: text("currency"),
  cycle: text("cycle", { enum: BILLING_CYCLES }).notNull(),
  customCycleDays: integer("custom_cycle_days").notNull().default(30),
  isShared: integer("is_shared", { mode: "boolean" }).notNull().default(false),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  nextBillingDate: integer("next_billing_date", { mode: "timestamp_ms" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const subscriptionMembers = sqliteTable(
  "subscription_members",
  {
    subscriptionId: text("subscription_id")
      .notNull()
      .references(() => subscriptions.id, { onDelete: "cascade" }),
    participantId: text("participant_id").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.subscriptionId, table.participantId] }),
  })
);

export const subscriptionPayments = sqliteTable("subscription_payments", {
  id: text("id").primaryKey(),
  subscriptionId: text("subscription_id")
    .notNull()
    .references(() => subscriptions.id, { onDelete: "cascade" }),
  payerId: text("payer_id").notNull(),
  amount: integer("amount").notNull(),
  date: integer("date", { mode: "timestamp_ms" }).notNull(),
  note: text("note"),
});

export const subscriptionSettlements = sqliteTable("subscription_settlements", {
  id: text("id").primaryKey(),
  subscriptionId: text("subscription_id")
    .notNull()
    .references(() => subscriptions.id, { onDelete: "cascade" }),
  fromId: text("from_id").notNull(),
  toId: text("to_id").notNull(),
  amount: integer("amount").notNull(),
  date: integer("date", { mode: "timestamp_ms" }).notNull(),
  note: text("note"),
});
