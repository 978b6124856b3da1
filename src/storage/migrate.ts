import type Database from "better-sqlite3";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS participants (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  phone TEXT,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS groups (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  created_by TEXT NOT NULL REFERENCES participants(id)
);

CREATE TABLE IF NOT EXISTS group_members (
  group_id TEXT NOT NULL REFERENCES groups(id) ON DELETE CASCADE,
  participant_id TEXT NOT NULL REFERENCES participants(id) ON DELETE CASCADE,
  joined_at INTEGER NOT NULL,
  PRIMARY KEY (group_id, participant_id)
);

CREATE TABLE IF NOT EXISTS transactions (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  total_amount INTEGER NOT NULL,
  currency TEXT,
  date INTEGER NOT NULL,
  split_method TEXT NOT NULL,
  note TEXT,
  group_id TEXT REFERENCES groups(id) ON DELETE SET NULL,
  payer_id TEXT,
  created_by TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS transaction_payers (
  transaction_id TEXT NOT NULL REFERENCES transactions(id) ON DELETE CASCADE,
  participant_id TEXT NOT NULL,
  amount INTEGER NOT NULL,
  PRIMARY KEY (transaction_id, participant_id)
);

CREATE TABLE IF NOT EXISTS transaction_splits (
  transaction_id TEXT NOT NULL REFERENCES transactions(id) ON DELETE CASCADE,
  participant_id TEXT NOT NULL,
  amount INTEGER NOT NULL,
  raw_input REAL NOT NULL DEFAULT 0,
  PRIMARY KEY (transaction_id, participant_id)
);

CREATE TABLE IF NOT EXISTS settlements (
  id TEXT PRIMARY KEY,
  from_id TEXT NOT NULL,
  to_id TEXT NOT NULL,
  amount INTEGER NOT NULL,
  currency TEXT,
  date INTEGER NOT NULL,
  note TEXT,
  is_full_settlement INTEGER NOT NULL DEFAULT 0,
  group_id TEXT REFERENCES groups(id) ON DELETE SET NULL
);

CREATE TABLE IF NOT EXISTS subscriptions (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  amount INTEGER NOT NULL,
  currency TEXT,
  cycle TEXT NOT NULL,
  custom_cycle_days INTEGER NOT NULL DEFAULT 30,
  is_shared INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  next_billing_date INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS subscription_members (
  subscription_id TEXT NOT NULL REFERENCES subscriptions(id) ON DELETE CASCADE,
  participant_id TEXT NOT NULL,
  PRIMARY KEY (subscription_id, participant_id)
);

CREATE TABLE IF NOT EXISTS subscription_payments (
  id TEXT PRIMARY KEY,
  subscription_id TEXT NOT NULL REFERENCES subscriptions(id) ON DELETE CASCADE,
  payer_id TEXT NOT NULL,
  amount INTEGER NOT NULL,
  date INTEGER NOT NULL,
  note TEXT
);

CREATE TABLE IF NOT EXISTS subscription_settlements (
  id TEXT PRIMARY KEY,
  subscription_id TEXT NOT NULL REFERENCES subscriptions(id) ON DELETE CASCADE,
  from_id TEXT NOT NULL,
  to_id TEXT NOT NULL,
  amount INTEGER NOT NULL,
  date INTEGER NOT NULL,
  note TEXT
);

CREATE INDEX IF NOT EXISTS transactions_group_idx ON transactions(group_id);
CREATE INDEX IF NOT EXISTS settlements_pair_idx ON settlements(from_id, to_id);
`;

export function initializeSchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}
