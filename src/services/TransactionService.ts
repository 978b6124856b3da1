import { createRepositories } from "../storage/index.js";
import type { AppDatabase, Repositories } from "../storage/index.js";
import {
  computeSplits,
  effectivePayers,
  rescalePayers,
  rescaleSplits,
  validateTransaction,
  InvalidTransactionError,
  NotFoundError,
} from "../engine/index.js";
import type { RawInputs, SplitWarning } from "../engine/index.js";
import type { PayerContribution, SplitMethod, Transaction } from "../types/index.js";
import { createId } from "./ids.js";

export interface CreateTransactionParams {
  id?: string;
  title: string;
  totalAmount: number;
  currency?: string;
  date?: Date;
  splitMethod: SplitMethod;
  participants: string[];
  rawInputs?: RawInputs;
  /** Explicit contributions. Takes precedence over `paidBy`. */
  payers?: PayerContribution[];
  /** Single payer who covered the whole total. */
  paidBy?: string;
  note?: string;
  groupId?: string;
  createdBy: string;
}

export interface UpdateTransactionParams {
  title?: string;
  totalAmount?: number;
  currency?: string;
  date?: Date;
  /** `null` or an empty string removes the note. */
  note?: string | null;
  /** Recompute splits from scratch; otherwise existing splits are rescaled. */
  split?: {
    method: SplitMethod;
    participants: string[];
    rawInputs?: RawInputs;
  };
  payers?: PayerContribution[];
}

export interface TransactionResult {
  transaction: Transaction;
  warnings: SplitWarning[];
}

/**
 * Creates and edits transactions. A transaction row and its payer and split
 * rows are written in one SQLite transaction.
 */
export class TransactionService {
  private db: AppDatabase;
  private defaultCurrency: string;
  private repos: Repositories;

  constructor(db: AppDatabase, defaultCurrency: string) {
    this.db = db;
    this.defaultCurrency = defaultCurrency;
    this.repos = createRepositories(db, defaultCurrency);
  }

  async createTransaction(params: CreateTransactionParams): Promise<TransactionResult> {
    if (params.groupId && !this.repos.groups.findById(params.groupId)) {
      throw new NotFoundError("Group", params.groupId);
    }

    const { splits, warnings } = computeSplits(
      params.totalAmount,
      params.splitMethod,
      params.participants,
      params.rawInputs
    );

    const transaction: Transaction = {
      id: params.id ?? createId("txn"),
      title: params.title.trim(),
      totalAmount: params.totalAmount,
      currency: (params.currency ?? this.defaultCurrency).toUpperCase(),
      date: params.date ?? new Date(),
      splitMethod: params.splitMethod,
      payers: this.resolvePayers(params),
      splits,
      note: params.note || undefined,
      groupId: params.groupId,
      createdBy: params.createdBy,
    };

    validateTransaction(transaction);

    const saved = this.db.transaction((tx) =>
      createRepositories(tx, this.defaultCurrency).transactions.create(transaction)
    );
    return { transaction: saved, warnings };
  }

  /**
   * Edit a saved transaction. A new total without new split inputs keeps every
   * participant's proportion of both the splits and the payments.
   */
  async updateTransaction(id: string, changes: UpdateTransactionParams): Promise<TransactionResult> {
    const existing = this.repos.transactions.findById(id);
    if (!existing) {
      throw new NotFoundError("Transaction", id);
    }

    const totalAmount = changes.totalAmount ?? existing.totalAmount;
    const totalChanged = totalAmount !== existing.totalAmount;

    let splitMethod = existing.splitMethod;
    let splits = existing.splits;
    let warnings: SplitWarning[] = [];

    if (changes.split) {
      const computed = computeSplits(
        totalAmount,
        changes.split.method,
        changes.split.participants,
        changes.split.rawInputs
      );
      splitMethod = changes.split.method;
      splits = computed.splits;
      warnings = computed.warnings;
    } else if (totalChanged) {
      splits = rescaleSplits(existing.splits, totalAmount, existing.splitMethod);
    }

    let payers = changes.payers ?? effectivePayers(existing);
    if (!changes.payers && totalChanged) {
      payers = rescalePayers(payers, totalAmount);
    }

    const transaction: Transaction = {
      ...existing,
      title: changes.title?.trim() ?? existing.title,
      totalAmount,
      currency: changes.currency?.toUpperCase() ?? existing.currency,
      date: changes.date ?? existing.date,
      note: changes.note === undefined ? existing.note : changes.note || undefined,
      splitMethod,
      splits,
      payers,
      legacyPayerId: undefined,
    };

    validateTransaction(transaction);

    // Payer and split rows are deleted and re-inserted
    const saved = this.db.transaction((tx) =>
      createRepositories(tx, this.defaultCurrency).transactions.update(transaction)
    );
    return { transaction: saved, warnings };
  }

  async getTransaction(id: string): Promise<Transaction | null> {
    return this.repos.transactions.findById(id);
  }

  async getTransactions(): Promise<Transaction[]> {
    return this.repos.transactions.findAll();
  }

  async getGroupTransactions(groupId: string): Promise<Transaction[]> {
    return this.repos.transactions.findByGroupId(groupId);
  }

  async deleteTransaction(id: string): Promise<void> {
    if (!this.repos.transactions.findById(id)) {
      throw new NotFoundError("Transaction", id);
    }
    this.repos.transactions.delete(id);
  }

  private resolvePayers(params: CreateTransactionParams): PayerContribution[] {
    if (params.payers && params.payers.length > 0) {
      return params.payers;
    }

    if (params.paidBy) {
      return [{ participantId: params.paidBy, amount: params.totalAmount }];
    }

    throw new InvalidTransactionError("Select at least one payer");
  }
}
