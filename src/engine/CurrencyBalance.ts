import { ZERO_THRESHOLD } from "./currency.js";

export interface CurrencyAmount {
  code: string;
  amount: number; // minor units, signed
}

/**
 * Signed amounts keyed by currency code.
 * Positive = owed to the viewer, negative = owed by the viewer.
 */
export class CurrencyBalance {
  private readonly balances = new Map<string, number>();

  static from(entries: Iterable<CurrencyAmount> | Record<string, number>): CurrencyBalance {
    const balance = new CurrencyBalance();
    const list: Iterable<CurrencyAmount> = isIterable(entries)
      ? entries
      : Object.entries(entries).map(([code, amount]) => ({ code, amount }));
    for (const { code, amount } of list) {
      balance.add(amount, code);
    }
    return balance;
  }

  add(amount: number, currency: string): this {
    const code = currency.toUpperCase();
    this.balances.set(code, (this.balances.get(code) ?? 0) + amount);
    return this;
  }

  subtract(amount: number, currency: string): this {
    return this.add(-amount, currency);
  }

  merge(other: CurrencyBalance): this {
    for (const { code, amount } of other.entries()) {
      this.add(amount, code);
    }
    return this;
  }

  get(currency: string): number {
    return this.balances.get(currency.toUpperCase()) ?? 0;
  }

  /** Every entry, including near-zero ones. */
  entries(): CurrencyAmount[] {
    return Array.from(this.balances, ([code, amount]) => ({ code, amount }));
  }

  nonZero(): CurrencyAmount[] {
    return this.entries().filter((entry) => Math.abs(entry.amount) >= ZERO_THRESHOLD);
  }

  /** Non-zero entries by magnitude, largest first; ties keep code order. */
  sortedCurrencies(): CurrencyAmount[] {
    return this.nonZero().sort(
      (a, b) => Math.abs(b.amount) - Math.abs(a.amount) || a.code.localeCompare(b.code)
    );
  }

  get isSettled(): boolean {
    return this.nonZero().length === 0;
  }

  /** The code when exactly one currency is non-zero. */
  get singleCurrency(): string | undefined {
    const nonZero = this.nonZero();
    return nonZero.length === 1 ? nonZero[0].code : undefined;
  }

  get hasPositive(): boolean {
    return this.nonZero().some((entry) => entry.amount > 0);
  }

  get hasNegative(): boolean {
    return this.nonZero().some((entry) => entry.amount < 0);
  }

  get primaryAmount(): number {
    return this.sortedCurrencies()[0]?.amount ?? 0;
  }

  primaryCurrency(fallback: string): string {
    return this.sortedCurrencies()[0]?.code ?? fallback;
  }

  get currencyCount(): number {
    return this.nonZero().length;
  }

  /** Non-zero entries, largest magnitude first. */
  toJSON(): Record<string, number> {
    return Object.fromEntries(this.sortedCurrencies().map(({ code, amount }) => [code, amount]));
  }
}

function isIterable(value: unknown): value is Iterable<CurrencyAmount> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}
