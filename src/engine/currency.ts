export interface Currency {
  code: string; // ISO 4217
  symbol: string;
  name: string;
  flag: string;
  minorUnits: number; // digits after the decimal point
}

export const CURRENCIES: readonly Currency[] = [
  { code: "USD", symbol: "$", name: "US Dollar", flag: "🇺🇸", minorUnits: 2 },
  { code: "EUR", symbol: "€", name: "Euro", flag: "🇪🇺", minorUnits: 2 },
  { code: "GBP", symbol: "£", name: "British Pound", flag: "🇬🇧", minorUnits: 2 },
  { code: "INR", symbol: "₹", name: "Indian Rupee", flag: "🇮🇳", minorUnits: 2 },
  { code: "CNY", symbol: "¥", name: "Chinese Yuan", flag: "🇨🇳", minorUnits: 2 },
  { code: "JPY", symbol: "¥", name: "Japanese Yen", flag: "🇯🇵", minorUnits: 0 },
  { code: "CHF", symbol: "CHF", name: "Swiss Franc", flag: "🇨🇭", minorUnits: 2 },
  { code: "CAD", symbol: "CA$", name: "Canadian Dollar", flag: "🇨🇦", minorUnits: 2 },
  { code: "AUD", symbol: "A$", name: "Australian Dollar", flag: "🇦🇺", minorUnits: 2 },
  { code: "KRW", symbol: "₩", name: "South Korean Won", flag: "🇰🇷", minorUnits: 0 },
  { code: "SGD", symbol: "S$", name: "Singapore Dollar", flag: "🇸🇬", minorUnits: 2 },
  { code: "AED", symbol: "د.إ", name: "UAE Dirham", flag: "🇦🇪", minorUnits: 2 },
  { code: "BRL", symbol: "R$", name: "Brazilian Real", flag: "🇧🇷", minorUnits: 2 },
  { code: "MXN", symbol: "MX$", name: "Mexican Peso", flag: "🇲🇽", minorUnits: 2 },
  { code: "SEK", symbol: "kr", name: "Swedish Krona", flag: "🇸🇪", minorUnits: 2 },
];

const CURRENCY_BY_CODE = new Map(CURRENCIES.map((c) => [c.code, c]));

/** Amounts below one minor unit are treated as settled. */
export const ZERO_THRESHOLD = 1;

export function findCurrency(code: string): Currency | undefined {
  return CURRENCY_BY_CODE.get(code.toUpperCase());
}

/**
 * Look up a currency, falling back to a two-decimal descriptor that uses the
 * code itself as its symbol.
 */
export function getCurrency(code: string): Currency {
  const upper = code.toUpperCase();
  return (
    CURRENCY_BY_CODE.get(upper) ?? {
      code: upper,
      symbol: upper,
      name: upper,
      flag: "🏳️",
      minorUnits: 2,
    }
  );
}

export function isSupportedCurrency(code: string): boolean {
  return CURRENCY_BY_CODE.has(code.toUpperCase());
}

export function toMinorUnits(amount: number, code: string): number {
  return Math.round(amount * 10 ** getCurrency(code).minorUnits);
}

export function fromMinorUnits(amount: number, code: string): number {
  return amount / 10 ** getCurrency(code).minorUnits;
}

/**
 * Parse user input such as "12.50", "12,50" or "$1,234.50" into minor units.
 * Returns null for anything that is not a positive amount.
 */
export function parseAmount(input: string, code: string): number | null {
  let normalized = input.trim();
  normalized = normalized.includes(".")
    ? normalized.replace(/,/g, "")
    : normalized.replace(",", ".");
  normalized = normalized.replace(/[^\d.]/g, "");

  if (!normalized) {
    return null;
  }

  const value = Number.parseFloat(normalized);
  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }

  return toMinorUnits(value, code);
}

const numberFormats = new Map<number, Intl.NumberFormat>();

function numberFormat(fractionDigits: number): Intl.NumberFormat {
  let format = numberFormats.get(fractionDigits);
  if (!format) {
    format = new Intl.NumberFormat("en-US", {
      minimumFractionDigits: fractionDigits,
      maximumFractionDigits: fractionDigits,
    });
    numberFormats.set(fractionDigits, format);
  }
  return format;
}

function symbolPrefix(currency: Currency): string {
  return /^[A-Za-z]+$/.test(currency.symbol) ? `${currency.symbol} ` : currency.symbol;
}

/** Format minor units for display, e.g. 123450 USD -> "$1,234.50". */
export function formatMoney(amount: number, code: string): string {
  const currency = getCurrency(code);
  const magnitude = Math.abs(amount);
  const digits = numberFormat(currency.minorUnits).format(fromMinorUnits(magnitude, code));
  const sign = amount < 0 && magnitude >= ZERO_THRESHOLD / 2 ? "-" : "";
  return `${sign}${symbolPrefix(currency)}${digits}`;
}

/** Like formatMoney but always signed outside the zero threshold: "+$5.00", "-$5.00". */
export function formatSignedMoney(amount: number, code: string): string {
  const formatted = formatMoney(Math.abs(amount), code);
  if (amount >= ZERO_THRESHOLD) {
    return `+${formatted}`;
  }
  if (amount <= -ZERO_THRESHOLD) {
    return `-${formatted}`;
  }
  return formatted;
}
