import { formatMoney } from "../engine/index.js";
import type { CurrencyBalance, HomeSummary, PersonBalance, SettlementResult } from "../engine/index.js";

export type NameLookup = ReadonlyMap<string, string>;

function nameOf(names: NameLookup, id: string): string {
  return names.get(id) ?? id;
}

/** "$12.00 + €5.00", largest amount first. */
export function formatCurrencyList(balance: CurrencyBalance): string {
  return balance
    .sortedCurrencies()
    .map(({ code, amount }) => formatMoney(Math.abs(amount), code))
    .join(" + ");
}

export function renderSummary(summary: HomeSummary): string {
  if (summary.youOwe.isSettled && summary.owedToYou.isSettled) {
    return "📊 Summary\n\n🎉 All settled up!";
  }

  const lines = ["📊 Summary", ""];
  if (!summary.youOwe.isSettled) {
    lines.push(`🔴 You owe: ${formatCurrencyList(summary.youOwe)}`);
  }
  if (!summary.owedToYou.isSettled) {
    lines.push(`🟢 You are owed: ${formatCurrencyList(summary.owedToYou)}`);
  }
  return lines.join("\n");
}

export function renderBalances(balances: readonly PersonBalance[], names: NameLookup): string {
  const lines: string[] = [];

  for (const { participantId, balance } of balances) {
    for (const { code, amount } of balance.sortedCurrencies()) {
      const name = nameOf(names, participantId);
      const money = formatMoney(Math.abs(amount), code);
      lines.push(amount > 0 ? `• ${name} owes you ${money}` : `• You owe ${name} ${money}`);
    }
  }

  if (lines.length === 0) {
    return "💰 Balances\n\n🎉 All settled up!";
  }
  return `💰 Balances\n${lines.join("\n")}`;
}

export function renderSettlement(result: SettlementResult, viewerId: string, names: NameLookup): string {
  const { settlement } = result;
  const money = formatMoney(settlement.amount, settlement.currency);
  const line =
    settlement.from === viewerId
      ? `✅ You paid ${nameOf(names, settlement.to)} ${money}`
      : `✅ ${nameOf(names, settlement.from)} paid you ${money}`;

  if (!result.capped) {
    return line;
  }

  const requested = formatMoney(result.requestedAmount, settlement.currency);
  return `${line}\n⚠️ ${requested} was more than the outstanding balance, so only ${money} was recorded.`;
}
