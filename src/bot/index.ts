import { Bot, Keyboard, type Context } from "grammy";
import { loadConfig } from "../config.js";
import { LedgerError, isSupportedCurrency, parseAmount, formatMoney } from "../engine/index.js";
import { createServices } from "../services/index.js";
import { createDatabase } from "../storage/index.js";
import { renderBalances, renderSettlement, renderSummary } from "./format.js";

const config = loadConfig();
const services = createServices(createDatabase(config.databasePath), config.defaultCurrency);

if (!config.telegramBotToken) {
  console.error("❌ TELEGRAM_BOT_TOKEN is not set");
  process.exit(1);
}

const bot = new Bot(config.telegramBotToken);

const MAIN_KEYBOARD = new Keyboard()
  .text("/summary 📊")
  .text("/balances 💰")
  .row()
  .text("/settleall ✅")
  .resized()
  .persistent();

const HELP_TEXT = [
  "Commands:",
  "/summary - what you owe and are owed",
  "/balances - balance with each person",
  "/settle <personId> [amount] [currency] - record a payment",
  "/settleall - settle every balance at once",
].join("\n");

async function replyWithKeyboard(ctx: Context, text: string): Promise<void> {
  await ctx.reply(text, { reply_markup: MAIN_KEYBOARD });
}

/** Register the sender on first contact; returns their participant id. */
async function upsertTelegramUser(ctx: Context): Promise<string | null> {
  if (!ctx.from) {
    return null;
  }

  const id = ctx.from.id.toString();
  await services.participants.ensureParticipant(id, ctx.from.first_name || ctx.from.username || "User");
  return id;
}

bot.command("start", async (ctx) => {
  const viewerId = await upsertTelegramUser(ctx);
  if (!viewerId) return;

  await replyWithKeyboard(ctx, `👋 Welcome! Your id is ${viewerId}.\n\n${HELP_TEXT}`);
});

bot.command("help", async (ctx) => {
  await replyWithKeyboard(ctx, HELP_TEXT);
});

bot.command("summary", async (ctx) => {
  const viewerId = await upsertTelegramUser(ctx);
  if (!viewerId) return;

  const summary = await services.balances.getHomeSummary(viewerId);
  await replyWithKeyboard(ctx, renderSummary(summary));
});

bot.command("balances", async (ctx) => {
  const viewerId = await upsertTelegramUser(ctx);
  if (!viewerId) return;

  const balances = await services.balances.getPersonBalances(viewerId);
  const names = await services.participants.getNames(balances.map((b) => b.participantId));
  await replyWithKeyboard(ctx, renderBalances(balances, names));
});

bot.command("settle", async (ctx) => {
  const viewerId = await upsertTelegramUser(ctx);
  if (!viewerId) return;

  const [otherId, amountText, currencyText] = ctx.match.trim().split(/\s+/).filter(Boolean);
  if (!otherId) {
    await replyWithKeyboard(ctx, "Usage: /settle <personId> [amount] [currency]");
    return;
  }

  const currency = (currencyText ?? config.defaultCurrency).toUpperCase();
  if (!isSupportedCurrency(currency)) {
    await replyWithKeyboard(ctx, `❌ Unknown currency ${currency}.`);
    return;
  }

  let amount: number | undefined;
  if (amountText) {
    const parsed = parseAmount(amountText, currency);
    if (parsed === null) {
      await replyWithKeyboard(ctx, "❌ Invalid amount.");
      return;
    }
    amount = parsed;
  }

  const result = await services.settlements.settleUp({ viewerId, otherId, currency, amount });
  const names = await services.participants.getNames([otherId]);
  await replyWithKeyboard(ctx, renderSettlement(result, viewerId, names));
});

bot.command("settleall", async (ctx) => {
  const viewerId = await upsertTelegramUser(ctx);
  if (!viewerId) return;

  const settlements = await services.settlements.settleAll({ viewerId });
  if (settlements.length === 0) {
    await replyWithKeyboard(ctx, "🎉 Nothing to settle.");
    return;
  }

  const names = await services.participants.getNames(
    settlements.map((s) => (s.from === viewerId ? s.to : s.from))
  );
  const lines = settlements.map((s) =>
    s.from === viewerId
      ? `• You paid ${names.get(s.to) ?? s.to} ${formatMoney(s.amount, s.currency)}`
      : `• ${names.get(s.from) ?? s.from} paid you ${formatMoney(s.amount, s.currency)}`
  );
  await replyWithKeyboard(ctx, `✅ Settled ${settlements.length} balance(s)\n${lines.join("\n")}`);
});

bot.catch(async (error) => {
  if (error.error instanceof LedgerError) {
    await error.ctx.reply(`❌ ${error.error.message}`).catch((replyError: unknown) => {
      console.error("Failed to send error reply:", replyError);
    });
    return;
  }

  console.error("Bot error:", error.error);

  if (error.error instanceof Error && error.error.stack) {
    console.error("Bot error stack:", error.error.stack);
  }

  console.error("Bot error update:", JSON.stringify(error.ctx.update));
});

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

async function startBot(): Promise<void> {
  try {
    const me = await bot.api.getMe();
    console.log(`🤖 Starting ledger bot as @${me.username}`);

    const webhookInfo = await bot.api.getWebhookInfo();
    if (webhookInfo.url) {
      console.warn(`Webhook is configured (${webhookInfo.url}). Deleting webhook for long polling.`);
      await bot.api.deleteWebhook({ drop_pending_updates: false });
    }

    await bot.start({
      onStart: () => {
        console.log("🤖 Ledger bot is running...");
      },
    });
  } catch (error) {
    console.error("Failed to start bot:", error);
    process.exit(1);
  }
}

void startBot();
