import "dotenv/config";
import { z } from "zod";
import { isSupportedCurrency } from "./engine/index.js";

const configSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("./data/ledger.db"),
  PORT: z.coerce.number().int().positive().default(3000),
  DEFAULT_CURRENCY: z
    .string()
    .toUpperCase()
    .refine(isSupportedCurrency, { message: "Unsupported currency code" })
    .default("USD"),
  CURRENT_USER_ID: z.string().min(1).default("me"),
  // An empty value in .env means "no bot"
  TELEGRAM_BOT_TOKEN: z
    .string()
    .optional()
    .transform((value) => value || undefined),
});

export interface AppConfig {
  databasePath: string;
  port: number;
  defaultCurrency: string;
  currentUserId: string;
  telegramBotToken?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse(env);

  return {
    databasePath: parsed.DATABASE_PATH,
    port: parsed.PORT,
    defaultCurrency: parsed.DEFAULT_CURRENCY,
    currentUserId: parsed.CURRENT_USER_ID,
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
  };
}
