import { Bot } from "grammy";
import {
  HELP_TEXT,
  START_TEXT,
  handleExpenseText,
  handleStats,
  type ExpenseLedger,
} from "./handlers.ts";

// ==========================
// BOT INIT
// ==========================
export function createBot(token: string, ledger: ExpenseLedger): Bot {
  const bot = new Bot(token);

  // ==========================
  // COMMANDS
  // ==========================
  bot.command("start", async (ctx) => {
    await ctx.reply(START_TEXT);
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(HELP_TEXT);
  });

  bot.command("stats", async (ctx) => {
    if (!ctx.from) return;
    // Параметр периода из команды: "/stats неделя"
    const periodArg = ctx.match.trim() || undefined;
    await ctx.reply(await handleStats(ledger, ctx.from.id, periodArg));
  });

  // ==========================
  // TEXT HANDLER
  // ==========================
  bot.on("message:text", async (ctx) => {
    if (!ctx.from) return;
    const isCommand = ctx.message.entities?.some(
      (e) => e.type === "bot_command" && e.offset === 0
    );
    if (isCommand) return;

    await ctx.reply(await handleExpenseText(ledger, ctx.from.id, ctx.message.text));
  });

  // ==========================
  // GLOBAL ERROR HANDLER
  // ==========================
  bot.catch((err) => console.error("⚠️ Bot error:", err));

  return bot;
}
