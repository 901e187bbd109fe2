import "dotenv/config";
import pg from "pg";
import { createBot } from "./bot.ts";
import { loadConfig } from "./config.ts";
import { LedgerStore } from "./db.ts";

async function run(): Promise<void> {
  const config = loadConfig();

  const pool = new pg.Pool({ connectionString: config.databaseUrl, max: config.poolMax });
  pool.on("error", (err) => console.error("[DB ERROR] idle client", err));

  const ledger = new LedgerStore(pool);
  try {
    await ledger.init();
  } catch (err) {
    await ledger.close();
    throw err;
  }

  const bot = createBot(config.botToken, ledger);

  const stop = (signal: string) => {
    console.log(`Получен ${signal}, останавливаю бота`);
    bot.stop().catch((err) => console.error("⚠️ Ошибка остановки бота:", err));
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  try {
    await bot.start({
      onStart: () => console.log("🤖 Бот запущен (polling)"),
    });
  } finally {
    await ledger.close();
  }
}

run().catch((err) => {
  console.error("[FATAL]", err);
  process.exit(1);
});
