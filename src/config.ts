import { z } from "zod";

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, "Не указан TELEGRAM_BOT_TOKEN"),
  DATABASE_URL: z.string().trim().min(1, "Не указан DATABASE_URL (подключи PostgreSQL)"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  botToken: string;
  databaseUrl: string;
  poolMax: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse({
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN ?? "",
    DATABASE_URL: env.DATABASE_URL ?? "",
    DB_POOL_MAX: env.DB_POOL_MAX || undefined,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Некорректная конфигурация:\n${problems.join("\n")}`);
  }

  return {
    botToken: parsed.data.TELEGRAM_BOT_TOKEN,
    databaseUrl: parsed.data.DATABASE_URL,
    poolMax: parsed.data.DB_POOL_MAX,
  };
}
