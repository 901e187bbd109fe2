import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.ts";

describe("loadConfig", () => {
  it("reads required values and the default pool size", () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: "test-token",
      DATABASE_URL: "postgres://localhost/test",
    });

    expect(config).toEqual({
      botToken: "test-token",
      databaseUrl: "postgres://localhost/test",
      poolMax: 10,
    });
  });

  it("parses DB_POOL_MAX", () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: "test-token",
      DATABASE_URL: "postgres://localhost/test",
      DB_POOL_MAX: "3",
    });
    expect(config.poolMax).toBe(3);
  });

  it("fails without a bot token", () => {
    expect(() => loadConfig({ DATABASE_URL: "postgres://localhost/test" })).toThrow(
      /Не указан TELEGRAM_BOT_TOKEN/
    );
  });

  it("fails on a blank database url", () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token", DATABASE_URL: "  " })).toThrow(
      /Не указан DATABASE_URL/
    );
  });

  it("rejects a non-numeric pool size", () => {
    expect(() =>
      loadConfig({
        TELEGRAM_BOT_TOKEN: "test-token",
        DATABASE_URL: "postgres://localhost/test",
        DB_POOL_MAX: "many",
      })
    ).toThrow(/DB_POOL_MAX/);
  });
});
