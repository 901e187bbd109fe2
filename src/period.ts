import type { Period, PeriodKind } from "./types.ts";

const DAY_ALIASES = ["day", "today", "день", "сегодня"];
const WEEK_ALIASES = ["week", "неделя"];

export const PERIOD_LABELS: Record<PeriodKind, string> = {
  day: "сегодня",
  week: "неделя",
  month: "месяц",
};

export function periodKind(keyword?: string | null): PeriodKind {
  const normalized = (keyword ?? "").trim().toLowerCase();
  if (DAY_ALIASES.includes(normalized)) return "day";
  if (WEEK_ALIASES.includes(normalized)) return "week";
  return "month";
}

// [начало периода, now] в UTC; неизвестный период — текущий месяц
export function resolvePeriod(keyword?: string | null, now: Date = new Date()): Period {
  const kind = periodKind(keyword);
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  const date = now.getUTCDate();

  let start: Date;
  if (kind === "day") {
    start = new Date(Date.UTC(year, month, date));
  } else if (kind === "week") {
    // ISO неделя: понедельник = 0
    const weekday = (now.getUTCDay() + 6) % 7;
    start = new Date(Date.UTC(year, month, date - weekday));
  } else {
    start = new Date(Date.UTC(year, month, 1));
  }

  return { kind, start, end: new Date(now.getTime()) };
}
