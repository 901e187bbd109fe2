import type { LedgerStore } from "./db.ts";
import { parseExpense } from "./parser.ts";
import { PERIOD_LABELS, resolvePeriod } from "./period.ts";

export type ExpenseLedger = Pick<LedgerStore, "record" | "aggregate">;

// ==========================
// STATIC TEXTS
// ==========================
export const START_TEXT =
  "Привет! Я трекер расходов 💸\n\n" +
  "Добавляй расходы сообщениями:\n" +
  "Например: 200 продукты\n" +
  "или: 15 кофе\n\n" +
  "Команды:\n" +
  "/stats — статистика за месяц\n" +
  "/stats день — за сегодня\n" +
  "/stats неделя — за неделю\n" +
  "/help — справка";

export const HELP_TEXT =
  "Формат добавления: '<сумма> <категория>'\n" +
  "Примеры:\n" +
  "— 200 продукты\n" +
  "— 50 транспорт\n\n" +
  "Команды:\n" +
  "/stats [день|неделя] — показать статистику\n" +
  "/start — начать";

export const FORMAT_HINT = "Формат: '<сумма> <категория>'. Например: 150 кофе";

export const FAILURE_TEXT = "⚠️ Не удалось обработать запрос. Попробуйте позже.";

export function formatMoney(value: number): string {
  return value.toFixed(2);
}

// ==========================
// ADD EXPENSE
// ==========================
export async function handleExpenseText(
  ledger: ExpenseLedger,
  userId: number,
  text: string
): Promise<string> {
  const parsed = parseExpense(text);
  if (!parsed) return FORMAT_HINT;

  try {
    const expense = await ledger.record({ userId, ...parsed });
    return `Добавлено: ${formatMoney(expense.amount)} — ${expense.category}`;
  } catch (err) {
    console.error("[DB ERROR] record", err);
    return FAILURE_TEXT;
  }
}

// ==========================
// STATS
// ==========================
export async function handleStats(
  ledger: ExpenseLedger,
  userId: number,
  periodArg: string | undefined,
  now: Date = new Date()
): Promise<string> {
  const { kind, start, end } = resolvePeriod(periodArg, now);
  const label = PERIOD_LABELS[kind];

  try {
    const { rows, grandTotal } = await ledger.aggregate(userId, start, end);
    if (!rows.length) return `За период «${label}» расходов нет.`;

    const lines = [`📊 Статистика за ${label}:`];
    for (const r of rows) {
      lines.push(`- ${r.category}: ${formatMoney(r.total)} руб.`);
    }
    lines.push(`\nИтого: ${formatMoney(grandTotal)} руб.`);
    return lines.join("\n");
  } catch (err) {
    console.error("[DB ERROR] aggregate", err);
    return FAILURE_TEXT;
  }
}
