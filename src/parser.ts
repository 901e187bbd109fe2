import type { ParsedExpense } from "./types.ts";

export const DEFAULT_CATEGORY = "прочее";

// NUMERIC(12,2): не больше десяти цифр до запятой
const MAX_AMOUNT = 1e10;

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

// "<сумма> <категория> <остаток строки>"
const EXPENSE_RE = /^(\S+)(?:\s+(\S+)(?:\s+([\s\S]+))?)?$/;

export function parseAmount(raw: string): number | null {
  const normalized = raw.replace(",", ".");
  if (!DECIMAL_RE.test(normalized)) return null;

  const amount = Number(normalized);
  if (!Number.isFinite(amount)) return null;
  // проверяем уже округлённое до копеек значение
  if (Math.abs(Math.round(amount * 100)) >= MAX_AMOUNT * 100) return null;
  return amount;
}

// "200 продукты", "15 кофе late"; null — пустая строка или первым идёт не число
export function parseExpense(text: string): ParsedExpense | null {
  const match = EXPENSE_RE.exec(text.trim());
  if (!match) return null;

  const [, amountPart, head, tail] = match;
  const amount = parseAmount(amountPart);
  if (amount === null) return null;

  let category = head ?? DEFAULT_CATEGORY;
  // Третий кусок — часть категории (например: "еда кафе")
  if (tail !== undefined) category = `${category} ${tail}`;

  return { amount, category: category.toLowerCase() };
}
