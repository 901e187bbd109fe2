import type { Pool, PoolClient } from "pg";
import type { CategoryTotal, Expense, NewExpense, PeriodSummary } from "./types.ts";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS expenses (
    id SERIAL PRIMARY KEY,
    user_id BIGINT NOT NULL,
    amount NUMERIC(12,2) NOT NULL,
    category TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

// node-postgres отдаёт NUMERIC и BIGINT строками
type ExpenseRow = {
  id: number | string;
  user_id: number | string;
  amount: number | string;
  category: string;
  created_at: Date | string;
};

type TotalRow = {
  category: string;
  total: number | string;
};

type GrandTotalRow = {
  grand_total: number | string;
};

export function toAmount(value: number | string): number {
  return Math.round(Number(value) * 100) / 100;
}

function toExpense(row: ExpenseRow): Expense {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    amount: toAmount(row.amount),
    category: row.category,
    createdAt: row.created_at instanceof Date ? row.created_at : new Date(row.created_at),
  };
}

export class LedgerStore {
  constructor(private readonly pool: Pool) {}

  // ==========================
  // SCHEMA
  // ==========================
  async init(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
    console.log("Схема БД готова");
  }

  // ==========================
  // RECORD
  // ==========================
  async record(expense: NewExpense): Promise<Expense> {
    const { userId, amount, category, createdAt } = expense;

    const result = createdAt
      ? await this.pool.query<ExpenseRow>(
          `INSERT INTO expenses (user_id, amount, category, created_at)
           VALUES ($1, $2, $3, $4)
           RETURNING id, user_id, amount, category, created_at`,
          [userId, amount, category, createdAt]
        )
      : await this.pool.query<ExpenseRow>(
          `INSERT INTO expenses (user_id, amount, category)
           VALUES ($1, $2, $3)
           RETURNING id, user_id, amount, category, created_at`,
          [userId, amount, category]
        );

    const [row] = result.rows;
    if (!row) throw new Error("INSERT не вернул строку");
    return toExpense(row);
  }

  // ==========================
  // AGGREGATE
  // ==========================
  async aggregate(userId: number, start: Date, end: Date): Promise<PeriodSummary> {
    const client: PoolClient = await this.pool.connect();
    try {
      const grouped = await client.query<TotalRow>(
        `SELECT category, SUM(amount) AS total
         FROM expenses
         WHERE user_id = $1 AND created_at >= $2 AND created_at <= $3
         GROUP BY category
         ORDER BY total DESC`,
        [userId, start, end]
      );

      const grand = await client.query<GrandTotalRow>(
        `SELECT COALESCE(SUM(amount), 0) AS grand_total
         FROM expenses
         WHERE user_id = $1 AND created_at >= $2 AND created_at <= $3`,
        [userId, start, end]
      );

      const rows: CategoryTotal[] = grouped.rows.map((r) => ({
        category: r.category,
        total: toAmount(r.total),
      }));
      const grandTotal = grand.rows[0] ? toAmount(grand.rows[0].grand_total) : 0;

      return { rows, grandTotal };
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
