export interface Expense {
  id: number;               // id записи
  userId: number;           // telegram id пользователя
  amount: number;           // сумма, два знака после запятой
  category: string;         // категория в нижнем регистре
  createdAt: Date;
}

export interface NewExpense {
  userId: number;
  amount: number;
  category: string;
  createdAt?: Date;         // по умолчанию — время вставки
}

export interface ParsedExpense {
  amount: number;
  category: string;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface PeriodSummary {
  rows: CategoryTotal[];    // по убыванию суммы
  grandTotal: number;       // 0, если расходов нет
}

export type PeriodKind = "day" | "week" | "month";

export interface Period {
  kind: PeriodKind;
  start: Date;
  end: Date;
}
