export interface Expense {
  readonly id: string;
  amount: number;
  tags: string[];
  date: Date;
}

export interface ExpenseDTO {
  amount: number;
  tags?: string[];
  date?: Date;
}
