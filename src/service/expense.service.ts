import { randomUUID } from 'crypto';
import { Expense, ExpenseDTO } from '../models/Expense.model';
import { ExpensePersistence } from '../repository/repository';
import { ErrorCodes, ExpenseTrackerError } from '../utils/error';
import { buildTagList, validateExpenseInput } from '../validation/input.validation';

export default class ExpenseService {
  private expenses: Expense[] = [];

  constructor(
    private readonly persistence: ExpensePersistence,
    private readonly now: () => Date = () => new Date()
  ) {}

  public load(): Expense[] {
    this.expenses = this.persistence.load();
    return this.list();
  }

  public list(): Expense[] {
    return [...this.expenses];
  }

  public listByDateDesc(): Expense[] {
    return [...this.expenses].sort((a, b) => b.date.getTime() - a.date.getTime());
  }

  public findById(id: string): Expense | undefined {
    const normalized = id.trim().toLowerCase();
    return this.expenses.find((expense) => expense.id === normalized);
  }

  public total(): number {
    return this.expenses.reduce((sum, expense) => sum + expense.amount, 0);
  }

  public add(input: ExpenseDTO): Expense {
    validateExpenseInput(input);

    const expense: Expense = {
      id: randomUUID(),
      amount: input.amount,
      tags: buildTagList(input.tags ?? []),
      date: input.date ?? this.now()
    };

    this.expenses = [expense, ...this.expenses];
    this.save();
    return expense;
  }

  public delete(ids: readonly string[]): Expense[] {
    const targets = ids.map((id) => {
      const expense = this.findById(id);
      if (!expense) {
        throw new ExpenseTrackerError(
          `Despesa não encontrada: ${id}`,
          ErrorCodes.EXPENSE_NOT_FOUND,
          { component: 'ExpenseService', id }
        );
      }
      return expense;
    });

    const removed = new Set(targets.map((expense) => expense.id));
    this.expenses = this.expenses.filter((expense) => !removed.has(expense.id));
    this.save();
    return dedupe(targets);
  }

  public save(): boolean {
    return this.persistence.save(this.expenses);
  }
}

function dedupe(expenses: Expense[]): Expense[] {
  return expenses.filter((expense, index) => expenses.indexOf(expense) === index);
}
