import chalk from 'chalk';
import Table from 'cli-table3';
import { format } from 'date-fns';
import { DisplayConfig, getDisplayConfigFromEnv } from '../config';
import { Expense } from '../models/Expense.model';

export function formatMoney(value: number, display: DisplayConfig = getDisplayConfigFromEnv()): string {
  return new Intl.NumberFormat(display.locale, {
    style: 'currency',
    currency: display.currency
  }).format(value);
}

function isMidnight(date: Date): boolean {
  return (
    date.getHours() === 0 &&
    date.getMinutes() === 0 &&
    date.getSeconds() === 0 &&
    date.getMilliseconds() === 0
  );
}

export function formatDate(date: Date): string {
  return format(date, isMidnight(date) ? 'yyyy-MM-dd' : 'yyyy-MM-dd HH:mm');
}

export function formatTags(tags: readonly string[]): string {
  return tags.length > 0 ? tags.join(' · ') : '-';
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.log(chalk.red(`❌ ${message}`));
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`ℹ️  ${message}`));
}

export function renderExpenseTable(expenses: readonly Expense[]): string {
  const table = new Table({
    head: [
      chalk.white('#'),
      chalk.white('ID'),
      chalk.white('Valor'),
      chalk.white('Tags'),
      chalk.white('Data')
    ],
    colWidths: [5, 38, 16, 28, 18],
    wordWrap: true
  });

  expenses.forEach((expense, index) => {
    table.push([
      String(index + 1),
      expense.id,
      formatMoney(expense.amount),
      formatTags(expense.tags),
      formatDate(expense.date)
    ]);
  });

  return table.toString();
}
