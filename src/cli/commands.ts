import chalk from 'chalk';
import { Expense } from '../models/Expense.model';
import ExpenseService from '../service/expense.service';
import { ErrorCodes, ExpenseTrackerError } from '../utils/error';
import {
  buildTagList,
  parseAmountInput,
  parseDateInput,
  removeTag
} from '../validation/input.validation';
import { ParsedArgs } from './args';
import { formatMoney, printInfo, printSuccess, renderExpenseTable } from './output';

export type CommandContext = {
  service: ExpenseService;
  dataFile: () => string;
};

export async function commandHelp(): Promise<void> {
  console.log(chalk.bold('\nDESPESAS CLI'));
  console.log('Uso: expenses <comando> [argumentos] [--opcoes]\n');
  console.log('Comandos:');
  console.log('  expenses add <valor> [--tag <tag>]... [--untag <tag>]... [--date <YYYY-MM-DD>]');
  console.log('  expenses list');
  console.log('  expenses delete <posicao-ou-id>...');
  console.log('  expenses save');
  console.log('  expenses where');
  console.log('\nExemplo:');
  console.log('  expenses add 42,90 --tag mercado --tag "aluguel, contas"');
  console.log('  expenses delete 1');
}

export async function commandAdd(context: CommandContext, args: ParsedArgs): Promise<Expense> {
  const valueText = args.positional[0];

  if (!valueText) {
    throw new ExpenseTrackerError(
      'Uso: expenses add <valor> [--tag <tag>]... [--untag <tag>]... [--date <YYYY-MM-DD>]',
      ErrorCodes.VALIDATION_FAILED,
      { component: 'cli' }
    );
  }

  const amount = parseAmountInput(valueText);
  // `--untag` remove uma tag já informada com `--tag`.
  const tags = (args.repeated.untag ?? []).reduce(
    (current, tag) => removeTag(current, tag.trim()),
    buildTagList(args.repeated.tag ?? [])
  );
  const date = typeof args.options.date === 'string' ? parseDateInput(args.options.date) : undefined;

  const expense = context.service.add({ amount, tags, date });
  printSuccess(`Despesa registrada: ${formatMoney(expense.amount)}`);
  return expense;
}

export async function commandList(context: CommandContext): Promise<void> {
  const expenses = context.service.listByDateDesc();

  if (expenses.length === 0) {
    printInfo('Nenhuma despesa registrada.');
    return;
  }

  console.log(renderExpenseTable(expenses));
  console.log(
    chalk.white(`Total: ${formatMoney(context.service.total())} em ${expenses.length} despesa(s)`)
  );
}

/**
 * Aceita a posição exibida em `list` (1, 2, ...) ou o id da despesa.
 */
export function resolveExpenseIds(service: ExpenseService, identifiers: string[]): string[] {
  const displayed = service.listByDateDesc();

  return identifiers.map((identifier) => {
    if (!/^\d+$/.test(identifier)) return identifier;

    const expense = displayed[Number(identifier) - 1];
    if (!expense) {
      throw new ExpenseTrackerError(
        `Posição inválida: ${identifier}. Use: expenses list`,
        ErrorCodes.EXPENSE_NOT_FOUND,
        { component: 'cli', identifier }
      );
    }
    return expense.id;
  });
}

export async function commandDelete(context: CommandContext, args: ParsedArgs): Promise<Expense[]> {
  if (args.positional.length === 0) {
    throw new ExpenseTrackerError(
      'Uso: expenses delete <posicao-ou-id>...',
      ErrorCodes.VALIDATION_FAILED,
      { component: 'cli' }
    );
  }

  const ids = resolveExpenseIds(context.service, args.positional);
  const removed = context.service.delete(ids);
  printSuccess(`${removed.length} despesa(s) removida(s)`);
  return removed;
}

export async function commandSave(context: CommandContext): Promise<void> {
  if (context.service.save()) {
    printSuccess(`Dados salvos em ${context.dataFile()}`);
  }
}

export async function commandWhere(context: CommandContext): Promise<void> {
  printInfo(context.dataFile());
}
