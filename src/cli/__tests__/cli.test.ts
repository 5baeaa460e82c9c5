import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseOptions } from '../args';
import {
  CommandContext,
  commandAdd,
  commandDelete,
  commandList,
  commandSave,
  resolveExpenseIds
} from '../commands';
import { formatDate, formatMoney, formatTags } from '../output';
import ExpenseService from '../../service/expense.service';
import { Expense } from '../../models/Expense.model';
import { ExpensePersistence } from '../../repository/repository';
import { ErrorCodes, isExpenseTrackerError } from '../../utils/error';

class MemoryPersistence implements ExpensePersistence {
  stored: Expense[] = [];

  writable = true;

  save(expenses: readonly Expense[]): boolean {
    if (!this.writable) return false;
    this.stored = [...expenses];
    return true;
  }

  load(): Expense[] {
    return [...this.stored];
  }
}

describe('parseOptions', () => {
  it('separates positional arguments, flags and valued options', () => {
    expect(parseOptions(['12,50', '--tag', 'a', '--tag', 'b, c', '--verbose', '--date', '2024-01-02'])).toEqual({
      positional: ['12,50'],
      options: { tag: 'b, c', verbose: true, date: '2024-01-02' },
      repeated: { tag: ['a', 'b, c'], date: ['2024-01-02'] }
    });
  });

  it('treats a trailing option as a flag', () => {
    expect(parseOptions(['--tag']).options).toEqual({ tag: true });
  });
});

describe('output formatting', () => {
  it('formats money with the configured locale', () => {
    expect(formatMoney(12.5, { locale: 'en-US', currency: 'USD' })).toBe('$12.50');
    expect(formatMoney(1234.5)).toContain('1.234,50');
  });

  it('omits the time for midnight dates', () => {
    expect(formatDate(new Date(2024, 2, 1))).toBe('2024-03-01');
    expect(formatDate(new Date(2024, 2, 1, 9, 5))).toBe('2024-03-01 09:05');
  });

  it('shows a dash when there are no tags', () => {
    expect(formatTags([])).toBe('-');
    expect(formatTags(['a', 'b, c'])).toBe('a · b, c');
  });
});

describe('commands', () => {
  let persistence: MemoryPersistence;
  let context: CommandContext;
  let log: ReturnType<typeof spyOnLog>;

  function spyOnLog() {
    return vi.spyOn(console, 'log').mockImplementation(() => undefined);
  }

  beforeEach(() => {
    persistence = new MemoryPersistence();
    context = {
      service: new ExpenseService(persistence),
      dataFile: () => '/tmp/expenses.csv'
    };
    log = spyOnLog();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('adds an expense from command-line arguments', async () => {
    const expense = await commandAdd(
      context,
      parseOptions(['42,90', '--tag', 'mercado', '--tag', 'rent, utilities', '--date', '2024-05-04'])
    );

    expect(expense.amount).toBe(42.9);
    expect(expense.tags).toEqual(['mercado', 'rent, utilities']);
    expect(formatDate(expense.date).startsWith('2024-05-04')).toBe(true);
    expect(persistence.stored).toEqual([expense]);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('Despesa registrada'));
  });

  it('drops tags named with --untag before saving', async () => {
    const expense = await commandAdd(
      context,
      parseOptions(['10', '--tag', 'mercado', '--tag', 'feira', '--untag', ' mercado ', '--untag', 'nenhuma'])
    );

    expect(expense.tags).toEqual(['feira']);
    expect(persistence.stored[0].tags).toEqual(['feira']);
  });

  it('confirms a manual save only when the write succeeded', async () => {
    await commandSave(context);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('Dados salvos em /tmp/expenses.csv'));

    log.mockClear();
    persistence.writable = false;
    await commandSave(context);
    expect(log).not.toHaveBeenCalled();
  });

  it('rejects add without an amount', async () => {
    await expect(commandAdd(context, parseOptions([]))).rejects.toThrow(
      'Uso: expenses add <valor> [--tag <tag>]... [--untag <tag>]... [--date <YYYY-MM-DD>]'
    );
  });

  it('lists expenses with their total', async () => {
    context.service.add({ amount: 10, tags: ['a'], date: new Date(2024, 0, 1) });
    context.service.add({ amount: 5, date: new Date(2024, 0, 2) });

    await commandList(context);

    const output = log.mock.calls.map((call) => String(call[0])).join('\n');
    expect(output).toContain('2024-01-02');
    expect(output).toContain('em 2 despesa(s)');
  });

  it('resolves list positions to ids in date order', () => {
    const older = context.service.add({ amount: 1, date: new Date(2024, 0, 1) });
    const newer = context.service.add({ amount: 1, date: new Date(2024, 0, 5) });

    expect(resolveExpenseIds(context.service, ['1', older.id])).toEqual([newer.id, older.id]);

    let caught: unknown;
    try {
      resolveExpenseIds(context.service, ['3']);
    } catch (error) {
      caught = error;
    }
    expect(isExpenseTrackerError(caught, ErrorCodes.EXPENSE_NOT_FOUND)).toBe(true);
  });

  it('deletes by list position', async () => {
    const keep = context.service.add({ amount: 1, date: new Date(2024, 0, 1) });
    context.service.add({ amount: 2, date: new Date(2024, 0, 5) });

    await commandDelete(context, parseOptions(['1']));

    expect(persistence.stored).toEqual([keep]);
  });
});
