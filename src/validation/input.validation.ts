import { isValid, parseISO, set } from 'date-fns';
import { ExpenseDTO } from '../models/Expense.model';
import { ErrorCodes, ExpenseTrackerError } from '../utils/error';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function validationError(message: string, input?: unknown): ExpenseTrackerError {
  return new ExpenseTrackerError(message, ErrorCodes.VALIDATION_FAILED, {
    component: 'input.validation',
    input
  });
}

function validatePositiveNumber(value: number, message: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw validationError(message, value);
  }
}

export function parseAmountInput(text: string | undefined): number {
  const normalized = (text ?? '').trim().replace(',', '.');
  const value = normalized.length === 0 ? Number.NaN : Number(normalized);
  validatePositiveNumber(value, 'Informe um valor positivo válido.');
  return value;
}

/**
 * Acrescenta uma tag à lista em edição. A tag é aparada; vazia ou repetida
 * é rejeitada.
 */
export function addTag(current: readonly string[], raw: string): string[] {
  const tag = raw.trim();

  if (tag.length === 0) {
    throw validationError('Informe uma tag.', raw);
  }

  if (current.includes(tag)) {
    throw validationError('Essa tag já foi adicionada.', raw);
  }

  return [...current, tag];
}

export function removeTag(current: readonly string[], tag: string): string[] {
  return current.filter((item) => item !== tag);
}

export function buildTagList(rawTags: readonly string[]): string[] {
  return rawTags.reduce<string[]>((tags, raw) => addTag(tags, raw), []);
}

/**
 * Converte `YYYY-MM-DD` para uma data local, mantendo o horário de `now`
 * como faz um seletor de data sem hora.
 */
export function parseDateInput(text: string, now: Date = new Date()): Date {
  const trimmed = text.trim();
  const day = DAY_PATTERN.test(trimmed) ? parseISO(trimmed) : new Date(Number.NaN);

  if (!isValid(day)) {
    throw validationError('Data inválida. Use formato YYYY-MM-DD.', text);
  }

  return set(day, {
    hours: now.getHours(),
    minutes: now.getMinutes(),
    seconds: now.getSeconds(),
    milliseconds: now.getMilliseconds()
  });
}

export function validateExpenseInput(input: ExpenseDTO): void {
  validatePositiveNumber(input.amount, 'Informe um valor positivo válido.');

  if (input.tags !== undefined && !Array.isArray(input.tags)) {
    throw validationError('O campo tags deve ser um array', input.tags);
  }

  if (input.tags) {
    buildTagList(input.tags);
  }

  if (input.date !== undefined && !isValid(input.date)) {
    throw validationError('Data inválida.', input.date);
  }
}
