import Papa from 'papaparse';
import { isValid, parseISO } from 'date-fns';
import { validate as isUuid } from 'uuid';
import { Expense } from '../models/Expense.model';
import { createLogger } from '../utils/logger';

export const CSV_HEADER = ['ID', 'Amount', 'Tags', 'Date'] as const;
export const TAG_DELIMITER = ';;';

const FIELD_DELIMITER = ',';
const LINE_BREAK = '\n';

const logger = createLogger('csv.codec');

function needsFieldQuotes(value: unknown): boolean {
  return typeof value === 'string' && /[",\r\n]/.test(value);
}

// Um `;` solto dentro da tag poderia formar o delimitador `;;` com o vizinho.
function needsTagQuotes(value: unknown): boolean {
  return needsFieldQuotes(value) || (typeof value === 'string' && value.includes(';'));
}

export function encodeTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';

  return Papa.unparse([[...tags]], {
    delimiter: TAG_DELIMITER,
    newline: LINE_BREAK,
    quotes: needsTagQuotes
  });
}

export function decodeTags(field: string): string[] {
  if (field.length === 0) return [];

  const result = Papa.parse<string[]>(field, { delimiter: TAG_DELIMITER });
  return result.data.flat().filter((tag) => tag.length > 0);
}

function toRow(expense: Expense): string[] {
  return [
    expense.id,
    String(expense.amount),
    encodeTags(expense.tags),
    expense.date.toISOString()
  ];
}

/**
 * Serializa as despesas no formato do `expenses.csv`: cabeçalho fixo e uma
 * linha por despesa, sem quebra de linha no final.
 */
export function encodeExpenses(expenses: readonly Expense[]): string {
  const header = CSV_HEADER.join(FIELD_DELIMITER);
  if (expenses.length === 0) return header;

  const body = Papa.unparse(expenses.map(toRow), {
    delimiter: FIELD_DELIMITER,
    newline: LINE_BREAK,
    quotes: needsFieldQuotes
  });

  return `${header}${LINE_BREAK}${body}`;
}

function parseAmount(field: string): number | null {
  const trimmed = field.trim();
  if (trimmed.length === 0) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

const TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})$/;

// Só datas com fuso explícito: sem ele o mesmo arquivo daria instantes
// diferentes em cada máquina.
function parseTimestamp(field: string): Date {
  const trimmed = field.trim();
  return TIMESTAMP_PATTERN.test(trimmed) ? parseISO(trimmed) : new Date(Number.NaN);
}

function parseRow(fields: string[], line: number): Expense | null {
  if (fields.length < CSV_HEADER.length) {
    logger.warn('Skipping malformed CSV line (incorrect field count)', {
      line,
      fields: fields.length
    });
    return null;
  }

  const [rawId, rawAmount, rawTags, rawDate] = fields;
  const id = rawId.trim();
  const amount = parseAmount(rawAmount);
  const date = parseTimestamp(rawDate);

  if (!isUuid(id) || amount === null || !isValid(date)) {
    logger.warn('Failed to parse expense from CSV line', { line, id: rawId });
    return null;
  }

  return {
    id: id.toLowerCase(),
    amount,
    tags: decodeTags(rawTags),
    date
  };
}

type PhysicalLine = {
  text: string;
  separator: string;
};

function splitLines(text: string): PhysicalLine[] {
  const parts = text.split(/(\r\n|\n|\r)/);
  const lines: PhysicalLine[] = [];

  for (let index = 0; index < parts.length; index += 2) {
    lines.push({ text: parts[index], separator: parts[index + 1] ?? '' });
  }

  return lines;
}

function countQuotes(text: string): number {
  return text.split('"').length - 1;
}

type RecordRead = {
  fields: string[] | null;
  consumed: number;
};

// Um registro só continua na linha seguinte enquanto houver aspas abertas.
// Se o trecho reunido não formar exatamente uma linha CSV válida, apenas a
// primeira linha física é descartada e a leitura recomeça na próxima.
function readRecord(lines: PhysicalLine[], start: number): RecordRead {
  let end = start;
  let quotes = countQuotes(lines[start].text);

  while (quotes % 2 === 1 && end + 1 < lines.length) {
    end += 1;
    quotes += countQuotes(lines[end].text);
  }

  const raw = lines
    .slice(start, end + 1)
    .map((line, index, all) => (index < all.length - 1 ? line.text + line.separator : line.text))
    .join('');
  const result = Papa.parse<string[]>(raw, { delimiter: FIELD_DELIMITER });

  if (result.errors.length === 0 && result.data.length === 1) {
    return { fields: result.data[0], consumed: end - start + 1 };
  }

  logger.warn('Skipping malformed CSV line (unbalanced quotes)', {
    line: start + 1,
    errors: result.errors.map((error) => error.code)
  });
  return { fields: null, consumed: 1 };
}

/**
 * Lê o conteúdo do `expenses.csv`. A primeira linha é o cabeçalho; linhas
 * malformadas são descartadas individualmente e nunca abortam a leitura.
 */
export function decodeExpenses(text: string): Expense[] {
  const lines = splitLines(text);
  const expenses: Expense[] = [];
  let headerSeen = false;
  let index = 0;

  while (index < lines.length) {
    if (lines[index].text.length === 0) {
      index += 1;
      continue;
    }

    const { fields, consumed } = readRecord(lines, index);

    if (!headerSeen) {
      headerSeen = true;
    } else if (fields) {
      const expense = parseRow(fields, index + 1);
      if (expense) {
        expenses.push(expense);
      }
    }

    index += consumed;
  }

  return expenses;
}
