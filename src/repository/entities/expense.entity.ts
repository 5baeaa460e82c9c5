import { decodeExpenses, encodeExpenses } from '../../codec/csv.codec';
import { EXPENSES_FILENAME } from '../../config';
import { Expense } from '../../models/Expense.model';
import FileStorage from '../../service/drivers/fileStorage';
import { describeError, ErrorCodes } from '../../utils/error';
import { createLogger } from '../../utils/logger';
import { ExpensePersistence } from '../repository';

const logger = createLogger('LocalFileExpenseRepository');

export default class LocalFileExpenseRepository implements ExpensePersistence {
  constructor(private readonly filename: string = EXPENSES_FILENAME) {}

  get filePath(): string {
    return FileStorage.resolve(this.filename);
  }

  save(expenses: readonly Expense[]): boolean {
    const csv = encodeExpenses(expenses);

    try {
      FileStorage.writeText(this.filename, csv);
      logger.debug(`Expenses saved to local file: ${this.filename}`, {
        count: expenses.length
      });
      return true;
    } catch (error) {
      logger.error(`Failed to save expenses to local file: ${describeError(error)}`, {
        code: ErrorCodes.FILE_OPERATION_FAILED,
        filename: this.filename
      });
      return false;
    }
  }

  load(): Expense[] {
    try {
      if (!FileStorage.exists(this.filename)) {
        logger.info('No local CSV file found. Starting with empty data.', {
          filename: this.filename
        });
        return [];
      }

      return decodeExpenses(FileStorage.readText(this.filename));
    } catch (error) {
      logger.error(`Failed to load expenses from local file: ${describeError(error)}`, {
        code: ErrorCodes.FILE_OPERATION_FAILED,
        filename: this.filename
      });
      return [];
    }
  }
}
