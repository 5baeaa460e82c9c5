export enum ErrorCodes {
  // Entrada do usuário
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  EXPENSE_NOT_FOUND = 'EXPENSE_NOT_FOUND',

  // Armazenamento
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  FILE_OPERATION_FAILED = 'FILE_OPERATION_FAILED'
}

export interface ErrorMetadata {
  component: string;
  originalError?: string;
  [key: string]: unknown;
}

export class ExpenseTrackerError extends Error {
  code: ErrorCodes;
  metadata: ErrorMetadata;

  constructor(message: string, code: ErrorCodes, metadata: Partial<ErrorMetadata> = {}) {
    super(message);
    this.name = 'ExpenseTrackerError';
    this.code = code;
    this.metadata = {
      ...metadata,
      component: metadata.component || 'unknown'
    };
  }
}

export function isExpenseTrackerError(
  error: unknown,
  code?: ErrorCodes
): error is ExpenseTrackerError {
  return error instanceof ExpenseTrackerError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
