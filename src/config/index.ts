import os from 'os';
import path from 'path';

export const EXPENSES_FILENAME = 'expenses.csv';
export const DEFAULT_DATA_DIRNAME = '.expense-tracker';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type StorageConfig = {
  dataDir: string;
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLogLevelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'warn';
}

/**
 * Diretório de dados da aplicação. `EXPENSES_DATA_DIR` tem prioridade;
 * sem ele usamos `~/.expense-tracker`. Retorna `null` quando nenhum dos
 * dois pode ser determinado.
 */
export function getStorageConfigFromEnv(): StorageConfig | null {
  const fromEnv = process.env.EXPENSES_DATA_DIR?.trim();
  if (fromEnv) {
    return { dataDir: path.resolve(fromEnv) };
  }

  let home: string;
  try {
    home = os.homedir();
  } catch {
    return null;
  }

  return home ? { dataDir: path.join(home, DEFAULT_DATA_DIRNAME) } : null;
}

export type DisplayConfig = {
  locale: string;
  currency: string;
};

export function getDisplayConfigFromEnv(): DisplayConfig {
  return {
    locale: process.env.EXPENSES_LOCALE?.trim() || 'pt-BR',
    currency: process.env.EXPENSES_CURRENCY?.trim().toUpperCase() || 'BRL'
  };
}
