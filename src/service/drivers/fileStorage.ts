import fs from 'fs';
import path from 'path';
import { getStorageConfigFromEnv, StorageConfig } from '../../config';
import { describeError, ErrorCodes, ExpenseTrackerError } from '../../utils/error';

export default class FileStorage {
  private static dataDir: string | null = null;

  private static getConfigFromEnv(): StorageConfig {
    const config = getStorageConfigFromEnv();

    if (!config) {
      throw new ExpenseTrackerError(
        'Não foi possível localizar o diretório de dados. Defina EXPENSES_DATA_DIR.',
        ErrorCodes.STORAGE_UNAVAILABLE,
        { component: 'FileStorage' }
      );
    }

    return config;
  }

  static connect(config?: StorageConfig): string {
    const { dataDir } = config ?? this.getConfigFromEnv();

    try {
      fs.mkdirSync(dataDir, { recursive: true });
    } catch (error) {
      throw new ExpenseTrackerError(
        `Não foi possível preparar o diretório de dados: ${dataDir}`,
        ErrorCodes.STORAGE_UNAVAILABLE,
        { component: 'FileStorage', dataDir, originalError: describeError(error) }
      );
    }

    this.dataDir = dataDir;
    return dataDir;
  }

  static isConnected(): boolean {
    return this.dataDir !== null;
  }

  static resolve(filename: string): string {
    if (this.dataDir === null) {
      throw new ExpenseTrackerError(
        'FileStorage is not connected. Call FileStorage.connect() first.',
        ErrorCodes.STORAGE_UNAVAILABLE,
        { component: 'FileStorage', filename }
      );
    }

    return path.join(this.dataDir, filename);
  }

  static exists(filename: string): boolean {
    return fs.existsSync(this.resolve(filename));
  }

  static readText(filename: string): string {
    return fs.readFileSync(this.resolve(filename), 'utf-8');
  }

  static writeText(filename: string, content: string): void {
    fs.writeFileSync(this.resolve(filename), content, 'utf-8');
  }

  static disconnect(): void {
    this.dataDir = null;
  }
}
