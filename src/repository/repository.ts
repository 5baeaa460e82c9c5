import { Expense } from '../models/Expense.model';

/**
 * Contrato de persistência das despesas. Um backend novo só precisa
 * implementar estas duas operações; o codec CSV não muda.
 */
export interface ExpensePersistence {
  /**
   * Sobrescreve o conteúdo salvo. Falhas são registradas, nunca lançadas;
   * o retorno indica se a gravação aconteceu.
   */
  save(expenses: readonly Expense[]): boolean;
  /** Lista vazia quando não há nada salvo ou a leitura falha. */
  load(): Expense[];
}
