import type { NewStatement, Statement } from '../../domain/entities/Statement.js';
import type { Transaction, TransactionPeriodFilter } from '../../domain/entities/Transaction.js';

export interface StatementTotal {
  statement: Statement;
  positiveTotal: number;
}

export interface TransactionMatchQuery {
  transactionDate: string;
  amount: number;
  amountSlack: number;
  // Omitted for a soft (date + amount) lookup.
  description?: string;
}

export interface StoragePort {
  /** Writes the statement and every transaction, or nothing. */
  createStatementWithTransactions(draft: NewStatement): Promise<Statement>;
  listStatements(): Promise<Statement[]>;
  loadTransactions(filter: TransactionPeriodFilter): Promise<Transaction[]>;
  /** Resolves false when no statement had that id. */
  deleteStatement(statementId: number): Promise<boolean>;
  listIssuers(): Promise<string[]>;
  listFingerprintSets(): Promise<Array<{ statement: Statement; fingerprints: string[] }>>;
  hasTransactionMatch(query: TransactionMatchQuery): Promise<boolean>;
  loadStatementTotals(period: string): Promise<StatementTotal[]>;
}
