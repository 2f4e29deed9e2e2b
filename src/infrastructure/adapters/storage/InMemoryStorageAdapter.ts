import dayjs from 'dayjs';
import type { NewStatement, Statement } from '../../../domain/entities/Statement.js';
import { type Transaction, type TransactionPeriodFilter, isStorableDate } from '../../../domain/entities/Transaction.js';
import { derivePeriod, filterByPeriod } from '../../../domain/services/BillingPeriod.js';
import type { StatementTotal, StoragePort, TransactionMatchQuery } from '../../../application/ports/StoragePort.js';

const newestFirst = (a: Statement, b: Statement) =>
  b.importedAt.localeCompare(a.importedAt) || b.id - a.id;

export class InMemoryStorageAdapter implements StoragePort {
  private readonly statements = new Map<number, Statement>();
  private readonly transactions = new Map<number, Transaction>();
  private nextStatementId = 1;
  private nextTransactionId = 1;

  constructor(private readonly clock: () => dayjs.Dayjs = () => dayjs()) {}

  async createStatementWithTransactions(draft: NewStatement): Promise<Statement> {
    // Everything is checked before the first write so a bad row leaves no trace.
    draft.transactions.forEach((txn, index) => {
      if (!Number.isFinite(txn.amount)) {
        throw new Error(`Transaction ${index} has a non-numeric amount`);
      }
      if (!isStorableDate(txn.transactionDate)) {
        throw new Error(`Transaction ${index} has a malformed date "${txn.transactionDate}"`);
      }
    });

    const now = this.clock();
    const statement: Statement = {
      id: this.nextStatementId,
      filenames: [...draft.filenames],
      issuer: draft.issuer,
      period: derivePeriod(draft.transactions, now),
      importedAt: now.toISOString(),
      transactionCount: draft.transactions.length,
      cutoffDay: draft.cutoffDay,
      fingerprints: [...draft.fingerprints],
    };

    const rows: Transaction[] = draft.transactions.map((txn, index) => ({
      ...txn,
      id: this.nextTransactionId + index,
      statementId: statement.id,
      issuer: draft.issuer,
    }));

    this.nextStatementId += 1;
    this.nextTransactionId += rows.length;
    this.statements.set(statement.id, statement);
    for (const row of rows) {
      this.transactions.set(row.id, row);
    }

    return statement;
  }

  async listStatements(): Promise<Statement[]> {
    return Array.from(this.statements.values()).sort(newestFirst);
  }

  async loadTransactions(filter: TransactionPeriodFilter): Promise<Transaction[]> {
    const all = Array.from(this.transactions.values()).sort((a, b) =>
      b.transactionDate.localeCompare(a.transactionDate),
    );
    return filterByPeriod(all, filter, this.clock());
  }

  async deleteStatement(statementId: number): Promise<boolean> {
    if (!this.statements.delete(statementId)) {
      return false;
    }

    let removed = 0;
    for (const [id, txn] of this.transactions.entries()) {
      if (txn.statementId === statementId) {
        this.transactions.delete(id);
        removed += 1;
      }
    }

    console.log(`🗑️ Deleted statement ${statementId} and ${removed} transactions`);
    return true;
  }

  async listIssuers(): Promise<string[]> {
    const issuers = new Set<string>();
    for (const statement of await this.listStatements()) {
      const issuer = statement.issuer.trim();
      if (issuer) {
        issuers.add(issuer);
      }
    }
    return Array.from(issuers);
  }

  async listFingerprintSets(): Promise<Array<{ statement: Statement; fingerprints: string[] }>> {
    return (await this.listStatements())
      .filter((statement) => statement.fingerprints.length > 0)
      .map((statement) => ({ statement, fingerprints: statement.fingerprints }));
  }

  async hasTransactionMatch(query: TransactionMatchQuery): Promise<boolean> {
    for (const txn of this.transactions.values()) {
      if (
        txn.transactionDate === query.transactionDate &&
        Math.abs(txn.amount - query.amount) < query.amountSlack &&
        (query.description === undefined || txn.description === query.description)
      ) {
        return true;
      }
    }
    return false;
  }

  async loadStatementTotals(period: string): Promise<StatementTotal[]> {
    const totals: StatementTotal[] = [];
    for (const statement of this.statements.values()) {
      if (statement.period !== period) {
        continue;
      }

      let positiveTotal = 0;
      for (const txn of this.transactions.values()) {
        if (txn.statementId === statement.id && txn.amount > 0) {
          positiveTotal += txn.amount;
        }
      }
      totals.push({ statement, positiveTotal });
    }
    return totals;
  }
}
