import Database from 'better-sqlite3';
import dayjs from 'dayjs';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { NewStatement, Statement } from '../../../domain/entities/Statement.js';
import type { Transaction, TransactionPeriodFilter } from '../../../domain/entities/Transaction.js';
import { derivePeriod, filterByPeriod } from '../../../domain/services/BillingPeriod.js';
import { joinFingerprints, splitFingerprints } from '../../../domain/services/FileFingerprint.js';
import type { StatementTotal, StoragePort, TransactionMatchQuery } from '../../../application/ports/StoragePort.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS statements (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    filenames         TEXT,
    issuer            TEXT,
    period            TEXT,
    imported_at       TEXT,
    transaction_count INTEGER,
    cutoff_day        INTEGER,
    fingerprints      TEXT
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    statement_id     INTEGER NOT NULL REFERENCES statements(id) ON DELETE CASCADE,
    transaction_date TEXT NOT NULL CHECK (transaction_date = '' OR length(transaction_date) = 10),
    posting_date     TEXT,
    description      TEXT,
    amount           REAL NOT NULL,
    category         TEXT,
    subcategory      TEXT,
    issuer           TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions (transaction_date);
  CREATE INDEX IF NOT EXISTS idx_statements_period ON statements (period);
`;

// Columns added after the first release; older database files get them on open.
const LATE_COLUMNS: Array<{ table: string; column: string; type: string }> = [
  { table: 'statements', column: 'cutoff_day', type: 'INTEGER' },
  { table: 'statements', column: 'fingerprints', type: 'TEXT' },
  { table: 'transactions', column: 'subcategory', type: 'TEXT' },
];

const StatementRowSchema = z.object({
  id: z.number().int(),
  filenames: z.string().nullable(),
  issuer: z.string().nullable(),
  period: z.string(),
  imported_at: z.string(),
  transaction_count: z.number().int().nullable(),
  cutoff_day: z.number().int().nullable(),
  fingerprints: z.string().nullable(),
});

const StatementTotalRowSchema = StatementRowSchema.extend({
  positive_total: z.number(),
});

const TransactionRowSchema = z.object({
  id: z.number().int(),
  statement_id: z.number().int(),
  transaction_date: z.string(),
  posting_date: z.string().nullable(),
  description: z.string().nullable(),
  amount: z.number(),
  category: z.string().nullable(),
  subcategory: z.string().nullable(),
  issuer: z.string().nullable(),
});

const FilenameListSchema = z.array(z.string());

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

// Filenames are a JSON array; rows from older databases hold a ", "-joined list.
const parseFilenames = (stored: string | null): string[] => {
  if (!stored) {
    return [];
  }

  const asJson = FilenameListSchema.safeParse(parseJson(stored));
  if (asJson.success) {
    return asJson.data;
  }

  return stored.split(', ').filter((name) => name.length > 0);
};

const toStatement = (row: z.infer<typeof StatementRowSchema>): Statement => ({
  id: row.id,
  filenames: parseFilenames(row.filenames),
  issuer: row.issuer ?? '',
  period: row.period,
  importedAt: row.imported_at,
  transactionCount: row.transaction_count ?? 0,
  cutoffDay: row.cutoff_day,
  fingerprints: splitFingerprints(row.fingerprints),
});

const toTransaction = (row: z.infer<typeof TransactionRowSchema>): Transaction => ({
  id: row.id,
  statementId: row.statement_id,
  transactionDate: row.transaction_date,
  postingDate: row.posting_date ?? '',
  description: row.description ?? '',
  amount: row.amount,
  category: row.category ?? 'Other',
  subcategory: row.subcategory,
  issuer: row.issuer ?? '',
});

/**
 * Rows that fail validation are logged and left out, so a damaged record reads
 * as "no match" instead of failing the whole import.
 */
const parseRows = <S extends z.ZodTypeAny>(schema: S, rows: unknown[], label: string): Array<z.infer<S>> => {
  const parsed: Array<z.infer<S>> = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      console.warn(`⚠️ Skipping malformed ${label} row:`, result.error.issues.map((issue) => issue.message).join('; '));
    }
  }
  return parsed;
};

export class SqliteStorageAdapter implements StoragePort {
  private readonly db: Database.Database;

  constructor(
    filename: string,
    private readonly clock: () => dayjs.Dayjs = () => dayjs(),
  ) {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }

    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  async createStatementWithTransactions(draft: NewStatement): Promise<Statement> {
    const now = this.clock();
    const importedAt = now.toISOString();
    const period = derivePeriod(draft.transactions, now);

    const insertStatement = this.db.prepare(
      `INSERT INTO statements (filenames, issuer, period, imported_at, transaction_count, cutoff_day, fingerprints)
       VALUES (@filenames, @issuer, @period, @importedAt, @transactionCount, @cutoffDay, @fingerprints)`,
    );
    const insertTransaction = this.db.prepare(
      `INSERT INTO transactions
         (statement_id, transaction_date, posting_date, description, amount, category, subcategory, issuer)
       VALUES (@statementId, @transactionDate, @postingDate, @description, @amount, @category, @subcategory, @issuer)`,
    );

    const write = this.db.transaction((): number => {
      const result = insertStatement.run({
        filenames: JSON.stringify(draft.filenames),
        issuer: draft.issuer,
        period,
        importedAt,
        transactionCount: draft.transactions.length,
        cutoffDay: draft.cutoffDay,
        fingerprints: joinFingerprints(draft.fingerprints),
      });
      const statementId = Number(result.lastInsertRowid);

      for (const txn of draft.transactions) {
        insertTransaction.run({
          statementId,
          transactionDate: txn.transactionDate,
          postingDate: txn.postingDate,
          description: txn.description,
          amount: txn.amount,
          category: txn.category,
          subcategory: txn.subcategory,
          issuer: draft.issuer,
        });
      }

      return statementId;
    });

    const id = write();

    return {
      id,
      filenames: [...draft.filenames],
      issuer: draft.issuer,
      period,
      importedAt,
      transactionCount: draft.transactions.length,
      cutoffDay: draft.cutoffDay,
      fingerprints: [...draft.fingerprints],
    };
  }

  async listStatements(): Promise<Statement[]> {
    const rows = this.db.prepare('SELECT * FROM statements ORDER BY imported_at DESC, id DESC').all();
    return parseRows(StatementRowSchema, rows, 'statement').map(toStatement);
  }

  async loadTransactions(filter: TransactionPeriodFilter): Promise<Transaction[]> {
    const rows = this.db.prepare('SELECT * FROM transactions ORDER BY transaction_date DESC, id ASC').all();
    return filterByPeriod(parseRows(TransactionRowSchema, rows, 'transaction').map(toTransaction), filter, this.clock());
  }

  async deleteStatement(statementId: number): Promise<boolean> {
    const remove = this.db.transaction((id: number) => {
      const removed = this.db.prepare('DELETE FROM transactions WHERE statement_id = ?').run(id).changes;
      const deleted = this.db.prepare('DELETE FROM statements WHERE id = ?').run(id).changes;
      return { removed, deleted };
    });

    const { removed, deleted } = remove(statementId);
    if (deleted > 0) {
      console.log(`🗑️ Deleted statement ${statementId} and ${removed} transactions`);
    }
    return deleted > 0;
  }

  async listIssuers(): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT TRIM(issuer) AS issuer, MAX(imported_at) AS last_import
         FROM statements
         WHERE issuer IS NOT NULL AND TRIM(issuer) != ''
         GROUP BY TRIM(issuer)
         ORDER BY last_import DESC`,
      )
      .all();
    return parseRows(z.object({ issuer: z.string() }), rows, 'issuer').map((row) => row.issuer);
  }

  async listFingerprintSets(): Promise<Array<{ statement: Statement; fingerprints: string[] }>> {
    const rows = this.db
      .prepare('SELECT * FROM statements WHERE fingerprints IS NOT NULL ORDER BY imported_at DESC, id DESC')
      .all();
    return parseRows(StatementRowSchema, rows, 'statement')
      .map(toStatement)
      .map((statement) => ({ statement, fingerprints: statement.fingerprints }));
  }

  async hasTransactionMatch(query: TransactionMatchQuery): Promise<boolean> {
    const row =
      query.description === undefined
        ? this.db
            .prepare('SELECT 1 FROM transactions WHERE transaction_date = ? AND ABS(amount - ?) < ? LIMIT 1')
            .get(query.transactionDate, query.amount, query.amountSlack)
        : this.db
            .prepare(
              `SELECT 1 FROM transactions
               WHERE transaction_date = ? AND description = ? AND ABS(amount - ?) < ?
               LIMIT 1`,
            )
            .get(query.transactionDate, query.description, query.amount, query.amountSlack);

    return row !== undefined;
  }

  async loadStatementTotals(period: string): Promise<StatementTotal[]> {
    const rows = this.db
      .prepare(
        `SELECT s.*, COALESCE(SUM(CASE WHEN t.amount > 0 THEN t.amount ELSE 0 END), 0) AS positive_total
         FROM statements s
         LEFT JOIN transactions t ON t.statement_id = s.id
         WHERE s.period = ?
         GROUP BY s.id
         ORDER BY s.id`,
      )
      .all(period);

    return parseRows(StatementTotalRowSchema, rows, 'statement total').map((row) => ({
      statement: toStatement(row),
      positiveTotal: row.positive_total,
    }));
  }

  private migrate(): void {
    for (const { table, column, type } of LATE_COLUMNS) {
      const columns = parseRows(z.object({ name: z.string() }), this.db.prepare(`PRAGMA table_info(${table})`).all(), 'column');
      if (!columns.some((entry) => entry.name === column)) {
        this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`);
      }
    }
  }
}
