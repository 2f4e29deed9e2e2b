import { describe, expect, it } from 'vitest';
import type { ImportAttempt } from '../../src/application/dto/ReconciliationDTO.js';
import { CommitFailureError, EmptyBatchError } from '../../src/application/errors/ReconciliationErrors.js';
import { ExtractionService } from '../../src/application/services/ExtractionService.js';
import { FingerprintIndex } from '../../src/application/services/FingerprintIndex.js';
import { ReconciliationService } from '../../src/application/services/ReconciliationService.js';
import { StatementMatcher } from '../../src/application/services/StatementMatcher.js';
import { TransactionOverlapDetector } from '../../src/application/services/TransactionOverlapDetector.js';
import type { NewStatement, Statement } from '../../src/domain/entities/Statement.js';
import { fingerprint } from '../../src/domain/services/FileFingerprint.js';
import { RuleBasedCategorizer } from '../../src/infrastructure/adapters/categorizer/RuleBasedCategorizer.js';
import { InMemoryStorageAdapter } from '../../src/infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import {
  ScriptedExtractor,
  ScriptedRenderer,
  type ScriptedPage,
  candidate,
  extractedPage,
  fixedClock,
  statementFile,
} from '../fixtures/collaborators.js';

function assertState<A extends ImportAttempt, S extends A['state']>(
  attempt: A,
  state: S,
): asserts attempt is Extract<A, { state: S }> {
  if (attempt.state !== state) {
    throw new Error(`Expected ${state} but the attempt is ${attempt.state}`);
  }
}

const setup = (
  pages: Record<string, ScriptedPage>,
  options: { storage?: InMemoryStorageAdapter; unreadable?: string[] } = {},
) => {
  const storage = options.storage ?? new InMemoryStorageAdapter(fixedClock());
  const extraction = new ExtractionService(
    new ScriptedRenderer(new Set(options.unreadable ?? [])),
    new ScriptedExtractor(pages),
    new RuleBasedCategorizer(),
    { recencyWindowYears: 3, clock: fixedClock() },
  );
  let attempts = 0;
  const service = new ReconciliationService(
    storage,
    new FingerprintIndex(storage),
    new StatementMatcher(storage, 0.05),
    new TransactionOverlapDetector(storage, 1.0),
    extraction,
    { softOverlapThreshold: 0.5 },
    () => `attempt-${++attempts}`,
  );
  return { storage, service };
};

const kbankPages: Record<string, ScriptedPage> = {
  'kbank-feb-1': extractedPage({
    transactions: [
      { trans_date: '2025-02-03', description: 'STARBUCKS SIAM', amount: 120 },
      { trans_date: '2025-02-10', description: 'GRAB RIDE', amount: 250 },
      { trans_date: '2025-02-12', description: 'PAYMENT RECEIVED', amount: -370, is_payment: true },
    ],
    cutoff_day: 20,
    bank_name: 'KBank',
    card_name: 'Platinum',
  }),
};

describe('ReconciliationService', () => {
  it('commits a fresh statement straight through', async () => {
    const { storage, service } = setup(kbankPages);
    const file = statementFile('kbank-feb.pdf', ['kbank-feb-1']);

    const attempt = service.begin([file]);
    expect(attempt).toEqual({ id: 'attempt-1', state: 'CHECKING_FINGERPRINT', files: [file], rejections: [] });

    const staged = await service.stage(attempt);
    assertState(staged, 'CHECKING_FUZZY');
    expect(staged.batch.filenames).toEqual(['kbank-feb.pdf']);
    expect(staged.batch.fingerprints).toEqual([fingerprint(file.content)]);
    expect(staged.batch.cutoffDay).toBe(20);
    expect(staged.batch.issuerSuggestion).toBe('KBank Platinum');
    expect(staged.batch.transactions).toHaveLength(2);

    const result = await service.reconcile(staged);
    assertState(result, 'COMMITTED');
    expect(result.warnings).toEqual([]);
    expect(result.statement).toEqual({
      id: 1,
      filenames: ['kbank-feb.pdf'],
      issuer: 'KBank Platinum',
      period: '2025-02',
      importedAt: '2025-03-15T10:00:00.000Z',
      transactionCount: 2,
      cutoffDay: 20,
      fingerprints: [fingerprint(file.content)],
    });

    const stored = await storage.loadTransactions('all');
    expect(stored.map((txn) => [txn.transactionDate, txn.amount, txn.issuer])).toEqual([
      ['2025-02-10', 250, 'KBank Platinum'],
      ['2025-02-03', 120, 'KBank Platinum'],
    ]);
  });

  it('rejects a byte-identical re-upload without touching storage', async () => {
    const { storage, service } = setup(kbankPages);
    const first = await service.stage(service.begin([statementFile('kbank-feb.pdf', ['kbank-feb-1'])]));
    assertState(first, 'CHECKING_FUZZY');
    await service.reconcile(first);

    const copy = statementFile('renamed-copy.pdf', ['kbank-feb-1']);
    const second = await service.stage(service.begin([copy]));

    assertState(second, 'REJECTED_DUPLICATE');
    expect(second.rejections).toEqual([
      {
        kind: 'EXACT_DUPLICATE_FILE',
        filename: 'renamed-copy.pdf',
        fingerprint: fingerprint(copy.content),
        matchedStatement: {
          id: 1,
          filenames: ['kbank-feb.pdf'],
          issuer: 'KBank Platinum',
          period: '2025-02',
          importedAt: '2025-03-15T10:00:00.000Z',
        },
      },
    ]);
    expect(await storage.listStatements()).toHaveLength(1);
    expect(await storage.loadTransactions('all')).toHaveLength(2);
  });

  it('remembers every file of a multi-file statement', async () => {
    const { service } = setup({
      ...kbankPages,
      'kbank-feb-2': extractedPage({
        transactions: [{ trans_date: '2025-02-14', description: 'LAWSON 108', amount: 35 }],
        cutoff_day: 20,
      }),
    });
    const part1 = statementFile('part-1.pdf', ['kbank-feb-1']);
    const part2 = statementFile('part-2.pdf', ['kbank-feb-2']);

    const staged = await service.stage(service.begin([part1, part2]));
    assertState(staged, 'CHECKING_FUZZY');
    const committed = await service.reconcile(staged);
    assertState(committed, 'COMMITTED');
    expect(committed.statement.fingerprints).toEqual([fingerprint(part1.content), fingerprint(part2.content)]);
    expect(committed.statement.transactionCount).toBe(3);

    const again = await service.stage(service.begin([part2]));
    assertState(again, 'REJECTED_DUPLICATE');
    expect(again.rejections[0]?.matchedStatement?.id).toBe(1);
  });

  it('sets aside in-batch duplicates and unreadable files', async () => {
    const { service } = setup(kbankPages, { unreadable: ['locked.pdf'] });
    const original = statementFile('a.pdf', ['kbank-feb-1']);

    const staged = await service.stage(
      service.begin([original, statementFile('a (1).pdf', ['kbank-feb-1']), statementFile('locked.pdf', ['x'])]),
    );

    assertState(staged, 'CHECKING_FUZZY');
    expect(staged.rejections).toEqual([
      {
        kind: 'EXACT_DUPLICATE_FILE',
        filename: 'a (1).pdf',
        fingerprint: fingerprint(original.content),
        matchedStatement: null,
      },
    ]);
    expect(staged.batch.filenames).toEqual(['a.pdf']);
    expect(staged.batch.issues).toEqual([
      {
        kind: 'UNREADABLE_FILE',
        filename: 'locked.pdf',
        reason: 'The PDF is password protected; supply its password',
      },
    ]);

    const committed = await service.reconcile(staged);
    assertState(committed, 'COMMITTED');
    expect(committed.issues).toEqual(staged.batch.issues);
    expect(committed.rejections).toEqual(staged.rejections);
  });

  describe('statement-level near duplicates', () => {
    const pages: Record<string, ScriptedPage> = {
      'scb-a': extractedPage({ transactions: [{ trans_date: '2025-02-05', description: 'CENTRAL WORLD', amount: 1000 }] }),
      'scb-b': extractedPage({ transactions: [{ trans_date: '2025-02-07', description: 'CENTRAL CHIDLOM', amount: 1030 }] }),
    };

    const awaitingConfirmation = async () => {
      const { storage, service } = setup(pages);
      const first = await service.stage(service.begin([statementFile('scb-a.pdf', ['scb-a'])]));
      assertState(first, 'CHECKING_FUZZY');
      await service.reconcile(first, { issuer: 'SCB' });

      const second = await service.stage(service.begin([statementFile('scb-b.pdf', ['scb-b'])]));
      assertState(second, 'CHECKING_FUZZY');
      const result = await service.reconcile(second, { issuer: 'SCB' });
      assertState(result, 'AWAITING_CONFIRMATION');
      return { storage, service, result };
    };

    it('holds the import for confirmation', async () => {
      const { storage, result } = await awaitingConfirmation();

      expect(result.issuer).toBe('SCB');
      expect(result.warnings).toHaveLength(1);
      const [warning] = result.warnings;
      if (warning?.kind !== 'FUZZY_STATEMENT_OVERLAP') {
        throw new Error('expected a statement-level warning');
      }
      expect(warning.candidate.statement.id).toBe(1);
      expect(warning.candidate.storedTotal).toBe(1000);
      expect(warning.candidate.diffRatio).toBeCloseTo(0.03, 10);
      expect(warning.candidate.issuerMatch).toBe(true);
      expect(await storage.listStatements()).toHaveLength(1);
    });

    it('commits once the user confirms', async () => {
      const { storage, service, result } = await awaitingConfirmation();

      const committed = await service.confirm(result);

      expect(committed.state).toBe('COMMITTED');
      expect(committed.statement.id).toBe(2);
      expect(committed.warnings).toEqual(result.warnings);
      expect(await storage.listStatements()).toHaveLength(2);
    });

    it('writes nothing when the user cancels', async () => {
      const { storage, service, result } = await awaitingConfirmation();

      const cancelled = service.cancel(result);

      expect(cancelled).toEqual({
        id: result.id,
        state: 'CANCELLED',
        rejections: [],
        warnings: result.warnings,
      });
      expect(await storage.listStatements()).toHaveLength(1);
      expect(await storage.loadTransactions('all')).toHaveLength(1);
    });
  });

  describe('transaction-level overlap', () => {
    const seedJanuary = async (storage: InMemoryStorageAdapter) =>
      storage.createStatementWithTransactions({
        filenames: ['january.pdf'],
        issuer: 'Krungsri',
        cutoffDay: 25,
        fingerprints: ['seed'],
        transactions: [1, 2, 3, 4, 5, 6].map((day) => candidate(`2025-01-0${day}`, `SHOP ${day}`, day * 100)),
      });

    it('warns when most positive rows are already stored', async () => {
      const storage = new InMemoryStorageAdapter(fixedClock());
      await seedJanuary(storage);
      const { service } = setup(
        {
          overlap: extractedPage({
            transactions: [
              // Same rows as January, half of them with OCR noise in the description.
              { trans_date: '2025-01-01', description: 'SHOP 1', amount: 100 },
              { trans_date: '2025-01-02', description: 'SHOP 2', amount: 200.4 },
              { trans_date: '2025-01-03', description: 'SHOP 3', amount: 300 },
              { trans_date: '2025-01-04', description: 'SH0P 4', amount: 400 },
              { trans_date: '2025-01-05', description: 'SHOP  5', amount: 500 },
              { trans_date: '2025-01-06', description: 'S HOP 6', amount: 599.5 },
              { trans_date: '2025-02-01', description: 'NEW 1', amount: 10 },
              { trans_date: '2025-02-02', description: 'NEW 2', amount: 20 },
              { trans_date: '2025-02-03', description: 'NEW 3', amount: 30 },
              { trans_date: '2025-02-04', description: 'NEW 4', amount: 40 },
              { trans_date: '2025-02-05', description: 'CASHBACK', amount: -50 },
            ],
          }),
        },
        { storage },
      );

      const staged = await service.stage(service.begin([statementFile('feb.pdf', ['overlap'])]));
      assertState(staged, 'CHECKING_FUZZY');
      const result = await service.reconcile(staged);

      assertState(result, 'AWAITING_CONFIRMATION');
      expect(result.warnings).toEqual([
        {
          kind: 'FUZZY_TRANSACTION_OVERLAP',
          overlap: { exactCount: 3, softCount: 6, overlapRatio: 0.6, total: 11, positiveTotal: 10 },
        },
      ]);
    });

    it('warns at the threshold and commits below it', async () => {
      const storage = new InMemoryStorageAdapter(fixedClock());
      await seedJanuary(storage);
      const { service } = setup(
        {
          half: extractedPage({
            transactions: [
              { trans_date: '2025-01-01', description: 'SHOP 1', amount: 100 },
              { trans_date: '2025-02-01', description: 'NEW 1', amount: 50 },
            ],
          }),
          third: extractedPage({
            transactions: [
              { trans_date: '2025-01-02', description: 'SHOP 2', amount: 200 },
              { trans_date: '2025-02-02', description: 'NEW 2', amount: 60 },
              { trans_date: '2025-02-03', description: 'NEW 3', amount: 70 },
            ],
          }),
        },
        { storage },
      );

      const half = await service.stage(service.begin([statementFile('half.pdf', ['half'])]));
      assertState(half, 'CHECKING_FUZZY');
      expect((await service.reconcile(half)).state).toBe('AWAITING_CONFIRMATION');

      const third = await service.stage(service.begin([statementFile('third.pdf', ['third'])]));
      assertState(third, 'CHECKING_FUZZY');
      expect((await service.reconcile(third)).state).toBe('COMMITTED');
    });
  });

  it('prefers the reviewed issuer and rows over the extracted ones', async () => {
    const { storage, service } = setup(kbankPages);
    const staged = await service.stage(service.begin([statementFile('kbank-feb.pdf', ['kbank-feb-1'])]));
    assertState(staged, 'CHECKING_FUZZY');

    const result = await service.reconcile(staged, {
      issuer: '  My KBank  ',
      transactions: [
        candidate('2025-02-03', 'STARBUCKS SIAM', 125, { category: 'Food & Drinks', subcategory: 'Cafes' }),
        candidate('2025-02-04', '   ', 999),
      ],
    });

    assertState(result, 'COMMITTED');
    expect(result.statement.issuer).toBe('My KBank');
    expect(result.statement.transactionCount).toBe(1);
    expect(await storage.listIssuers()).toEqual(['My KBank']);
  });

  it('leaves out reviewed rows whose amount is not a number', async () => {
    const { storage, service } = setup(kbankPages);
    const staged = await service.stage(service.begin([statementFile('kbank-feb.pdf', ['kbank-feb-1'])]));
    assertState(staged, 'CHECKING_FUZZY');

    const result = await service.reconcile(staged, {
      transactions: [candidate('2025-02-03', 'STARBUCKS SIAM', 120), candidate('2025-02-04', 'LOST AMOUNT', Number.NaN)],
    });

    assertState(result, 'COMMITTED');
    expect(result.statement.transactionCount).toBe(1);
    expect((await storage.loadTransactions('all')).map((txn) => txn.description)).toEqual(['STARBUCKS SIAM']);
  });

  it('refuses a batch with no transactions and keeps the attempt usable', async () => {
    const { service } = setup(kbankPages);
    const staged = await service.stage(service.begin([statementFile('kbank-feb.pdf', ['kbank-feb-1'])]));
    assertState(staged, 'CHECKING_FUZZY');

    await expect(service.reconcile(staged, { transactions: [candidate('2025-02-03', '', 10)] })).rejects.toBeInstanceOf(
      EmptyBatchError,
    );
    expect((await service.reconcile(staged)).state).toBe('COMMITTED');
  });

  it('leaves storage untouched when the commit fails', async () => {
    class FailingStorage extends InMemoryStorageAdapter {
      async createStatementWithTransactions(draft: NewStatement): Promise<Statement> {
        throw new Error(`disk full while saving ${draft.filenames.join(', ')}`);
      }
    }
    const storage = new FailingStorage(fixedClock());
    const { service } = setup(kbankPages, { storage });
    const staged = await service.stage(service.begin([statementFile('kbank-feb.pdf', ['kbank-feb-1'])]));
    assertState(staged, 'CHECKING_FUZZY');

    const failure = await service.reconcile(staged).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CommitFailureError);
    expect(failure).toHaveProperty('code', 'COMMIT_FAILURE');
    expect(await storage.listStatements()).toEqual([]);
    expect(await storage.loadTransactions('all')).toEqual([]);
  });
});
