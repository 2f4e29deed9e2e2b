import type { Statement } from '../../domain/entities/Statement.js';
import { estimatePeriod } from '../../domain/services/BillingPeriod.js';
import { mostFrequent } from '../../domain/services/Consensus.js';
import type {
  AwaitingConfirmationAttempt,
  CancelledAttempt,
  CheckingFingerprintAttempt,
  CheckingFuzzyAttempt,
  CommittedAttempt,
  DuplicateWarning,
  FileExtraction,
  FileRejection,
  RejectedDuplicateAttempt,
  ReviewInput,
  StagedBatch,
} from '../dto/ReconciliationDTO.js';
import type { UploadedFileDTO } from '../dto/UploadedFileDTO.js';
import { CommitFailureError, EmptyBatchError } from '../errors/ReconciliationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';
import type { ExtractionService } from './ExtractionService.js';
import type { FingerprintIndex } from './FingerprintIndex.js';
import type { StatementMatcher } from './StatementMatcher.js';
import type { TransactionOverlapDetector } from './TransactionOverlapDetector.js';

export const DEFAULT_SOFT_OVERLAP_THRESHOLD = 0.5;

export interface ReconciliationPolicy {
  softOverlapThreshold: number;
}

const generateAttemptId = () => `import-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;

/**
 * Drives one import through fingerprint screening, fuzzy duplicate checks and
 * the final commit. Every step takes an attempt value and returns the next one;
 * nothing about an attempt is held here.
 */
export class ReconciliationService {
  constructor(
    private readonly storage: StoragePort,
    private readonly fingerprints: FingerprintIndex,
    private readonly statementMatcher: StatementMatcher,
    private readonly overlapDetector: TransactionOverlapDetector,
    private readonly extraction: ExtractionService,
    private readonly policy: ReconciliationPolicy = { softOverlapThreshold: DEFAULT_SOFT_OVERLAP_THRESHOLD },
    private readonly newAttemptId: () => string = generateAttemptId,
  ) {}

  begin(files: UploadedFileDTO[]): CheckingFingerprintAttempt {
    return { id: this.newAttemptId(), state: 'CHECKING_FINGERPRINT', files, rejections: [] };
  }

  async stage(
    attempt: CheckingFingerprintAttempt,
    options: { password?: string } = {},
  ): Promise<CheckingFuzzyAttempt | RejectedDuplicateAttempt> {
    const rejections: FileRejection[] = [];
    const accepted: Array<{ fingerprint: string; extraction: FileExtraction }> = [];
    const unreadable: FileExtraction[] = [];
    const seen = new Set<string>();

    for (const file of attempt.files) {
      const fingerprint = this.fingerprints.fingerprint(file.content);

      if (seen.has(fingerprint)) {
        rejections.push({ kind: 'EXACT_DUPLICATE_FILE', filename: file.filename, fingerprint, matchedStatement: null });
        continue;
      }
      seen.add(fingerprint);

      const matchedStatement = await this.fingerprints.findDuplicate(fingerprint);
      if (matchedStatement) {
        console.log(`⛔ ${file.filename} was already imported as statement ${matchedStatement.id}`);
        rejections.push({ kind: 'EXACT_DUPLICATE_FILE', filename: file.filename, fingerprint, matchedStatement });
        continue;
      }

      const extraction = await this.extraction.extract(file, options);
      if (extraction.issues.some((issue) => issue.kind === 'UNREADABLE_FILE')) {
        unreadable.push(extraction);
        continue;
      }

      accepted.push({ fingerprint, extraction });
    }

    if (attempt.files.length > 0 && rejections.length === attempt.files.length) {
      return { id: attempt.id, state: 'REJECTED_DUPLICATE', rejections };
    }

    const extractions = accepted.map((entry) => entry.extraction);
    const batch: StagedBatch = {
      filenames: extractions.map((extraction) => extraction.filename),
      fingerprints: accepted.map((entry) => entry.fingerprint),
      transactions: extractions.flatMap((extraction) => extraction.transactions),
      cutoffDay: mostFrequent(extractions.map((extraction) => extraction.cutoffDay)),
      issuerSuggestion: mostFrequent(extractions.map((extraction) => extraction.issuerSuggestion)),
      issues: [...extractions, ...unreadable].flatMap((extraction) => extraction.issues),
    };

    return { id: attempt.id, state: 'CHECKING_FUZZY', batch, rejections };
  }

  /**
   * Runs the statement-level and transaction-level checks over the reviewed
   * batch. Any warning defers the commit until the caller confirms or cancels.
   */
  async reconcile(
    attempt: CheckingFuzzyAttempt,
    review: ReviewInput = {},
  ): Promise<AwaitingConfirmationAttempt | CommittedAttempt> {
    const transactions = (review.transactions ?? attempt.batch.transactions).filter(
      (txn) => txn.description.trim().length > 0 && Number.isFinite(txn.amount),
    );
    if (transactions.length === 0) {
      throw new EmptyBatchError(attempt.id);
    }

    // A label typed by the user always wins over the extracted suggestion.
    const issuer = review.issuer?.trim() || attempt.batch.issuerSuggestion || '';
    const batch: StagedBatch = { ...attempt.batch, transactions };

    const period = estimatePeriod(transactions) ?? '';
    const totalAmount = transactions.filter((txn) => txn.amount > 0).reduce((sum, txn) => sum + txn.amount, 0);

    const [similar, overlap] = await Promise.all([
      this.statementMatcher.findSimilarSafely(issuer, period, totalAmount),
      this.overlapDetector.findOverlap(transactions),
    ]);

    const warnings: DuplicateWarning[] = similar.map(
      (candidate): DuplicateWarning => ({ kind: 'FUZZY_STATEMENT_OVERLAP', candidate }),
    );
    if (overlap.overlapRatio >= this.policy.softOverlapThreshold) {
      warnings.push({ kind: 'FUZZY_TRANSACTION_OVERLAP', overlap });
    }

    if (warnings.length > 0) {
      console.log(`⚠️ Import ${attempt.id} looks like a duplicate (${warnings.map((w) => w.kind).join(', ')})`);
      return { id: attempt.id, state: 'AWAITING_CONFIRMATION', batch, issuer, warnings, rejections: attempt.rejections };
    }

    return this.commit(attempt.id, batch, issuer, attempt.rejections, []);
  }

  async confirm(attempt: AwaitingConfirmationAttempt): Promise<CommittedAttempt> {
    return this.commit(attempt.id, attempt.batch, attempt.issuer, attempt.rejections, attempt.warnings);
  }

  cancel(attempt: AwaitingConfirmationAttempt): CancelledAttempt {
    return { id: attempt.id, state: 'CANCELLED', rejections: attempt.rejections, warnings: attempt.warnings };
  }

  private async commit(
    attemptId: string,
    batch: StagedBatch,
    issuer: string,
    rejections: FileRejection[],
    warnings: DuplicateWarning[],
  ): Promise<CommittedAttempt> {
    let statement: Statement;
    try {
      statement = await this.storage.createStatementWithTransactions({
        filenames: batch.filenames,
        issuer,
        cutoffDay: batch.cutoffDay,
        fingerprints: batch.fingerprints,
        transactions: batch.transactions,
      });
    } catch (error) {
      console.error(`❌ Import ${attemptId} failed to save:`, error);
      throw new CommitFailureError(attemptId, error);
    }

    console.log(`✅ Import ${attemptId} saved as statement ${statement.id}`, {
      issuer: statement.issuer,
      period: statement.period,
      transactions: statement.transactionCount,
    });

    return { id: attemptId, state: 'COMMITTED', statement, warnings, issues: batch.issues, rejections };
  }
}
