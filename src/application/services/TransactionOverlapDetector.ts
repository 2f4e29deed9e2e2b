import type { CandidateTransaction } from '../../domain/entities/Transaction.js';
import type { OverlapResult } from '../dto/ReconciliationDTO.js';
import { formatError } from '../errors/ReconciliationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';

export const DEFAULT_AMOUNT_SLACK = 1.0;

type OverlapCandidate = Pick<CandidateTransaction, 'transactionDate' | 'description' | 'amount'>;

export class TransactionOverlapDetector {
  constructor(
    private readonly storage: StoragePort,
    private readonly amountSlack: number = DEFAULT_AMOUNT_SLACK,
  ) {}

  async findOverlap(candidates: OverlapCandidate[]): Promise<OverlapResult> {
    // Credits and payments are too generic to tell statements apart.
    const positive = candidates.filter((candidate) => candidate.amount > 0);

    if (positive.length === 0) {
      return { exactCount: 0, softCount: 0, overlapRatio: 0, total: candidates.length, positiveTotal: 0 };
    }

    const matches = await Promise.all(positive.map((candidate) => this.match(candidate)));
    const exactCount = matches.filter((match) => match.exact).length;
    const softCount = matches.filter((match) => match.soft).length;

    return {
      exactCount,
      softCount,
      // Soft matches survive OCR differences in merchant text, so they drive the ratio.
      overlapRatio: softCount / positive.length,
      total: candidates.length,
      positiveTotal: positive.length,
    };
  }

  private async match(candidate: OverlapCandidate): Promise<{ exact: boolean; soft: boolean }> {
    const query = {
      transactionDate: candidate.transactionDate,
      amount: candidate.amount,
      amountSlack: this.amountSlack,
    };

    try {
      const [exact, soft] = await Promise.all([
        this.storage.hasTransactionMatch({ ...query, description: candidate.description }),
        this.storage.hasTransactionMatch(query),
      ]);
      return { exact, soft };
    } catch (error) {
      console.warn(
        `⚠️ Overlap lookup failed for ${candidate.transactionDate} ${candidate.amount}, counting as new:`,
        formatError(error),
      );
      return { exact: false, soft: false };
    }
  }
}
