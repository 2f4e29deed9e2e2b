import type { MatchCandidate } from '../dto/ReconciliationDTO.js';
import { formatError } from '../errors/ReconciliationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { toStatementSummary } from './FingerprintIndex.js';

export const DEFAULT_AMOUNT_TOLERANCE = 0.05;

export class StatementMatcher {
  constructor(
    private readonly storage: StoragePort,
    private readonly defaultTolerance: number = DEFAULT_AMOUNT_TOLERANCE,
  ) {}

  /**
   * Statements of the same period whose positive-amount total is within
   * `tolerance` of `totalAmount`. The issuer is only compared afterwards because
   * extraction spells issuer names inconsistently.
   */
  async findSimilar(
    issuer: string,
    period: string,
    totalAmount: number,
    tolerance: number = this.defaultTolerance,
  ): Promise<MatchCandidate[]> {
    if (!period) {
      return [];
    }

    const totals = await this.storage.loadStatementTotals(period);
    const candidates: MatchCandidate[] = [];

    for (const { statement, positiveTotal } of totals) {
      if (!Number.isFinite(positiveTotal)) {
        console.warn(`⚠️ Statement ${statement.id} has an unreadable total, skipping`);
        continue;
      }

      const candidate = (diffRatio: number): MatchCandidate => ({
        statement: toStatementSummary(statement),
        storedTotal: positiveTotal,
        diffRatio,
        issuerMatch: statement.issuer === issuer,
      });

      if (positiveTotal === 0 && totalAmount === 0) {
        candidates.push(candidate(0));
        continue;
      }

      if (positiveTotal === 0) {
        continue;
      }

      const diffRatio = Math.abs(totalAmount - positiveTotal) / Math.max(Math.abs(positiveTotal), 1);
      if (diffRatio <= tolerance) {
        candidates.push(candidate(diffRatio));
      }
    }

    return candidates;
  }

  async findSimilarSafely(issuer: string, period: string, totalAmount: number): Promise<MatchCandidate[]> {
    try {
      return await this.findSimilar(issuer, period, totalAmount);
    } catch (error) {
      console.warn(`⚠️ Statement comparison for ${period} failed, continuing without it:`, formatError(error));
      return [];
    }
  }
}
