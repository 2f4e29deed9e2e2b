import type { Statement } from '../../domain/entities/Statement.js';
import { type Fingerprint, fingerprint } from '../../domain/services/FileFingerprint.js';
import type { StatementSummary } from '../dto/ReconciliationDTO.js';
import { formatError } from '../errors/ReconciliationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';

export const toStatementSummary = (statement: Statement): StatementSummary => ({
  id: statement.id,
  filenames: statement.filenames,
  issuer: statement.issuer,
  period: statement.period,
  importedAt: statement.importedAt,
});

export class FingerprintIndex {
  constructor(private readonly storage: StoragePort) {}

  fingerprint(content: Uint8Array): Fingerprint {
    return fingerprint(content);
  }

  async findDuplicate(candidate: Fingerprint): Promise<StatementSummary | null> {
    if (!candidate) {
      return null;
    }

    try {
      const sets = await this.storage.listFingerprintSets();
      const match = sets.find((entry) => entry.fingerprints.includes(candidate));
      return match ? toStatementSummary(match.statement) : null;
    } catch (error) {
      console.warn(`⚠️ Fingerprint lookup failed, treating ${candidate.slice(0, 12)} as new:`, formatError(error));
      return null;
    }
  }
}
