import type { CandidateTransaction } from './Transaction.js';

export interface Statement {
  id: number;
  filenames: string[];
  issuer: string;
  period: string; // YYYY-MM
  importedAt: string; // ISO timestamp
  transactionCount: number;
  cutoffDay: number | null;
  fingerprints: string[];
}

export interface NewStatement {
  filenames: string[];
  issuer: string;
  cutoffDay: number | null;
  fingerprints: string[];
  transactions: CandidateTransaction[];
}
