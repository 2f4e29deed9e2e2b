import type { Statement } from '../../domain/entities/Statement.js';
import type { CandidateTransaction } from '../../domain/entities/Transaction.js';
import type { Fingerprint } from '../../domain/services/FileFingerprint.js';
import type { UploadedFileDTO } from './UploadedFileDTO.js';

export type StatementSummary = Pick<Statement, 'id' | 'filenames' | 'issuer' | 'period' | 'importedAt'>;

export interface MatchCandidate {
  statement: StatementSummary;
  storedTotal: number;
  diffRatio: number;
  issuerMatch: boolean;
}

export interface OverlapResult {
  exactCount: number;
  softCount: number;
  overlapRatio: number;
  total: number;
  positiveTotal: number;
}

export type DuplicateWarning =
  | { kind: 'FUZZY_STATEMENT_OVERLAP'; candidate: MatchCandidate }
  | { kind: 'FUZZY_TRANSACTION_OVERLAP'; overlap: OverlapResult };

export interface FileRejection {
  kind: 'EXACT_DUPLICATE_FILE';
  filename: string;
  fingerprint: Fingerprint;
  // null when the same bytes appeared earlier in the same upload
  matchedStatement: StatementSummary | null;
}

export type ExtractionIssue =
  | { kind: 'EXTRACTION_PARTIAL_FAILURE'; filename: string; failedPages: number; totalPages: number }
  | { kind: 'UNREADABLE_FILE'; filename: string; reason: string };

export interface FileExtraction {
  filename: string;
  transactions: CandidateTransaction[];
  cutoffDay: number | null;
  issuerSuggestion: string | null;
  skippedPayments: number;
  skippedStale: number;
  issues: ExtractionIssue[];
}

export interface StagedBatch {
  filenames: string[];
  fingerprints: Fingerprint[];
  transactions: CandidateTransaction[];
  cutoffDay: number | null;
  issuerSuggestion: string | null;
  issues: ExtractionIssue[];
}

interface AttemptBase {
  id: string;
  rejections: FileRejection[];
}

export interface CheckingFingerprintAttempt extends AttemptBase {
  state: 'CHECKING_FINGERPRINT';
  files: UploadedFileDTO[];
}

export interface CheckingFuzzyAttempt extends AttemptBase {
  state: 'CHECKING_FUZZY';
  batch: StagedBatch;
}

export interface AwaitingConfirmationAttempt extends AttemptBase {
  state: 'AWAITING_CONFIRMATION';
  batch: StagedBatch;
  issuer: string;
  warnings: DuplicateWarning[];
}

export interface CommittedAttempt extends AttemptBase {
  state: 'COMMITTED';
  statement: Statement;
  warnings: DuplicateWarning[];
  issues: ExtractionIssue[];
}

export interface RejectedDuplicateAttempt extends AttemptBase {
  state: 'REJECTED_DUPLICATE';
}

export interface CancelledAttempt extends AttemptBase {
  state: 'CANCELLED';
  warnings: DuplicateWarning[];
}

export type ImportAttempt =
  | CheckingFingerprintAttempt
  | CheckingFuzzyAttempt
  | AwaitingConfirmationAttempt
  | CommittedAttempt
  | RejectedDuplicateAttempt
  | CancelledAttempt;

export interface ReviewInput {
  issuer?: string;
  transactions?: CandidateTransaction[];
}
