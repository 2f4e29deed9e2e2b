export class ReconciliationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ReconciliationError';
  }
}

export class CommitFailureError extends ReconciliationError {
  constructor(attemptId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Import ${attemptId} could not be saved, nothing was written: ${reason}`, 'COMMIT_FAILURE', { cause });
    this.name = 'CommitFailureError';
  }
}

export class EmptyBatchError extends ReconciliationError {
  constructor(attemptId: string) {
    super(`Import ${attemptId} has no transactions to save`, 'EMPTY_BATCH');
    this.name = 'EmptyBatchError';
  }
}

export class AttemptNotFoundError extends ReconciliationError {
  constructor(attemptId: string) {
    super(`No pending import with id ${attemptId}`, 'ATTEMPT_NOT_FOUND');
    this.name = 'AttemptNotFoundError';
  }
}

export class InvalidTransitionError extends ReconciliationError {
  constructor(attemptId: string, from: string, action: string) {
    super(`Import ${attemptId} cannot ${action} while ${from}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class UnsupportedFileError extends ReconciliationError {
  constructor(filename: string) {
    super(`${filename} is not a PDF, JPEG or PNG file`, 'UNSUPPORTED_FILE');
    this.name = 'UnsupportedFileError';
  }
}

export const formatError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
