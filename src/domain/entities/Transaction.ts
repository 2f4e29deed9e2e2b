export interface CandidateTransaction {
  transactionDate: string; // YYYY-MM-DD
  postingDate: string;
  description: string;
  amount: number; // positive = expense
  category: string;
  subcategory: string | null;
}

export interface Transaction extends CandidateTransaction {
  id: number;
  statementId: number;
  issuer: string;
}

export type TransactionPeriodFilter = 'all' | 'current_month' | 'last_month' | '3_months' | '6_months';

/** Stored dates are either empty (undated row) or a full YYYY-MM-DD. */
export const isStorableDate = (date: string): boolean => date === '' || date.length === 10;
