import { z } from 'zod';
import { normalizeCategory, normalizeSubcategory } from '../../domain/entities/Categories.js';
import type { CandidateTransaction } from '../../domain/entities/Transaction.js';
import { optionalAmount } from './ExtractedPageDTO.js';

/**
 * Shape of a reviewed row coming back from the edit step. Rows are re-validated
 * here because the reviewer may have rewritten any field.
 */
export const CandidateTransactionSchema = z.object({
  transactionDate: z.string().nullish().transform((value) => value?.trim() ?? ''),
  postingDate: z.string().nullish().transform((value) => value ?? ''),
  description: z.string().nullish().transform((value) => value?.trim() ?? ''),
  amount: optionalAmount,
  category: z.string().nullish(),
  subcategory: z.string().nullish(),
});

export type ReviewedRowDTO = z.infer<typeof CandidateTransactionSchema>;

/** Rows whose amount was cleared are left out rather than saved as 0. */
export const toCandidateTransactions = (rows: ReviewedRowDTO[]): CandidateTransaction[] =>
  rows.flatMap((row): CandidateTransaction[] => {
    if (row.amount === null) {
      return [];
    }

    const category = normalizeCategory(row.category);
    return [
      {
        transactionDate: row.transactionDate,
        postingDate: row.postingDate.trim(),
        description: row.description,
        amount: row.amount,
        category,
        subcategory: normalizeSubcategory(category, row.subcategory),
      },
    ];
  });
