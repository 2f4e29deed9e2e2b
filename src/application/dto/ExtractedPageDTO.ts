import { z } from 'zod';

/**
 * Missing, blank or unreadable amounts parse to null so the row can be dropped;
 * coercing them would store a 0 nobody entered.
 */
export const optionalAmount = z.preprocess((value) => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  return typeof value === 'number' && Number.isNaN(value) ? null : value;
}, z.coerce.number().finite().nullable());

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || null);

export const ExtractedRowSchema = z.object({
  trans_date: z.string().nullish().transform((value) => value?.trim() ?? ''),
  posting_date: z.string().nullish().transform((value) => value?.trim() ?? ''),
  description: z.string().transform((value) => value.trim()),
  amount: optionalAmount,
  is_payment: z.boolean().nullish().transform((value) => value ?? false),
});

export type ExtractedRowDTO = z.infer<typeof ExtractedRowSchema>;

export const ExtractedPageSchema = z.object({
  transactions: z.array(ExtractedRowSchema).nullish().transform((rows) => rows ?? []),
  // An out-of-range day is an OCR misread, not a cutoff.
  cutoff_day: z.coerce.number().int().min(1).max(31).nullish().catch(null),
  bank_name: optionalText,
  card_name: optionalText,
});

export type ExtractedPageDTO = z.infer<typeof ExtractedPageSchema>;
