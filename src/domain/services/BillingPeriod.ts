import dayjs from 'dayjs';
import type { CandidateTransaction, TransactionPeriodFilter } from '../entities/Transaction.js';

const periodOf = (date: string): string => date.slice(0, 7);

/**
 * Month of the latest dated transaction, or null when no row carries a date.
 * Dates are ISO strings, so the lexical maximum is the latest one.
 */
export const estimatePeriod = (transactions: Pick<CandidateTransaction, 'transactionDate'>[]): string | null => {
  const dates = transactions.map((txn) => txn.transactionDate).filter((date) => date.length > 0);
  if (dates.length === 0) {
    return null;
  }

  return periodOf(dates.reduce((latest, date) => (date > latest ? date : latest)));
};

export const derivePeriod = (
  transactions: Pick<CandidateTransaction, 'transactionDate'>[],
  now: dayjs.Dayjs = dayjs(),
): string => estimatePeriod(transactions) ?? now.format('YYYY-MM');

/**
 * Rows dated more than `windowYears` before the current year are usually sample
 * rows printed on the statement. A date without a readable year is kept.
 */
export const isWithinRecencyWindow = (date: string, windowYears: number, now: dayjs.Dayjs = dayjs()): boolean => {
  const year = Number.parseInt(date.slice(0, 4), 10);
  if (Number.isNaN(year)) {
    return true;
  }

  return now.year() - year <= windowYears;
};

export const filterByPeriod = <T extends Pick<CandidateTransaction, 'transactionDate'>>(
  transactions: T[],
  filter: TransactionPeriodFilter,
  now: dayjs.Dayjs = dayjs(),
): T[] => {
  switch (filter) {
    case 'all':
      return transactions;
    case 'current_month':
      return transactions.filter((txn) => periodOf(txn.transactionDate) === now.format('YYYY-MM'));
    case 'last_month': {
      const lastMonth = now.subtract(1, 'month').format('YYYY-MM');
      return transactions.filter((txn) => periodOf(txn.transactionDate) === lastMonth);
    }
    case '3_months':
    case '6_months': {
      // The N most recent months present in the data, not the N calendar months before today.
      const limit = filter === '3_months' ? 3 : 6;
      const months = Array.from(
        new Set(transactions.map((txn) => txn.transactionDate).filter((date) => date.length >= 7).map(periodOf)),
      )
        .sort()
        .reverse()
        .slice(0, limit);
      const recent = new Set(months);
      return transactions.filter((txn) => recent.has(periodOf(txn.transactionDate)));
    }
  }
};
