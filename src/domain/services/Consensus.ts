export interface PageMetadata {
  cutoffDay?: number | null;
  issuerName?: string | null;
  cardName?: string | null;
}

export interface DocumentConsensus {
  cutoffDay: number | null;
  issuerName: string | null;
  cardName: string | null;
  issuerSuggestion: string | null;
}

const isObserved = <T>(value: T | null | undefined): value is T => {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (typeof value === 'number') {
    return value !== 0 && Number.isFinite(value);
  }
  return true;
};

/**
 * Majority vote over the observed values. Ties go to the value seen first, so
 * callers must pass values in a stable order (page order, file order).
 */
export const mostFrequent = <T>(values: ReadonlyArray<T | null | undefined>): T | null => {
  const counts = new Map<T, number>();
  for (const value of values) {
    if (isObserved(value)) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  let winner: T | null = null;
  let best = 0;
  for (const [value, count] of counts) {
    if (count > best) {
      winner = value;
      best = count;
    }
  }

  return winner;
};

export const composeIssuerSuggestion = (issuerName: string | null, cardName: string | null): string | null => {
  if (issuerName && cardName) {
    return `${issuerName} ${cardName}`;
  }

  return issuerName || cardName || null;
};

export const aggregatePages = (pages: ReadonlyArray<PageMetadata>): DocumentConsensus => {
  const cutoffDay = mostFrequent(pages.map((page) => page.cutoffDay));
  const issuerName = mostFrequent(pages.map((page) => page.issuerName));
  const cardName = mostFrequent(pages.map((page) => page.cardName));

  return {
    cutoffDay,
    issuerName,
    cardName,
    issuerSuggestion: composeIssuerSuggestion(issuerName, cardName),
  };
};
