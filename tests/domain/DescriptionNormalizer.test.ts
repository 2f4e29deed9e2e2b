import { describe, expect, it } from 'vitest';
import { normalizeDescription } from '../../src/domain/services/DescriptionNormalizer.js';

describe('normalizeDescription', () => {
  it('turns punctuation into single spaces and lowercases', () => {
    expect(normalizeDescription('  GRAB*RIDE -- BANGKOK  ')).toBe('grab ride bangkok');
  });

  it('folds full-width forms', () => {
    expect(normalizeDescription('ＡＢＣ\u3000１２３')).toBe('abc 123');
  });

  it('converts Thai digits and keeps Thai letters with their marks', () => {
    expect(normalizeDescription('ร้านกาแฟ ๗-๑๑')).toBe('ร้านกาแฟ 7 11');
  });

  it('splits words joined by zero-width spaces', () => {
    expect(normalizeDescription('SHOP\u200BNAME')).toBe('shop name');
  });

  it('drops apostrophes inside words', () => {
    expect(normalizeDescription("McDonald's")).toBe('mcdonalds');
    expect(normalizeDescription('McDonald\u2019s')).toBe('mcdonalds');
  });
});
