// Thai digits ๐..๙ occupy U+0E50..U+0E59.
const THAI_DIGIT_ZERO = 0x0e50;
const thaiDigits = /[\u0E50-\u0E59]/g;
const apostrophes = /['\u2019]/g;
// Anything that is not a letter, mark or digit separates words. This includes
// the zero-width spaces PDF text layers put between Thai words.
const separators = /[^\p{L}\p{M}\p{N}]+/gu;

/**
 * Reduces a merchant line to lowercase words so rules can match it regardless
 * of full-width forms, Thai numerals or punctuation.
 */
export const normalizeDescription = (input: string): string =>
  input
    .normalize('NFKC')
    .replace(thaiDigits, (digit) => String(digit.charCodeAt(0) - THAI_DIGIT_ZERO))
    .replace(apostrophes, '')
    .replace(separators, ' ')
    .trim()
    .toLowerCase();
