/**
 * Text and number normalization used to compare two extractions of the same page.
 */

const CURRENCY_SYMBOLS = /[₪$€£¥₹]/g;

/** Code point of the digit zero in each script whose decimal digits we fold to ASCII. */
const DIGIT_ZEROS = [
  0x0660, // Arabic-Indic
  0x06f0, // Extended Arabic-Indic (Persian, Urdu)
  0x07c0, // NKo
  0x0966, // Devanagari
  0x09e6, // Bengali
  0x0a66, // Gurmukhi
  0x0ae6, // Gujarati
  0x0b66, // Oriya
  0x0be6, // Tamil
  0x0c66, // Telugu
  0x0ce6, // Kannada
  0x0d66, // Malayalam
  0x0e50, // Thai
  0x0ed0, // Lao
  0x0f20, // Tibetan
  0x1040, // Myanmar
  0x17e0, // Khmer
  0x1810, // Mongolian
  0xff10, // Fullwidth
];

/**
 * A number token: optional sign, digit groups separated by `,` `.` or a
 * non-breaking space, an optional decimal part and an optional percent sign.
 * Ordinary spaces never join two numbers.
 */
const NUMBER_TOKEN = /-?\d+(?:[,.\u00A0\u202F]\d{3})*(?:[,.]\d+)?%?/g;
const VALID_DECIMAL = /^-?\d+(?:\.\d+)?$/;

/**
 * Keep only letters and digits (any script), lower-cased.
 */
export function normalizeForComparison(text: string): string {
  if (!text) return '';
  const kept = text.match(/[\p{L}\p{N}]/gu);
  return kept ? kept.join('').toLowerCase() : '';
}

export function toAsciiDigits(text: string): string {
  let out = '';
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const zero = DIGIT_ZEROS.find((start) => code >= start && code <= start + 9);
    out += zero === undefined ? char : String(code - zero);
  }
  return out;
}

/**
 * Resolve which separators in a token are grouping and which is the decimal
 * point, returning a plain `-123.45` style string.
 */
function canonicalize(token: string): string {
  let value = token.replace(/%$/, '').replace(/[\u00A0\u202F]/g, '');

  const lastDot = value.lastIndexOf('.');
  const lastComma = value.lastIndexOf(',');

  if (lastDot !== -1 && lastComma !== -1) {
    if (lastComma > lastDot) {
      // 1.234,56
      value = value.replace(/\./g, '').replace(',', '.');
    } else {
      // 1,234.56
      value = value.replace(/,/g, '');
    }
    return value;
  }

  if (lastComma !== -1) {
    const commaCount = value.split(',').length - 1;
    const decimals = value.length - lastComma - 1;
    if (commaCount === 1 && decimals <= 2) {
      return value.replace(',', '.');
    }
    return value.replace(/,/g, '');
  }

  if (lastDot !== -1) {
    const dotCount = value.split('.').length - 1;
    if (dotCount > 1) {
      const decimals = value.length - lastDot - 1;
      if (decimals <= 2) {
        return value.slice(0, lastDot).replace(/\./g, '') + '.' + value.slice(lastDot + 1);
      }
      return value.replace(/\./g, '');
    }
  }

  return value;
}

/**
 * Extract every number from the text in canonical form (`1234.56`, `-500`).
 * Currency symbols and percent signs are dropped; ambiguous separators are
 * resolved per token (`1,234.56`, `1.234,56`, `12,5`). Tokens that do not
 * resolve to a decimal number are skipped.
 */
export function extractNumbers(text: string): string[] {
  if (!text) return [];

  const cleaned = toAsciiDigits(text).replace(CURRENCY_SYMBOLS, '');
  const numbers: string[] = [];

  for (const match of cleaned.matchAll(NUMBER_TOKEN)) {
    const value = canonicalize(match[0]);
    if (VALID_DECIMAL.test(value)) {
      numbers.push(value);
    }
  }

  return numbers;
}
