/**
 * Numeric-or-text coercion
 *
 * Cell values are always text. Wherever tabq needs an ordering or an
 * equality it first tries to read both sides as floating-point numbers and
 * falls back to the raw strings. Comparison, sorting and header detection all
 * go through this module so they agree on what counts as a number.
 */

// Decimal literals with optional sign, fraction and exponent, plus the
// special spellings inf/infinity/nan in any case. Single underscores may
// separate digits.
const DIGITS = '\\d(?:_?\\d)*';
const DECIMAL_PATTERN = new RegExp(
  `^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`
);
const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;
const DECIMAL_DIGIT = /\p{Nd}/u;
const NON_ASCII_DIGIT = /[^\P{Nd}0-9]/gu;

/**
 * Value of a Unicode decimal digit. Every such digit belongs to a
 * contiguous run that starts at zero, so the value is its offset in the run.
 */
function digitValue(digit: string): string {
  const code = digit.codePointAt(0) ?? 0;
  let offset = 0;
  while (offset < code && DECIMAL_DIGIT.test(String.fromCodePoint(code - offset - 1))) {
    offset++;
  }
  return String(offset % 10);
}

/**
 * Parse `text` as a floating-point number.
 *
 * Surrounding whitespace is ignored. Decimal digits from any script are
 * accepted, and underscores may group digits (`1_000`). Returns `undefined` for anything
 * that is not a decimal literal: empty strings, hex/octal/binary prefixes,
 * comma separators and free text.
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim().replace(NON_ASCII_DIGIT, digitValue);
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed.replaceAll('_', ''));
  }
  const special = SPECIAL_PATTERN.exec(trimmed);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  return undefined;
}

export function isNumeric(text: string): boolean {
  return parseNumber(text) !== undefined;
}

/**
 * Sort/compare key of a cell: its number when it parses, otherwise the raw text.
 */
export type CoercedKey =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'text'; readonly value: string };

export function coerceKey(text: string): CoercedKey {
  const value = parseNumber(text);
  return value === undefined ? { kind: 'text', value: text } : { kind: 'number', value };
}

/**
 * Code-unit ordering of two strings (no locale rules).
 */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// NaN sorts after every other number and equal to itself.
function compareNumbers(a: number, b: number): number {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over coerced keys.
 *
 * Numbers compare numerically, with NaN after the rest, and text compares
 * by code unit. In a column that mixes both, every numeric key sorts before
 * every text key.
 */
export function compareKeys(a: CoercedKey, b: CoercedKey): number {
  if (a.kind === 'number' && b.kind === 'number') {
    return compareNumbers(a.value, b.value);
  }
  if (a.kind === 'text' && b.kind === 'text') {
    return compareText(a.value, b.value);
  }
  return a.kind === 'number' ? -1 : 1;
}

/**
 * Pair two raw values for a comparison: numbers when both parse, otherwise
 * both original strings.
 */
export type CoercedPair =
  | { readonly kind: 'number'; readonly left: number; readonly right: number }
  | { readonly kind: 'text'; readonly left: string; readonly right: string };

export function coercePair(left: string, right: string): CoercedPair {
  const l = parseNumber(left);
  const r = parseNumber(right);
  if (l !== undefined && r !== undefined) {
    return { kind: 'number', left: l, right: r };
  }
  return { kind: 'text', left, right };
}
